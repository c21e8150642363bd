import { promises as fs } from 'fs';
import { homedir } from 'os';
import { createLogger } from './logger.js';
import { ErrorFactory } from './errors.js';
import type { ConnectionProfile } from './config.js';
import type { ConnectionDescriptor, ResolvedAuth, ResolvedConnection } from './types.js';

export interface CredentialResolverOptions {
  profiles?: Record<string, ConnectionProfile>;
  /** seconds, used when neither the caller nor the profile sets one */
  defaultTimeout: number;
  env?: NodeJS.ProcessEnv;
}

const DEFAULT_PORT = 22;

/**
 * Turns a connection name plus whatever the caller supplied inline into a
 * complete descriptor: profile fields fill the gaps, `${VAR}` placeholders
 * are expanded from the environment and key files are read.
 */
export class CredentialResolver {
  private logger = createLogger('CredentialResolver');
  private profiles: Record<string, ConnectionProfile>;
  private defaultTimeout: number;
  private env: NodeJS.ProcessEnv;

  constructor(options: CredentialResolverOptions) {
    this.profiles = options.profiles ?? {};
    this.defaultTimeout = options.defaultTimeout;
    this.env = options.env ?? process.env;
  }

  hasProfile(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.profiles, name);
  }

  async resolve(descriptor: ConnectionDescriptor): Promise<ResolvedConnection> {
    const profile = this.hasProfile(descriptor.name) ? this.profiles[descriptor.name] ?? {} : {};
    const merged = this.expandDescriptor(this.mergeProfile(profile, descriptor));
    const { host, username } = merged;

    if (!host || !username) {
      const missing = [host ? undefined : 'host', username ? undefined : 'username']
        .filter((field): field is string => field !== undefined);
      throw ErrorFactory.invalidParams(
        'ssh_connect',
        missing.map(field => `${field} is required (no profile named ${descriptor.name} provides it)`)
      );
    }

    const port = merged.port ?? DEFAULT_PORT;
    const auth = await this.resolveAuth(merged);
    this.logger.debug(`Resolved connection ${descriptor.name}`, { host, port, username, authMethod: auth.method });

    return {
      name: descriptor.name,
      host,
      port,
      username,
      auth,
      timeout: merged.timeout ?? this.defaultTimeout
    };
  }

  /**
   * Replaces `${VAR_NAME}` with the value from the environment. Unknown
   * variables are left in place.
   */
  expandVariables(input: string): string {
    return input.replace(/\$\{([^}]+)\}/g, (match: string, varName: string) => {
      const value = this.env[varName];
      if (value === undefined) {
        this.logger.warn(`Environment variable not found: ${varName}`);
        return match;
      }
      return value;
    });
  }

  private expandDescriptor(descriptor: ConnectionDescriptor): ConnectionDescriptor {
    const expand = (value: string | undefined): string | undefined =>
      value === undefined ? undefined : this.expandVariables(value);

    return {
      ...descriptor,
      host: expand(descriptor.host),
      username: expand(descriptor.username),
      password: expand(descriptor.password),
      privateKeyPath: expand(descriptor.privateKeyPath)?.replace(/^~(?=$|\/)/, homedir()),
      passphrase: expand(descriptor.passphrase)
    };
  }

  private async resolveAuth(descriptor: ConnectionDescriptor): Promise<ResolvedAuth> {
    if (descriptor.password) {
      return { method: 'password', password: descriptor.password };
    }

    if (descriptor.privateKeyPath) {
      let privateKey: Buffer;
      try {
        privateKey = await fs.readFile(descriptor.privateKeyPath);
      } catch (error) {
        this.logger.error(`Failed to read private key file: ${descriptor.privateKeyPath}`);
        throw ErrorFactory.localIO('read private key', descriptor.privateKeyPath, error);
      }
      return {
        method: 'privateKey',
        privateKey,
        privateKeyPath: descriptor.privateKeyPath,
        passphrase: descriptor.passphrase
      };
    }

    const agent = this.env.SSH_AUTH_SOCK;
    if (descriptor.useAgent || (descriptor.useAgent === undefined && agent)) {
      if (!agent) {
        throw ErrorFactory.invalidParams('ssh_connect', ['use_agent requires SSH_AUTH_SOCK to be set']);
      }
      return { method: 'agent', agent };
    }

    throw ErrorFactory.invalidParams('ssh_connect', ['one of password, key_filename or use_agent is required']);
  }

  // Inline fields win over the profile
  private mergeProfile(profile: ConnectionProfile, descriptor: ConnectionDescriptor): ConnectionDescriptor {
    return {
      name: descriptor.name,
      host: descriptor.host ?? profile.host,
      port: descriptor.port ?? profile.port,
      username: descriptor.username ?? profile.username,
      password: descriptor.password ?? profile.password,
      privateKeyPath: descriptor.privateKeyPath ?? profile.privateKeyPath,
      passphrase: descriptor.passphrase ?? profile.passphrase,
      useAgent: descriptor.useAgent ?? profile.useAgent,
      timeout: descriptor.timeout ?? profile.timeout
    };
  }
}
