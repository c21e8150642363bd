/**
 * Configuration module for the SSH session server
 */

import dotenv from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { ErrorFactory } from './errors.js';

// Load environment variables
dotenv.config();

export interface ConnectionProfile {
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  privateKeyPath?: string;
  passphrase?: string;
  useAgent?: boolean;
  timeout?: number;
}

export interface ServerConfig {
  // Server configuration
  debug: boolean;
  serverName: string;
  serverVersion: string;

  // Limits
  maxConnections: number;
  maxSessions: number;

  // Timeouts, in seconds
  connectionTimeout: number;
  commandTimeout: number;
  transferTimeout: number;
  keepaliveInterval: number;
  probeTimeout: number;

  // Cleanup, in seconds
  connectionIdleTimeout: number;
  sessionIdleTimeout: number;
  cleanupInterval: number;

  // Sessions and output
  historyLimit: number;
  maxOutputBytes: number;
  shellBufferBytes: number;
  shellSettleMs: number;
  carryContext: boolean;

  // Logging configuration
  logLevel: string;
  logFile?: string;
  logSilent: boolean;

  // Connection profiles
  configFile: string;
  connections: Record<string, ConnectionProfile>;
}

const profileSchema = z.object({
  host: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).optional(),
  username: z.string().min(1).optional(),
  password: z.string().optional(),
  key_filename: z.string().optional(),
  passphrase: z.string().optional(),
  use_agent: z.boolean().optional(),
  timeout: z.number().positive().optional()
});

const seconds = z.number().int().nonnegative();

const fileSchema = z.object({
  debug: z.boolean().optional(),
  log_level: z.string().optional(),
  log_file: z.string().optional(),
  log_silent: z.boolean().optional(),
  server_name: z.string().min(1).optional(),
  server_version: z.string().min(1).optional(),
  max_connections: seconds.optional(),
  max_sessions: seconds.optional(),
  // default_timeout is the older name of command_timeout
  default_timeout: seconds.optional(),
  command_timeout: seconds.optional(),
  connection_timeout: seconds.optional(),
  transfer_timeout: seconds.optional(),
  keepalive_interval: seconds.optional(),
  probe_timeout: seconds.optional(),
  connection_idle_timeout: seconds.optional(),
  session_idle_timeout: seconds.optional(),
  cleanup_interval: seconds.optional(),
  history_limit: seconds.optional(),
  max_output_bytes: seconds.optional(),
  shell_buffer_bytes: seconds.optional(),
  shell_settle_ms: seconds.optional(),
  carry_context: z.boolean().optional(),
  connections: z.record(profileSchema).default({})
});

type FileConfig = z.infer<typeof fileSchema>;

export class ConfigManager {
  private config: ServerConfig;

  private fileError?: Error;

  /**
   * With `lenient`, an unreadable profile file is remembered in `loadError`
   * and the environment alone is used; otherwise it throws INVALID_CONFIG.
   */
  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly lenient = false
  ) {
    this.config = this.loadConfig();
  }

  private loadConfig(): ServerConfig {
    const debug = this.getBoolEnv('MCP_SSH_DEBUG', false);
    const configFile = this.expandHome(
      this.getEnv('MCP_SSH_CONFIG', join(homedir(), '.mcp_ssh_config.json'))
    );

    const fromEnv: ServerConfig = {
      debug,
      serverName: this.getEnv('MCP_SSH_SERVER_NAME', 'ssh-session-mcp'),
      serverVersion: this.getEnv('MCP_SSH_SERVER_VERSION', '0.1.0'),

      maxConnections: this.getIntEnv('MCP_SSH_MAX_CONNECTIONS', 10),
      maxSessions: this.getIntEnv('MCP_SSH_MAX_SESSIONS', 100),

      connectionTimeout: this.getIntEnv('MCP_SSH_CONNECTION_TIMEOUT', 30),
      commandTimeout: this.getIntEnv('MCP_SSH_TIMEOUT', 30),
      transferTimeout: this.getIntEnv('MCP_SSH_TRANSFER_TIMEOUT', 300),
      keepaliveInterval: this.getIntEnv('MCP_SSH_KEEPALIVE', 60),
      probeTimeout: this.getIntEnv('MCP_SSH_PROBE_TIMEOUT', 5),

      connectionIdleTimeout: this.getIntEnv('MCP_SSH_CONNECTION_IDLE_TIMEOUT', 3600),
      sessionIdleTimeout: this.getIntEnv('MCP_SSH_SESSION_IDLE_TIMEOUT', 24 * 3600),
      cleanupInterval: this.getIntEnv('MCP_SSH_CLEANUP_INTERVAL', 300),

      historyLimit: this.getIntEnv('MCP_SSH_HISTORY_LIMIT', 0),
      maxOutputBytes: this.getIntEnv('MCP_SSH_MAX_OUTPUT_BYTES', 1024 * 1024),
      shellBufferBytes: this.getIntEnv('MCP_SSH_SHELL_BUFFER_BYTES', 1024 * 1024),
      shellSettleMs: this.getIntEnv('MCP_SSH_SHELL_SETTLE_MS', 300),
      carryContext: this.getBoolEnv('MCP_SSH_CARRY_CONTEXT', true),

      logLevel: this.getEnv('MCP_SSH_LOG_LEVEL', debug ? 'DEBUG' : 'INFO'),
      logFile: this.getEnv('MCP_SSH_LOG_FILE', '') || undefined,
      logSilent: this.getBoolEnv('MCP_SSH_LOG_SILENT', this.env.NODE_ENV === 'test'),

      configFile,
      connections: {}
    };

    let file: FileConfig | undefined;
    this.fileError = undefined;
    try {
      file = this.readConfigFile(configFile);
    } catch (error) {
      if (!this.lenient) {
        throw error;
      }
      this.fileError = error instanceof Error ? error : new Error(String(error));
    }
    return file ? this.merge(fromEnv, file) : fromEnv;
  }

  private readConfigFile(path: string): FileConfig | undefined {
    if (!existsSync(path)) {
      return undefined;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf8'));
    } catch (error) {
      throw ErrorFactory.invalidConfig(path, error instanceof Error ? error.message : String(error));
    }

    const parsed = fileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw ErrorFactory.invalidConfig(path, issues.join('; '));
    }
    return parsed.data;
  }

  // Values from the file win over defaults but not over explicit env vars
  private merge(base: ServerConfig, file: FileConfig): ServerConfig {
    const pick = <T>(envKey: string, fileValue: T | undefined, current: T): T =>
      this.env[envKey] === undefined && fileValue !== undefined ? fileValue : current;

    const connections: Record<string, ConnectionProfile> = {};
    for (const [name, profile] of Object.entries(file.connections)) {
      connections[name] = {
        host: profile.host,
        port: profile.port,
        username: profile.username,
        password: profile.password,
        privateKeyPath: profile.key_filename ? this.expandHome(profile.key_filename) : undefined,
        passphrase: profile.passphrase,
        useAgent: profile.use_agent,
        timeout: profile.timeout
      };
    }

    const debug = pick('MCP_SSH_DEBUG', file.debug, base.debug);
    const defaultLevel = debug ? 'DEBUG' : 'INFO';

    return {
      ...base,
      debug,
      logLevel: pick('MCP_SSH_LOG_LEVEL', file.log_level, this.env.MCP_SSH_LOG_LEVEL === undefined ? defaultLevel : base.logLevel),
      logFile: pick<string | undefined>('MCP_SSH_LOG_FILE', file.log_file || undefined, base.logFile),
      logSilent: pick('MCP_SSH_LOG_SILENT', file.log_silent, base.logSilent),
      serverName: pick('MCP_SSH_SERVER_NAME', file.server_name, base.serverName),
      serverVersion: pick('MCP_SSH_SERVER_VERSION', file.server_version, base.serverVersion),
      maxConnections: pick('MCP_SSH_MAX_CONNECTIONS', file.max_connections, base.maxConnections),
      maxSessions: pick('MCP_SSH_MAX_SESSIONS', file.max_sessions, base.maxSessions),
      commandTimeout: pick('MCP_SSH_TIMEOUT', file.command_timeout ?? file.default_timeout, base.commandTimeout),
      connectionTimeout: pick('MCP_SSH_CONNECTION_TIMEOUT', file.connection_timeout, base.connectionTimeout),
      transferTimeout: pick('MCP_SSH_TRANSFER_TIMEOUT', file.transfer_timeout, base.transferTimeout),
      keepaliveInterval: pick('MCP_SSH_KEEPALIVE', file.keepalive_interval, base.keepaliveInterval),
      probeTimeout: pick('MCP_SSH_PROBE_TIMEOUT', file.probe_timeout, base.probeTimeout),
      connectionIdleTimeout: pick('MCP_SSH_CONNECTION_IDLE_TIMEOUT', file.connection_idle_timeout, base.connectionIdleTimeout),
      sessionIdleTimeout: pick('MCP_SSH_SESSION_IDLE_TIMEOUT', file.session_idle_timeout, base.sessionIdleTimeout),
      cleanupInterval: pick('MCP_SSH_CLEANUP_INTERVAL', file.cleanup_interval, base.cleanupInterval),
      historyLimit: pick('MCP_SSH_HISTORY_LIMIT', file.history_limit, base.historyLimit),
      maxOutputBytes: pick('MCP_SSH_MAX_OUTPUT_BYTES', file.max_output_bytes, base.maxOutputBytes),
      shellBufferBytes: pick('MCP_SSH_SHELL_BUFFER_BYTES', file.shell_buffer_bytes, base.shellBufferBytes),
      shellSettleMs: pick('MCP_SSH_SHELL_SETTLE_MS', file.shell_settle_ms, base.shellSettleMs),
      carryContext: pick('MCP_SSH_CARRY_CONTEXT', file.carry_context, base.carryContext),
      connections
    };
  }

  private expandHome(path: string): string {
    return path.replace(/^~(?=$|\/)/, homedir());
  }

  private getEnv(key: string, defaultValue: string): string {
    return this.env[key] || defaultValue;
  }

  private getIntEnv(key: string, defaultValue: number): number {
    const value = this.env[key];
    if (value === undefined) return defaultValue;

    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  private getBoolEnv(key: string, defaultValue: boolean): boolean {
    const value = this.env[key]?.toLowerCase();
    if (value === undefined) return defaultValue;

    if (value === 'true' || value === '1' || value === 'yes' || value === 'on') {
      return true;
    }
    if (value === 'false' || value === '0' || value === 'no' || value === 'off') {
      return false;
    }
    return defaultValue;
  }

  getConfig(): ServerConfig {
    return { ...this.config };
  }

  get loadError(): Error | undefined {
    return this.fileError;
  }
}

// The entry point loads its own strict manager and reports a bad file
const configManager = new ConfigManager(process.env, true);
export default configManager.getConfig();
