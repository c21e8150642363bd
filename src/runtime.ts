import { createLogger } from './logger.js';
import { CredentialResolver } from './credentials.js';
import { ConnectionPool } from './connection-pool.js';
import { SessionManager } from './session-manager.js';
import { CommandExecutor } from './command-executor.js';
import { ShellChannelManager } from './shell-channel.js';
import { FileTransfer } from './file-transfer.js';
import { createSsh2Transport, TransportFactory } from './transport.js';
import type { ConnectionProfile, ServerConfig } from './config.js';

export type RuntimeOptions = Pick<
  ServerConfig,
  | 'maxConnections'
  | 'maxSessions'
  | 'connectionTimeout'
  | 'commandTimeout'
  | 'transferTimeout'
  | 'keepaliveInterval'
  | 'probeTimeout'
  | 'connectionIdleTimeout'
  | 'sessionIdleTimeout'
  | 'cleanupInterval'
  | 'historyLimit'
  | 'maxOutputBytes'
  | 'shellBufferBytes'
  | 'shellSettleMs'
  | 'carryContext'
> & {
  profiles?: Record<string, ConnectionProfile>;
  env?: NodeJS.ProcessEnv;
  now?: () => number;
};

export interface SweepResult {
  sessions: string[];
  connections: string[];
}

/**
 * Owns the connection pool, the session table and everything operating on
 * them. One instance per server; tests build their own.
 */
export class SSHRuntime {
  readonly credentials: CredentialResolver;
  readonly pool: ConnectionPool;
  readonly sessions: SessionManager;
  readonly executor: CommandExecutor;
  readonly shells: ShellChannelManager;
  readonly files: FileTransfer;

  private logger = createLogger('SSHRuntime');
  private cleanupTimer?: NodeJS.Timeout;
  private sweeping?: Promise<SweepResult>;
  private readonly now: () => number;

  constructor(private readonly options: RuntimeOptions, transportFactory: TransportFactory = createSsh2Transport) {
    this.now = options.now ?? Date.now;

    this.credentials = new CredentialResolver({
      profiles: options.profiles,
      defaultTimeout: options.connectionTimeout,
      env: options.env
    });
    this.pool = new ConnectionPool(
      {
        maxConnections: options.maxConnections,
        connectionIdleTimeout: options.connectionIdleTimeout,
        keepaliveInterval: options.keepaliveInterval,
        probeTimeout: options.probeTimeout,
        now: this.now
      },
      this.credentials,
      transportFactory
    );
    this.sessions = new SessionManager(
      {
        maxSessions: options.maxSessions,
        historyLimit: options.historyLimit,
        sessionIdleTimeout: options.sessionIdleTimeout,
        now: this.now
      },
      this.pool
    );
    this.executor = new CommandExecutor(
      {
        commandTimeout: options.commandTimeout,
        maxOutputBytes: options.maxOutputBytes,
        carryContext: options.carryContext,
        now: this.now
      },
      this.pool,
      this.sessions
    );
    this.shells = new ShellChannelManager(
      { shellBufferBytes: options.shellBufferBytes, shellSettleMs: options.shellSettleMs },
      this.pool,
      this.sessions
    );
    this.files = new FileTransfer({ transferTimeout: options.transferTimeout, now: this.now }, this.pool);

    this.sessions.setShellHandler(this.shells);
    this.pool.onConnectionClosed((name, reason) => {
      const orphaned = this.sessions.orphanedBy(name);
      this.shells.closeForConnection(name);
      this.logger.info(`Connection ${name} closed: ${reason}`, { orphanedSessions: orphaned.length });
    });
  }

  /** Schedules cleanup sweeps. The timer does not keep the process alive. */
  start(): void {
    if (this.cleanupTimer || this.options.cleanupInterval <= 0) {
      return;
    }
    this.cleanupTimer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        this.logger.error('Cleanup sweep failed', { error: error instanceof Error ? error.message : String(error) });
      });
    }, this.options.cleanupInterval * 1000);
    this.cleanupTimer.unref();
    this.logger.info(`Cleanup scheduled every ${this.options.cleanupInterval}s`);
  }

  /** Idle sessions first, then connections. Overlapping calls share one pass. */
  sweep(now: number = this.now()): Promise<SweepResult> {
    if (!this.sweeping) {
      this.sweeping = (async () => {
        try {
          const sessions = this.sessions.sweep(now);
          const connections = await this.pool.sweep(now);
          return { sessions: sessions.removed, connections: connections.removed };
        } finally {
          this.sweeping = undefined;
        }
      })();
    }
    return this.sweeping;
  }

  async shutdown(): Promise<void> {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
    this.shells.closeAll();
    this.sessions.clear();
    await this.pool.closeAll();
    this.logger.info('Runtime shut down');
  }
}
