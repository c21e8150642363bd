import { createLogger } from './logger.js';
import { ErrorFactory } from './errors.js';
import { CredentialResolver } from './credentials.js';
import { TransportConnection } from './transport-connection.js';
import { createSsh2Transport, TransportFactory } from './transport.js';
import type { ConnectionDescriptor, ConnectionSummary } from './types.js';

export interface ConnectionPoolOptions {
  maxConnections: number;
  /** seconds; 0 disables idle cleanup */
  connectionIdleTimeout: number;
  /** seconds; idle time after which a liveness probe runs, 0 disables probes */
  keepaliveInterval: number;
  /** seconds */
  probeTimeout: number;
  now?: () => number;
}

export type ConnectionClosedListener = (name: string, reason: string) => void;

export interface PoolSweepResult {
  removed: string[];
}

/**
 * Registry of named SSH transports. Never reconnects on its own: a dead
 * entry stays dead until the caller connects again under the same name.
 */
export class ConnectionPool {
  private connections: Map<string, TransportConnection> = new Map();
  private closedListeners: ConnectionClosedListener[] = [];
  private logger = createLogger('ConnectionPool');
  private readonly now: () => number;

  constructor(
    private readonly options: ConnectionPoolOptions,
    private readonly resolver: CredentialResolver,
    private readonly transportFactory: TransportFactory = createSsh2Transport
  ) {
    this.now = options.now ?? Date.now;
  }

  async connect(descriptor: ConnectionDescriptor): Promise<ConnectionSummary> {
    const { name } = descriptor;
    const existing = this.connections.get(name);

    if (existing) {
      if (existing.status === 'connecting') {
        this.logger.debug(`Joining in-progress connection attempt for ${name}`);
        await existing.whenReady();
        return existing.summary();
      }
      if (existing.isAlive()) {
        this.logger.info(`Reusing existing connection ${name}`);
        existing.touch();
        return existing.summary();
      }
      this.logger.info(`Replacing dead connection ${name}`);
      this.remove(name, existing, 'replaced');
    }

    if (this.connections.size >= this.options.maxConnections) {
      this.reclaimDead();
    }
    if (this.connections.size >= this.options.maxConnections) {
      throw ErrorFactory.connectionLimit(name, this.options.maxConnections);
    }

    const entry = new TransportConnection(name, {
      keepaliveInterval: this.options.keepaliveInterval,
      now: this.now
    });
    entry.onClosed((reason) => this.emitClosed(name, reason));
    this.connections.set(name, entry);

    try {
      await entry.open(() => this.resolver.resolve(descriptor), this.transportFactory);
    } catch (error) {
      if (this.connections.get(name) === entry) {
        this.connections.delete(name);
      }
      throw ErrorFactory.from(error, { connection: name });
    }

    this.logger.info(`Connection stored: ${name}`, { total: this.connections.size });
    return entry.summary();
  }

  async disconnect(name: string): Promise<void> {
    const entry = this.connections.get(name);
    if (!entry) {
      throw ErrorFactory.connectionNotFound(name);
    }

    this.remove(name, entry, 'disconnected');
    this.logger.info(`Disconnected ${name}`);
  }

  list(): ConnectionSummary[] {
    return Array.from(this.connections.values()).map(entry => entry.summary());
  }

  has(name: string): boolean {
    return this.connections.has(name);
  }

  isActive(name: string): boolean {
    return this.connections.get(name)?.isAlive() ?? false;
  }

  touch(name: string): void {
    this.connections.get(name)?.touch();
  }

  /**
   * Returns the live transport for `name`, probing it first when it has
   * been quiet for longer than the keepalive interval.
   */
  async getActiveTransport(name: string): Promise<TransportConnection> {
    const entry = this.connections.get(name);
    if (!entry) {
      throw ErrorFactory.connectionUnavailable(name, 'not connected');
    }
    if (entry.status === 'connecting') {
      await entry.whenReady();
    }
    if (!entry.isAlive()) {
      throw ErrorFactory.connectionUnavailable(name, entry.reason ?? 'transport closed');
    }

    if (entry.activeOperations === 0 && this.probeDue(entry)) {
      const alive = await entry.probe(this.options.probeTimeout * 1000);
      if (!alive) {
        entry.markDead('liveness probe failed');
        throw ErrorFactory.connectionUnavailable(name, 'liveness probe failed');
      }
    }

    return entry;
  }

  onConnectionClosed(listener: ConnectionClosedListener): void {
    this.closedListeners.push(listener);
  }

  /**
   * One cleanup pass. Drops dead entries, entries idle past the threshold,
   * and entries that fail a due liveness probe. Entries with operations in
   * flight are skipped.
   */
  async sweep(now: number = this.now()): Promise<PoolSweepResult> {
    const removed: string[] = [];
    const idleLimit = this.options.connectionIdleTimeout * 1000;

    for (const [name, entry] of Array.from(this.connections.entries())) {
      if (entry.status === 'connecting' || entry.activeOperations > 0) {
        continue;
      }

      if (!entry.isAlive()) {
        this.remove(name, entry, entry.reason ?? 'dead');
        removed.push(name);
        continue;
      }

      if (idleLimit > 0 && now - entry.lastActivity > idleLimit) {
        this.logger.info(`Closing idle connection ${name}`);
        this.remove(name, entry, 'idle timeout');
        removed.push(name);
        continue;
      }

      if (this.probeDue(entry, now)) {
        const alive = await entry.probe(this.options.probeTimeout * 1000);
        if (!alive && this.connections.get(name) === entry) {
          this.remove(name, entry, 'liveness probe failed');
          removed.push(name);
        }
      }
    }

    return { removed };
  }

  // Cleanup method for graceful shutdown
  async closeAll(): Promise<void> {
    this.logger.info('Closing all SSH connections...');
    for (const [name, entry] of Array.from(this.connections.entries())) {
      this.remove(name, entry, 'shutdown');
    }
    this.logger.info('SSH connections cleanup completed');
  }

  private probeDue(entry: TransportConnection, now: number = this.now()): boolean {
    const interval = this.options.keepaliveInterval * 1000;
    return interval > 0 && now - Math.max(entry.lastActivity, entry.lastProbeAt) > interval;
  }

  // Dead entries hold no transport, so they never count against the limit
  private reclaimDead(): void {
    for (const [name, entry] of Array.from(this.connections.entries())) {
      if (entry.status === 'dead') {
        this.remove(name, entry, 'reclaimed');
      }
    }
  }

  private remove(name: string, entry: TransportConnection, reason: string): void {
    entry.close(reason);
    if (this.connections.get(name) === entry) {
      this.connections.delete(name);
      this.logger.info(`Removed connection: ${name}`, { reason });
    }
  }

  private emitClosed(name: string, reason: string): void {
    for (const listener of this.closedListeners) {
      try {
        listener(name, reason);
      } catch (error) {
        this.logger.error(`Connection close listener failed for ${name}`, {
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }
  }
}
