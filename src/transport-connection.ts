import { createLogger } from './logger.js';
import { ErrorFactory } from './errors.js';
import { SerialQueue } from './serial-queue.js';
import type {
  ChannelListeners,
  PtyOptions,
  RemoteChannel,
  RemoteFileSystem,
  SSHTransport,
  TransportFactory,
  TransportOptions
} from './transport.js';
import type { ConnectionStatus, ConnectionSummary, ResolvedConnection } from './types.js';

export interface TransportConnectionOptions extends TransportOptions {
  now: () => number;
}

/**
 * Runtime state for one named connection: the transport handle, liveness,
 * activity bookkeeping, and the queue that serialises channel creation.
 */
export class TransportConnection {
  private logger = createLogger('TransportConnection');
  private transport?: SSHTransport;
  private resolved?: ResolvedConnection;
  private ready?: Promise<void>;
  private dead = false;
  private deadReason?: string;
  private inFlight = 0;
  private channelQueue = new SerialQueue();
  private closeListeners: Array<(reason: string) => void> = [];

  readonly createdAt: number;
  lastActivity: number;
  lastProbeAt = 0;

  constructor(readonly name: string, private readonly options: TransportConnectionOptions) {
    this.createdAt = options.now();
    this.lastActivity = this.createdAt;
  }

  /**
   * Resolves credentials and opens the transport. Concurrent callers share
   * the same attempt through `whenReady`.
   */
  open(resolve: () => Promise<ResolvedConnection>, factory: TransportFactory): Promise<void> {
    if (!this.ready) {
      this.ready = (async () => {
        const resolved = await resolve();
        this.resolved = resolved;
        const transport = await factory(resolved, { keepaliveInterval: this.options.keepaliveInterval });
        if (this.dead) {
          // disconnected while the handshake was in progress
          transport.end();
          throw ErrorFactory.connectionUnavailable(this.name, this.deadReason ?? 'disconnected');
        }
        this.transport = transport;
        this.touch();
        transport.onClose((error) => {
          this.markDead(error ? `transport closed: ${error.message}` : 'transport closed');
        });
      })();
    }
    return this.ready;
  }

  whenReady(): Promise<void> {
    return this.ready ?? Promise.reject(ErrorFactory.connectionUnavailable(this.name, 'not connected'));
  }

  get status(): ConnectionStatus {
    if (this.dead) return 'dead';
    if (!this.transport) return 'connecting';
    if (this.inFlight > 0) return 'active';
    const idleAfter = this.options.keepaliveInterval * 1000;
    return idleAfter > 0 && this.options.now() - this.lastActivity > idleAfter ? 'idle' : 'active';
  }

  get activeOperations(): number {
    return this.inFlight;
  }

  get reason(): string | undefined {
    return this.deadReason;
  }

  get connection(): ResolvedConnection | undefined {
    return this.resolved;
  }

  isAlive(): boolean {
    return !this.dead && this.transport !== undefined && this.transport.isOpen();
  }

  touch(): void {
    this.lastActivity = this.options.now();
  }

  onClosed(listener: (reason: string) => void): void {
    this.closeListeners.push(listener);
  }

  markDead(reason: string): void {
    if (this.dead) {
      return;
    }
    this.dead = true;
    this.deadReason = reason;
    this.logger.warn(`Connection ${this.name} marked dead: ${reason}`);
    for (const listener of this.closeListeners) {
      listener(reason);
    }
  }

  /**
   * Counts an operation as in flight for as long as `work` runs, so cleanup
   * leaves this connection alone meanwhile.
   */
  async track<T>(work: () => Promise<T>): Promise<T> {
    this.inFlight++;
    this.touch();
    try {
      return await work();
    } finally {
      this.inFlight--;
      this.touch();
    }
  }

  openExec(command: string, listeners: ChannelListeners): Promise<RemoteChannel> {
    return this.channelQueue.run(() => this.requireTransport().exec(command, listeners));
  }

  openShell(pty: PtyOptions, listeners: ChannelListeners): Promise<RemoteChannel> {
    return this.channelQueue.run(() => this.requireTransport().shell(pty, listeners));
  }

  openSftp(): Promise<RemoteFileSystem> {
    return this.channelQueue.run(() => this.requireTransport().sftp());
  }

  /**
   * Runs `true` on the remote side. Resolves false on any failure or when
   * no answer arrives within `timeoutMs`; never rejects.
   */
  async probe(timeoutMs: number): Promise<boolean> {
    this.lastProbeAt = this.options.now();
    if (!this.isAlive()) {
      return false;
    }

    return new Promise<boolean>((resolve) => {
      let settled = false;
      let channel: RemoteChannel | undefined;
      const finish = (alive: boolean): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(alive);
      };
      const timer = setTimeout(() => {
        finish(false);
        channel?.close();
      }, timeoutMs);

      this.openExec('true', {
        onData: () => undefined,
        onStderr: () => undefined,
        onClose: () => finish(true),
        onError: () => finish(false)
      }).then(
        (opened) => {
          channel = opened;
          if (settled) {
            opened.close();
          }
        },
        (error: unknown) => {
          this.logger.debug(`Probe failed on ${this.name}`, { error: error instanceof Error ? error.message : String(error) });
          finish(false);
        }
      );
    });
  }

  close(reason = 'disconnected'): void {
    const transport = this.transport;
    this.markDead(reason);
    transport?.end();
  }

  summary(): ConnectionSummary {
    return {
      name: this.name,
      host: this.resolved?.host ?? '',
      port: this.resolved?.port ?? 22,
      username: this.resolved?.username ?? '',
      authMethod: this.resolved?.auth.method ?? null,
      status: this.status,
      connectedAt: new Date(this.createdAt).toISOString(),
      lastActivity: new Date(this.lastActivity).toISOString(),
      activeOperations: this.inFlight
    };
  }

  private requireTransport(): SSHTransport {
    if (!this.transport || !this.isAlive()) {
      throw ErrorFactory.connectionUnavailable(this.name, this.deadReason ?? 'transport is not open');
    }
    return this.transport;
  }
}
