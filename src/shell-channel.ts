import { createLogger } from './logger.js';
import { ErrorFactory } from './errors.js';
import { OutputBuffer } from './output-buffer.js';
import type { ConnectionPool } from './connection-pool.js';
import type { SessionManager, SessionShellHandler } from './session-manager.js';
import type { RemoteChannel } from './transport.js';
import type { ShellOptions, ShellOutput } from './types.js';

export interface ShellChannelOptions {
  shellBufferBytes: number;
  shellSettleMs: number;
}

type ShellState = 'opening' | 'open' | 'closed';

interface ShellChannel {
  sessionId: string;
  connection: string;
  term: string;
  state: ShellState;
  channel?: RemoteChannel;
  buffer: OutputBuffer;
}

const DEFAULT_TERM = 'xterm';
const DEFAULT_COLS = 80;
const DEFAULT_ROWS = 24;

const settle = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Interactive PTY shells, at most one per session. Output is kept as raw
 * text in a bounded tail buffer until someone reads it.
 */
export class ShellChannelManager implements SessionShellHandler {
  private shells: Map<string, ShellChannel> = new Map();
  private logger = createLogger('ShellChannelManager');

  constructor(
    private readonly options: ShellChannelOptions,
    private readonly pool: ConnectionPool,
    private readonly sessions: SessionManager
  ) {}

  async open(sessionId: string, shellOptions: ShellOptions = {}): Promise<{ sessionId: string; term: string }> {
    const { connection } = this.sessions.get(sessionId);
    const existing = this.shells.get(sessionId);
    if (existing && existing.state !== 'closed') {
      throw ErrorFactory.sessionBusy(sessionId, 'a shell is already open');
    }

    const term = shellOptions.term ?? DEFAULT_TERM;
    const shell: ShellChannel = {
      sessionId,
      connection,
      term,
      state: 'opening',
      buffer: new OutputBuffer(this.options.shellBufferBytes, 'tail'),
    };
    this.shells.set(sessionId, shell);

    try {
      const target = await this.pool.getActiveTransport(connection);
      const channel = await target.track(() => target.openShell(
        { term, cols: shellOptions.cols ?? DEFAULT_COLS, rows: shellOptions.rows ?? DEFAULT_ROWS },
        {
          onData: (chunk) => shell.buffer.append(chunk),
          onClose: () => {
            if (shell.state !== 'closed') {
              this.logger.info(`Shell for session ${sessionId} closed by remote`);
              shell.state = 'closed';
            }
          },
          onError: (error) => {
            this.logger.warn(`Shell error in session ${sessionId}: ${error.message}`);
          }
        }
      ));

      if (this.shells.get(sessionId) !== shell || shell.state === 'closed') {
        // session deleted or connection closed while the channel was opening
        channel.close();
        throw ErrorFactory.channelClosed(sessionId);
      }
      shell.channel = channel;
      shell.state = 'open';
    } catch (error) {
      if (this.shells.get(sessionId) === shell) {
        this.shells.delete(sessionId);
      }
      throw ErrorFactory.isSSHSessionError(error)
        ? error
        : ErrorFactory.connectionUnavailable(
          connection,
          `failed to open shell: ${error instanceof Error ? error.message : String(error)}`
        );
    }

    this.sessions.touch(sessionId);
    this.logger.info(`Opened shell for session ${sessionId}`, { connection, term });
    return { sessionId, term };
  }

  /** Writes one line, waits for output to settle, and returns what arrived. */
  async send(sessionId: string, input: string): Promise<ShellOutput> {
    const shell = this.requireOpen(sessionId);
    shell.channel?.write(`${input}\n`);
    this.sessions.touch(sessionId);
    this.pool.touch(shell.connection);

    await settle(this.options.shellSettleMs);
    return this.drain(shell);
  }

  read(sessionId: string): ShellOutput {
    this.sessions.get(sessionId);
    const shell = this.shells.get(sessionId);
    if (!shell || shell.state === 'opening') {
      throw ErrorFactory.channelClosed(sessionId);
    }
    // whatever arrived before the remote side hung up can still be read once
    if (shell.state === 'closed' && shell.buffer.byteLength === 0) {
      throw ErrorFactory.channelClosed(sessionId);
    }
    this.sessions.touch(sessionId);
    return this.drain(shell);
  }

  close(sessionId: string): void {
    this.sessions.get(sessionId);
    const shell = this.shells.get(sessionId);
    if (!shell || shell.state === 'closed') {
      throw ErrorFactory.shellNotOpen(sessionId);
    }
    this.end(shell);
    this.logger.info(`Closed shell for session ${sessionId}`);
  }

  isOpen(sessionId: string): boolean {
    return this.shells.get(sessionId)?.state === 'open';
  }

  closeIfOpen(sessionId: string): void {
    const shell = this.shells.get(sessionId);
    if (!shell) {
      return;
    }
    this.end(shell);
    this.shells.delete(sessionId);
  }

  /** Moves every shell bound to `connection` to closed. Returns their session ids. */
  closeForConnection(connection: string): string[] {
    const closed: string[] = [];
    for (const shell of this.shells.values()) {
      if (shell.connection === connection && shell.state !== 'closed') {
        this.end(shell);
        closed.push(shell.sessionId);
      }
    }
    if (closed.length > 0) {
      this.logger.info(`Closed ${closed.length} shells on ${connection}`);
    }
    return closed;
  }

  closeAll(): void {
    for (const shell of this.shells.values()) {
      this.end(shell);
    }
    this.shells.clear();
  }

  private requireOpen(sessionId: string): ShellChannel {
    this.sessions.get(sessionId);
    const shell = this.shells.get(sessionId);
    if (!shell || shell.state !== 'open') {
      throw ErrorFactory.channelClosed(sessionId);
    }
    return shell;
  }

  private end(shell: ShellChannel): void {
    const wasOpen = shell.state === 'open';
    shell.state = 'closed';
    if (wasOpen) {
      shell.channel?.close();
    }
  }

  private drain(shell: ShellChannel): ShellOutput {
    const { text, truncated } = shell.buffer.drain();
    return {
      sessionId: shell.sessionId,
      output: text,
      truncated,
      open: shell.state === 'open'
    };
  }
}
