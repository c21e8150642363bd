import { v4 as uuidv4 } from 'uuid';
import { createLogger } from './logger.js';
import { ErrorFactory } from './errors.js';
import { OutputBuffer } from './output-buffer.js';
import { contextPrefix, deriveContextChange } from './session-context.js';
import type { ConnectionPool } from './connection-pool.js';
import type { SessionManager } from './session-manager.js';
import type { TransportConnection } from './transport-connection.js';
import type { RemoteChannel } from './transport.js';
import type { CommandResult, ExecuteOptions, OutputStream } from './types.js';

export interface CommandExecutorOptions {
  /** seconds */
  commandTimeout: number;
  maxOutputBytes: number;
  carryContext: boolean;
  now?: () => number;
}

interface RunRequest {
  connection: string;
  sessionId?: string;
  /** what the caller asked for, as stored in results */
  command: string;
  /** what is sent to the remote side */
  remoteCommand: string;
  timeout: number;
  onOutput?: ExecuteOptions['onOutput'];
}

export class CommandExecutor {
  private logger = createLogger('CommandExecutor');
  private readonly now: () => number;

  constructor(
    private readonly options: CommandExecutorOptions,
    private readonly pool: ConnectionPool,
    private readonly sessions: SessionManager
  ) {
    this.now = options.now ?? Date.now;
  }

  /** One-shot execution on a named connection. Nothing is recorded. */
  async execute(connection: string, command: string, options: ExecuteOptions = {}): Promise<CommandResult> {
    const target = await this.pool.getActiveTransport(connection);
    return this.run(target, {
      connection,
      command,
      remoteCommand: command,
      timeout: options.timeout ?? this.options.commandTimeout,
      onOutput: options.onOutput
    });
  }

  /**
   * Runs a command in a session: the result goes into its history and a
   * successful `cd`/`export`/`unset` updates its context.
   */
  async executeInSession(sessionId: string, command: string, options: ExecuteOptions = {}): Promise<CommandResult> {
    this.sessions.acquire(sessionId);
    try {
      const connection = this.sessions.connectionOf(sessionId);
      const target = await this.pool.getActiveTransport(connection);
      const context = this.sessions.context(sessionId);
      const shellContext = { workingDirectory: context.workingDirectory, environment: context.environment };

      const result = await this.run(target, {
        connection,
        sessionId,
        command,
        remoteCommand: this.options.carryContext ? contextPrefix(shellContext) + command : command,
        timeout: options.timeout ?? this.options.commandTimeout,
        onOutput: options.onOutput
      });

      if (!this.sessions.has(sessionId)) {
        // deleted while the command ran
        return result;
      }

      this.sessions.record(sessionId, result);
      if (result.exitCode === 0 && !result.timedOut) {
        const change = deriveContextChange(command, shellContext);
        if (change.workingDirectory !== undefined) {
          this.sessions.setWorkingDirectory(sessionId, change.workingDirectory);
        }
        for (const [name, value] of change.set) {
          this.sessions.setEnvironment(sessionId, name, value);
        }
        for (const name of change.unset) {
          this.sessions.unsetEnvironment(sessionId, name);
        }
      }
      return result;
    } finally {
      this.sessions.release(sessionId);
    }
  }

  private run(target: TransportConnection, request: RunRequest): Promise<CommandResult> {
    const { connection, sessionId, command, timeout } = request;
    this.logger.info(`Executing command on ${connection}`, { sessionId, timeout });
    // command text stays at debug level
    this.logger.debug('Command text', { connection, command });

    return target.track(() => new Promise<CommandResult>((resolve, reject) => {
      const stdout = new OutputBuffer(this.options.maxOutputBytes, 'head');
      const stderr = new OutputBuffer(this.options.maxOutputBytes, 'head');
      const started = this.now();
      let sequence = 0;
      let exitCode: number | null = null;
      let signal: string | null = null;
      let timedOut = false;
      let settled = false;
      let channel: RemoteChannel | undefined;

      const emit = (stream: OutputStream, chunk: Buffer): void => {
        if (settled) return;
        (stream === 'stdout' ? stdout : stderr).append(chunk);
        if (request.onOutput) {
          try {
            request.onOutput({ stream, data: chunk.toString('utf8'), sequence: ++sequence });
          } catch (error) {
            this.logger.warn('Output consumer failed', { error: error instanceof Error ? error.message : String(error) });
          }
        }
      };

      const finish = (): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);

        const result: CommandResult = {
          id: uuidv4(),
          connection,
          ...(sessionId === undefined ? {} : { sessionId }),
          command,
          stdout: stdout.toString(),
          stderr: stderr.toString(),
          exitCode: timedOut || exitCode === null ? -1 : exitCode,
          signal,
          durationMs: this.now() - started,
          timestamp: new Date(started).toISOString(),
          timedOut,
          truncated: stdout.truncated || stderr.truncated
        };
        if (timedOut) {
          result.error = ErrorFactory.commandTimeout(command, timeout, { connection, sessionId }).toPayload();
          this.logger.warn(`Command timed out after ${timeout}s on ${connection}`, { command, sessionId });
        } else {
          this.logger.debug(`Command completed on ${connection}`, { exitCode: result.exitCode, durationMs: result.durationMs });
        }
        resolve(result);
      };

      const timer = setTimeout(() => {
        timedOut = true;
        channel?.terminate();
        finish();
      }, timeout * 1000);

      target.openExec(request.remoteCommand, {
        onData: (chunk) => emit('stdout', chunk),
        onStderr: (chunk) => emit('stderr', chunk),
        onExit: (code, exitSignal) => {
          exitCode = code;
          signal = exitSignal;
        },
        onClose: () => finish(),
        onError: (error) => {
          this.logger.warn(`Channel error on ${connection}: ${error.message}`, { sessionId });
        }
      }).then(
        (opened) => {
          channel = opened;
          if (settled) {
            opened.terminate();
          }
        },
        (error: unknown) => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          reject(
            ErrorFactory.isSSHSessionError(error)
              ? error
              : ErrorFactory.connectionUnavailable(
                connection,
                `failed to open exec channel: ${error instanceof Error ? error.message : String(error)}`
              )
          );
        }
      );
    }));
  }
}
