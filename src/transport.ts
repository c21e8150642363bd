import { Client, ClientChannel, ConnectConfig, SFTPWrapper, Stats } from 'ssh2';
import { createLogger } from './logger.js';
import { ErrorFactory } from './errors.js';
import type { ResolvedConnection } from './types.js';

/**
 * Callbacks for one channel. `onClose` fires exactly once, after the last
 * data callback.
 */
export interface ChannelListeners {
  onData(chunk: Buffer): void;
  onStderr?(chunk: Buffer): void;
  onExit?(code: number | null, signal: string | null): void;
  onClose(): void;
  onError?(error: Error): void;
}

export interface RemoteChannel {
  write(data: string): void;
  /** Kills the remote process where the server allows it, then closes the channel. */
  terminate(): void;
  close(): void;
}

export interface PtyOptions {
  term: string;
  cols: number;
  rows: number;
}

export interface RemoteStats {
  size: number;
  mode: number;
  mtime: number;
  isDirectory: boolean;
  isSymbolicLink: boolean;
  isFile: boolean;
}

export interface RemoteDirEntry {
  filename: string;
  longname: string;
  stats: RemoteStats;
}

export interface RemoteFileSystem {
  put(localPath: string, remotePath: string): Promise<void>;
  get(remotePath: string, localPath: string): Promise<void>;
  stat(remotePath: string): Promise<RemoteStats>;
  readdir(remotePath: string): Promise<RemoteDirEntry[]>;
  end(): void;
}

/**
 * One authenticated SSH transport. Channels opened from it share its
 * lifetime: ending the transport closes them all.
 */
export interface SSHTransport {
  exec(command: string, listeners: ChannelListeners): Promise<RemoteChannel>;
  shell(pty: PtyOptions, listeners: ChannelListeners): Promise<RemoteChannel>;
  sftp(): Promise<RemoteFileSystem>;
  isOpen(): boolean;
  onClose(listener: (error?: Error) => void): void;
  end(): void;
}

export interface TransportOptions {
  /** seconds; 0 disables protocol keepalives */
  keepaliveInterval: number;
}

export type TransportFactory = (connection: ResolvedConnection, options: TransportOptions) => Promise<SSHTransport>;

const toRemoteStats = (stats: Stats): RemoteStats => ({
  size: stats.size,
  mode: stats.mode,
  mtime: stats.mtime,
  isDirectory: stats.isDirectory(),
  isSymbolicLink: stats.isSymbolicLink(),
  isFile: stats.isFile()
});

class Ssh2Channel implements RemoteChannel {
  constructor(private readonly stream: ClientChannel) {}

  write(data: string): void {
    this.stream.write(data);
  }

  terminate(): void {
    this.stream.signal('KILL');
    this.stream.close();
  }

  close(): void {
    this.stream.close();
  }
}

class Ssh2FileSystem implements RemoteFileSystem {
  constructor(private readonly sftp: SFTPWrapper) {}

  put(localPath: string, remotePath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sftp.fastPut(localPath, remotePath, (error) => (error ? reject(error) : resolve()));
    });
  }

  get(remotePath: string, localPath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sftp.fastGet(remotePath, localPath, (error) => (error ? reject(error) : resolve()));
    });
  }

  stat(remotePath: string): Promise<RemoteStats> {
    return new Promise((resolve, reject) => {
      this.sftp.stat(remotePath, (error, stats) => (error ? reject(error) : resolve(toRemoteStats(stats))));
    });
  }

  readdir(remotePath: string): Promise<RemoteDirEntry[]> {
    return new Promise((resolve, reject) => {
      this.sftp.readdir(remotePath, (error, list) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(list.map(entry => ({
          filename: entry.filename,
          longname: entry.longname,
          stats: toRemoteStats(entry.attrs)
        })));
      });
    });
  }

  end(): void {
    this.sftp.end();
  }
}

const attach = (stream: ClientChannel, listeners: ChannelListeners): void => {
  stream.on('data', (chunk: Buffer) => listeners.onData(chunk));
  stream.stderr.on('data', (chunk: Buffer) => {
    if (listeners.onStderr) {
      listeners.onStderr(chunk);
    } else {
      listeners.onData(chunk);
    }
  });
  stream.on('exit', (code: number | null, signal?: string) => {
    listeners.onExit?.(code ?? null, signal ?? null);
  });
  stream.on('error', (error: Error) => listeners.onError?.(error));
  stream.once('close', () => listeners.onClose());
};

/**
 * SSHTransport backed by an ssh2 Client.
 */
export class Ssh2Transport implements SSHTransport {
  private open = true;
  private closeListeners: Array<(error?: Error) => void> = [];
  private lastError?: Error;

  private constructor(private readonly client: Client, private readonly name: string) {
    client.on('error', (error: Error) => {
      this.lastError = error;
    });
    client.on('close', () => {
      if (!this.open) {
        return;
      }
      this.open = false;
      for (const listener of this.closeListeners) {
        listener(this.lastError);
      }
    });
  }

  /**
   * Opens and authenticates a transport. Resolves once the server accepted
   * the credentials; rejects with AuthenticationError or ConnectError.
   */
  static connect(connection: ResolvedConnection, options: TransportOptions): Promise<Ssh2Transport> {
    const logger = createLogger('Ssh2Transport');
    const { name, host, port, username, auth } = connection;

    const connectConfig: ConnectConfig = {
      host,
      port,
      username,
      readyTimeout: connection.timeout * 1000,
      keepaliveInterval: options.keepaliveInterval * 1000,
      keepaliveCountMax: 3
    };

    // Add authentication methods
    if (auth.method === 'password') {
      connectConfig.password = auth.password;
    } else if (auth.method === 'privateKey') {
      connectConfig.privateKey = auth.privateKey;
      if (auth.passphrase) {
        connectConfig.passphrase = auth.passphrase;
      }
    } else {
      connectConfig.agent = auth.agent;
    }

    return new Promise((resolve, reject) => {
      const client = new Client();
      let settled = false;

      // readyTimeout only covers the handshake once the socket is up
      const deadline = setTimeout(() => {
        if (settled) return;
        settled = true;
        logger.error(`SSH connection timeout to ${host}:${port}`);
        client.destroy();
        reject(ErrorFactory.connectTimeout(name, host, port, connection.timeout));
      }, connection.timeout * 1000);

      client.once('ready', () => {
        if (settled) {
          client.end();
          return;
        }
        settled = true;
        clearTimeout(deadline);
        logger.info(`SSH connection established to ${host}:${port}`, { connection: name });
        resolve(new Ssh2Transport(client, name));
      });

      client.on('error', (error: Error & { level?: string }) => {
        if (settled) return;
        settled = true;
        clearTimeout(deadline);
        logger.error(`SSH connection error to ${host}:${port}: ${error.message}`, { connection: name, level: error.level });
        client.destroy();
        if (error.level === 'client-authentication') {
          reject(ErrorFactory.authenticationFailed(name, host, username, error));
        } else if (error.level === 'client-timeout') {
          reject(ErrorFactory.connectTimeout(name, host, port, connection.timeout));
        } else {
          reject(ErrorFactory.connectFailed(name, host, port, error));
        }
      });

      client.connect(connectConfig);
    });
  }

  exec(command: string, listeners: ChannelListeners): Promise<RemoteChannel> {
    return new Promise((resolve, reject) => {
      this.client.exec(command, (error, stream) => {
        if (error) {
          reject(error);
          return;
        }
        attach(stream, listeners);
        resolve(new Ssh2Channel(stream));
      });
    });
  }

  shell(pty: PtyOptions, listeners: ChannelListeners): Promise<RemoteChannel> {
    return new Promise((resolve, reject) => {
      this.client.shell({ term: pty.term, cols: pty.cols, rows: pty.rows }, (error, stream) => {
        if (error) {
          reject(error);
          return;
        }
        attach(stream, listeners);
        resolve(new Ssh2Channel(stream));
      });
    });
  }

  sftp(): Promise<RemoteFileSystem> {
    return new Promise((resolve, reject) => {
      this.client.sftp((error, sftp) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(new Ssh2FileSystem(sftp));
      });
    });
  }

  isOpen(): boolean {
    return this.open;
  }

  onClose(listener: (error?: Error) => void): void {
    this.closeListeners.push(listener);
  }

  end(): void {
    if (this.open) {
      createLogger('Ssh2Transport').debug(`Ending transport ${this.name}`);
    }
    this.client.end();
  }
}

export const createSsh2Transport: TransportFactory = (connection, options) =>
  Ssh2Transport.connect(connection, options);
