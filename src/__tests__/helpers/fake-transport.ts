import { promises as fs } from 'fs';
import type {
  ChannelListeners,
  PtyOptions,
  RemoteChannel,
  RemoteDirEntry,
  RemoteFileSystem,
  RemoteStats,
  SSHTransport,
  TransportFactory
} from '../../transport.js';
import type { ResolvedConnection } from '../../types.js';

export class FakeChannel implements RemoteChannel {
  readonly written: string[] = [];
  closed = false;
  terminated = false;
  onWrite?: (data: string) => void;

  constructor(readonly command: string, private readonly listeners: ChannelListeners) {}

  stdout(text: string): void {
    this.listeners.onData(Buffer.from(text, 'utf8'));
  }

  stderr(text: string): void {
    if (this.listeners.onStderr) {
      this.listeners.onStderr(Buffer.from(text, 'utf8'));
    } else {
      this.listeners.onData(Buffer.from(text, 'utf8'));
    }
  }

  exit(code: number | null, signal: string | null = null): void {
    this.listeners.onExit?.(code, signal);
    this.close();
  }

  write(data: string): void {
    this.written.push(data);
    this.onWrite?.(data);
  }

  terminate(): void {
    this.terminated = true;
    this.close();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.listeners.onClose();
  }
}

export type ExecHandler = (channel: FakeChannel) => void;

/**
 * Runs the last `&&`/`;` segment of a command: `echo X` prints X, `sleep`
 * never finishes, `false` exits 1, `fail` writes to stderr and exits 2,
 * anything else exits 0 silently.
 */
export const defaultExec: ExecHandler = (channel) => {
  const last = channel.command.split(/&&|;/).pop()?.trim() ?? '';
  if (last.startsWith('echo ')) {
    channel.stdout(`${last.slice(5)}\n`);
    channel.exit(0);
  } else if (last.startsWith('sleep')) {
    // hangs until terminated
  } else if (last === 'false') {
    channel.exit(1);
  } else if (last === 'fail') {
    channel.stderr('boom\n');
    channel.exit(2);
  } else {
    channel.exit(0);
  }
};

const sftpError = (code: number, message: string): Error => Object.assign(new Error(message), { code });

const fileStats = (size: number, directory = false): RemoteStats => ({
  size,
  mode: directory ? 0o40755 : 0o100644,
  mtime: 1700000000,
  isDirectory: directory,
  isSymbolicLink: false,
  isFile: !directory
});

export class FakeFileSystem implements RemoteFileSystem {
  ended = false;

  constructor(private readonly transport: FakeTransport) {}

  async put(localPath: string, remotePath: string): Promise<void> {
    if (remotePath.startsWith('/readonly/')) {
      throw sftpError(3, 'Permission denied');
    }
    this.transport.files.set(remotePath, await fs.readFile(localPath));
  }

  async get(remotePath: string, localPath: string): Promise<void> {
    const data = this.transport.files.get(remotePath);
    if (!data) {
      throw sftpError(2, 'No such file');
    }
    await fs.writeFile(localPath, data);
  }

  async stat(remotePath: string): Promise<RemoteStats> {
    const data = this.transport.files.get(remotePath);
    if (!data) {
      throw sftpError(2, 'No such file');
    }
    return fileStats(data.length);
  }

  async readdir(remotePath: string): Promise<RemoteDirEntry[]> {
    const entries = this.transport.directories.get(remotePath);
    if (!entries) {
      throw sftpError(2, 'No such file');
    }
    return entries;
  }

  end(): void {
    this.ended = true;
  }
}

export class FakeTransport implements SSHTransport {
  readonly execChannels: FakeChannel[] = [];
  readonly shellChannels: FakeChannel[] = [];
  readonly files: Map<string, Buffer> = new Map();
  readonly directories: Map<string, RemoteDirEntry[]> = new Map();
  execHandler: ExecHandler = defaultExec;
  shellEcho = true;
  ended = false;
  private open = true;
  private closeListeners: Array<(error?: Error) => void> = [];

  constructor(readonly connection: ResolvedConnection) {}

  get commands(): string[] {
    return this.execChannels.map(channel => channel.command);
  }

  async exec(command: string, listeners: ChannelListeners): Promise<RemoteChannel> {
    if (!this.open) {
      throw new Error('Not connected');
    }
    const channel = new FakeChannel(command, listeners);
    this.execChannels.push(channel);
    setImmediate(() => this.execHandler(channel));
    return channel;
  }

  async shell(pty: PtyOptions, listeners: ChannelListeners): Promise<RemoteChannel> {
    if (!this.open) {
      throw new Error('Not connected');
    }
    const channel = new FakeChannel(`shell:${pty.term}`, listeners);
    if (this.shellEcho) {
      channel.onWrite = (data) => channel.stdout(data);
    }
    this.shellChannels.push(channel);
    return channel;
  }

  async sftp(): Promise<RemoteFileSystem> {
    if (!this.open) {
      throw new Error('Not connected');
    }
    return new FakeFileSystem(this);
  }

  isOpen(): boolean {
    return this.open;
  }

  onClose(listener: (error?: Error) => void): void {
    this.closeListeners.push(listener);
  }

  /** Simulates the network dropping. */
  drop(error?: Error): void {
    if (!this.open) return;
    this.open = false;
    for (const listener of this.closeListeners) {
      listener(error);
    }
  }

  end(): void {
    this.ended = true;
    for (const channel of [...this.execChannels, ...this.shellChannels]) {
      channel.close();
    }
    this.drop();
  }
}

/** Hands out FakeTransports and remembers every attempt. */
export class FakeTransportFactory {
  readonly transports: FakeTransport[] = [];
  readonly attempts: ResolvedConnection[] = [];
  failWith?: Error;
  delayMs = 0;
  configure?: (transport: FakeTransport) => void;

  readonly create: TransportFactory = async (connection) => {
    this.attempts.push(connection);
    if (this.delayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.delayMs));
    }
    if (this.failWith) {
      throw this.failWith;
    }
    const transport = new FakeTransport(connection);
    this.configure?.(transport);
    this.transports.push(transport);
    return transport;
  };

  last(): FakeTransport {
    const transport = this.transports[this.transports.length - 1];
    if (!transport) {
      throw new Error('no transport was created');
    }
    return transport;
  }
}
