import { promises as fs } from 'fs';
import { dirname } from 'path';
import { createLogger } from './logger.js';
import { ErrorFactory, SSHSessionError } from './errors.js';
import type { ConnectionPool } from './connection-pool.js';
import type { TransportConnection } from './transport-connection.js';
import type { RemoteDirEntry, RemoteFileSystem, RemoteStats } from './transport.js';
import type { FileTransferRecord, RemoteFileEntry, RemoteFileType, TransferDirection } from './types.js';

export interface FileTransferOptions {
  /** seconds */
  transferTimeout: number;
  now?: () => number;
}

// Local fs failures carry a string errno code; SFTP status codes are numeric
const isLocalError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && typeof error.code === 'string';

const fileType = (stats: RemoteStats): RemoteFileType => {
  if (stats.isDirectory) return 'directory';
  if (stats.isSymbolicLink) return 'symlink';
  if (stats.isFile) return 'file';
  return 'other';
};

const toEntry = (entry: RemoteDirEntry, detailed: boolean): RemoteFileEntry => {
  if (!detailed) {
    return { name: entry.filename };
  }
  return {
    name: entry.filename,
    type: fileType(entry.stats),
    size: entry.stats.size,
    permissions: (entry.stats.mode & 0o777).toString(8),
    modified: new Date(entry.stats.mtime * 1000).toISOString(),
    longname: entry.longname
  };
};

export class FileTransfer {
  private logger = createLogger('FileTransfer');
  private readonly now: () => number;

  constructor(private readonly options: FileTransferOptions, private readonly pool: ConnectionPool) {
    this.now = options.now ?? Date.now;
  }

  async upload(connection: string, localPath: string, remotePath: string): Promise<FileTransferRecord> {
    const target = await this.pool.getActiveTransport(connection);

    let size: number;
    try {
      const stats = await fs.stat(localPath);
      if (!stats.isFile()) {
        throw new Error('not a regular file');
      }
      size = stats.size;
    } catch (error) {
      throw ErrorFactory.localIO('read', localPath, error);
    }

    return this.transfer(target, 'upload', localPath, remotePath, async (sftp) => {
      try {
        await sftp.put(localPath, remotePath);
      } catch (error) {
        throw isLocalError(error)
          ? ErrorFactory.localIO('read', localPath, error)
          : ErrorFactory.remoteIO(connection, 'write', remotePath, error);
      }
      return size;
    });
  }

  async download(connection: string, remotePath: string, localPath: string): Promise<FileTransferRecord> {
    const target = await this.pool.getActiveTransport(connection);

    try {
      const parent = await fs.stat(dirname(localPath));
      if (!parent.isDirectory()) {
        throw new Error(`${dirname(localPath)} is not a directory`);
      }
    } catch (error) {
      throw ErrorFactory.localIO('write', localPath, error);
    }

    return this.transfer(target, 'download', localPath, remotePath, async (sftp) => {
      try {
        await sftp.stat(remotePath);
        await sftp.get(remotePath, localPath);
      } catch (error) {
        throw isLocalError(error)
          ? ErrorFactory.localIO('write', localPath, error)
          : ErrorFactory.remoteIO(connection, 'read', remotePath, error);
      }
      const written = await fs.stat(localPath);
      return written.size;
    });
  }

  /** Directory listing sorted by name, without `.` and `..`. */
  async list(connection: string, path = '.', detailed = false): Promise<RemoteFileEntry[]> {
    const target = await this.pool.getActiveTransport(connection);

    return target.track(() => this.withSftp(target, 'list', path, async (sftp) => {
      let entries: RemoteDirEntry[];
      try {
        entries = await sftp.readdir(path);
      } catch (error) {
        throw ErrorFactory.remoteIO(connection, 'list', path, error);
      }
      return entries
        .filter(entry => entry.filename !== '.' && entry.filename !== '..')
        .sort((a, b) => (a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0))
        .map(entry => toEntry(entry, detailed));
    }));
  }

  private async transfer(
    target: TransportConnection,
    direction: TransferDirection,
    localPath: string,
    remotePath: string,
    work: (sftp: RemoteFileSystem) => Promise<number>
  ): Promise<FileTransferRecord> {
    const started = this.now();
    const path = direction === 'upload' ? remotePath : localPath;
    this.logger.info(`Starting ${direction} on ${target.name}`, { localPath, remotePath });

    try {
      const bytes = await target.track(() => this.withSftp(target, direction, path, work));
      const record: FileTransferRecord = {
        connection: target.name,
        localPath,
        remotePath,
        direction,
        bytes,
        success: true,
        durationMs: this.now() - started
      };
      this.logger.info(`Completed ${direction} on ${target.name}`, { bytes, durationMs: record.durationMs });
      return record;
    } catch (error) {
      this.logger.error(`Failed ${direction} on ${target.name}`, {
        localPath,
        remotePath,
        error: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
  }

  /** Opens an SFTP subsystem, runs `work` under the transfer deadline, and always ends it. */
  private async withSftp<T>(
    target: TransportConnection,
    operation: string,
    path: string,
    work: (sftp: RemoteFileSystem) => Promise<T>
  ): Promise<T> {
    let sftp: RemoteFileSystem;
    try {
      sftp = await target.openSftp();
    } catch (error) {
      if (error instanceof SSHSessionError) {
        throw error;
      }
      throw ErrorFactory.remoteIO(target.name, 'open sftp', path, error);
    }

    const timeout = this.options.transferTimeout;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(ErrorFactory.operationTimeout(`SFTP ${operation}`, timeout, { connection: target.name, path }));
      }, timeout * 1000);
    });

    try {
      return await Promise.race([work(sftp), deadline]);
    } finally {
      clearTimeout(timer);
      sftp.end();
    }
  }
}
