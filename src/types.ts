/**
 * Type definitions for the SSH session server
 */

import type { ErrorPayload } from './errors.js';

// Connection Types
export type AuthMethod = 'password' | 'privateKey' | 'agent';

export type ConnectionStatus = 'connecting' | 'active' | 'idle' | 'dead';

/**
 * What a caller supplies to open a connection. Everything except `name` may
 * come from a configured profile instead.
 */
export interface ConnectionDescriptor {
  name: string;
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  privateKeyPath?: string;
  passphrase?: string;
  useAgent?: boolean;
  /** seconds */
  timeout?: number;
}

export interface ResolvedAuth {
  method: AuthMethod;
  password?: string;
  privateKey?: Buffer;
  privateKeyPath?: string;
  passphrase?: string;
  agent?: string;
}

export interface ResolvedConnection {
  name: string;
  host: string;
  port: number;
  username: string;
  auth: ResolvedAuth;
  timeout: number;
}

export interface ConnectionSummary {
  name: string;
  host: string;
  port: number;
  username: string;
  authMethod: AuthMethod | null;
  status: ConnectionStatus;
  connectedAt: string;
  lastActivity: string;
  activeOperations: number;
}

// Command Types
export interface CommandResult {
  id: string;
  connection: string;
  sessionId?: string;
  command: string;
  stdout: string;
  stderr: string;
  exitCode: number;
  signal: string | null;
  durationMs: number;
  timestamp: string;
  timedOut: boolean;
  truncated: boolean;
  error?: ErrorPayload;
}

export type OutputStream = 'stdout' | 'stderr';

export interface OutputChunk {
  stream: OutputStream;
  data: string;
  sequence: number;
}

export interface ExecuteOptions {
  /** seconds */
  timeout?: number;
  onOutput?: (chunk: OutputChunk) => void;
}

// Session Types
export interface HistoryEntry extends CommandResult {
  sequence: number;
}

export interface SessionContext {
  sessionId: string;
  name: string;
  connection: string;
  workingDirectory: string | null;
  environment: Record<string, string>;
  historySize: number;
  lastActivity: string;
  shellOpen: boolean;
}

export interface SessionSummary {
  id: string;
  name: string;
  connection: string;
  createdAt: string;
  lastActivity: string;
  historySize: number;
  workingDirectory: string | null;
  busy: boolean;
  shellOpen: boolean;
}

// Shell Types
export interface ShellOptions {
  term?: string;
  cols?: number;
  rows?: number;
}

export interface ShellOutput {
  sessionId: string;
  output: string;
  truncated: boolean;
  open: boolean;
}

// File Transfer Types
export type TransferDirection = 'upload' | 'download';

export interface FileTransferRecord {
  connection: string;
  localPath: string;
  remotePath: string;
  direction: TransferDirection;
  bytes: number;
  success: boolean;
  durationMs: number;
}

export type RemoteFileType = 'file' | 'directory' | 'symlink' | 'other';

export interface RemoteFileEntry {
  name: string;
  type?: RemoteFileType;
  size?: number;
  permissions?: string;
  modified?: string;
  longname?: string;
}

// MCP Tool Types
export interface MCPTool {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}
