// Error codes
export enum ErrorCode {
  // Connection errors
  AUTHENTICATION_FAILED = 'AUTHENTICATION_FAILED',
  CONNECT_FAILED = 'CONNECT_FAILED',
  CONNECTION_UNAVAILABLE = 'CONNECTION_UNAVAILABLE',
  NOT_FOUND = 'NOT_FOUND',
  RESOURCE_EXHAUSTED = 'RESOURCE_EXHAUSTED',

  // Session and channel errors
  SESSION_BUSY = 'SESSION_BUSY',
  TIMEOUT = 'TIMEOUT',
  CHANNEL_CLOSED = 'CHANNEL_CLOSED',

  // File transfer errors
  LOCAL_IO = 'LOCAL_IO',
  REMOTE_IO = 'REMOTE_IO',

  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',

  // MCP protocol errors
  INVALID_PARAMS = 'INVALID_PARAMS',
  METHOD_NOT_FOUND = 'METHOD_NOT_FOUND',

  // General errors
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

// Kind names reported to callers alongside the code
export const ErrorKinds: Record<ErrorCode, string> = {
  [ErrorCode.AUTHENTICATION_FAILED]: 'AuthenticationError',
  [ErrorCode.CONNECT_FAILED]: 'ConnectError',
  [ErrorCode.CONNECTION_UNAVAILABLE]: 'ConnectionUnavailableError',
  [ErrorCode.NOT_FOUND]: 'NotFoundError',
  [ErrorCode.RESOURCE_EXHAUSTED]: 'ResourceExhaustedError',
  [ErrorCode.SESSION_BUSY]: 'SessionBusyError',
  [ErrorCode.TIMEOUT]: 'TimeoutError',
  [ErrorCode.CHANNEL_CLOSED]: 'ChannelClosedError',
  [ErrorCode.LOCAL_IO]: 'IOError',
  [ErrorCode.REMOTE_IO]: 'RemoteIOError',
  [ErrorCode.INVALID_CONFIG]: 'ConfigError',
  [ErrorCode.INVALID_PARAMS]: 'InvalidParamsError',
  [ErrorCode.METHOD_NOT_FOUND]: 'MethodNotFoundError',
  [ErrorCode.INTERNAL_ERROR]: 'InternalError'
};

// Error messages
export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCode.AUTHENTICATION_FAILED]: 'SSH authentication failed',
  [ErrorCode.CONNECT_FAILED]: 'Failed to establish SSH connection',
  [ErrorCode.CONNECTION_UNAVAILABLE]: 'SSH connection is not available',
  [ErrorCode.NOT_FOUND]: 'Resource not found',
  [ErrorCode.RESOURCE_EXHAUSTED]: 'Resource limit reached',
  [ErrorCode.SESSION_BUSY]: 'Session is busy',
  [ErrorCode.TIMEOUT]: 'Operation timed out',
  [ErrorCode.CHANNEL_CLOSED]: 'Channel is closed',
  [ErrorCode.LOCAL_IO]: 'Local file operation failed',
  [ErrorCode.REMOTE_IO]: 'Remote file operation failed',
  [ErrorCode.INVALID_CONFIG]: 'Invalid configuration',
  [ErrorCode.INVALID_PARAMS]: 'Invalid MCP parameters',
  [ErrorCode.METHOD_NOT_FOUND]: 'MCP method not found',
  [ErrorCode.INTERNAL_ERROR]: 'Internal server error'
};

const RETRYABLE = new Set<ErrorCode>([
  ErrorCode.CONNECT_FAILED,
  ErrorCode.SESSION_BUSY,
  ErrorCode.TIMEOUT,
  ErrorCode.RESOURCE_EXHAUSTED
]);

export type ErrorDetails = Record<string, unknown>;

export interface ErrorPayload {
  code: ErrorCode;
  kind: string;
  message: string;
  details: ErrorDetails;
  retryable: boolean;
}

export class SSHSessionError extends Error {
  readonly code: ErrorCode;
  readonly details: ErrorDetails;

  constructor(code: ErrorCode, message?: string, details: ErrorDetails = {}) {
    super(message || ErrorMessages[code]);
    this.name = 'SSHSessionError';
    this.code = code;
    this.details = details;
  }

  get kind(): string {
    return ErrorKinds[this.code];
  }

  get retryable(): boolean {
    return RETRYABLE.has(this.code);
  }

  toPayload(): ErrorPayload {
    return {
      code: this.code,
      kind: this.kind,
      message: this.message,
      details: this.details,
      retryable: this.retryable
    };
  }
}

const messageOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

// Error factory
export class ErrorFactory {
  static createError(code: ErrorCode, message?: string, details?: ErrorDetails): SSHSessionError {
    return new SSHSessionError(code, message, details);
  }

  static isSSHSessionError(error: unknown): error is SSHSessionError {
    return error instanceof SSHSessionError;
  }

  /**
   * Wraps anything thrown by a collaborator so callers always see a
   * structured error.
   */
  static from(error: unknown, details?: ErrorDetails): SSHSessionError {
    if (error instanceof SSHSessionError) {
      return error;
    }
    return this.internalError(messageOf(error), details);
  }

  static authenticationFailed(name: string, host: string, username: string, cause?: unknown): SSHSessionError {
    return this.createError(
      ErrorCode.AUTHENTICATION_FAILED,
      `Authentication failed for ${username}@${host}`,
      { connection: name, host, username, ...(cause === undefined ? {} : { error: messageOf(cause) }) }
    );
  }

  static connectFailed(name: string, host: string, port: number, cause?: unknown): SSHSessionError {
    return this.createError(
      ErrorCode.CONNECT_FAILED,
      `Failed to connect to ${host}:${port}${cause === undefined ? '' : `: ${messageOf(cause)}`}`,
      { connection: name, host, port, ...(cause === undefined ? {} : { error: messageOf(cause) }) }
    );
  }

  static connectTimeout(name: string, host: string, port: number, timeout: number): SSHSessionError {
    return this.createError(
      ErrorCode.CONNECT_FAILED,
      `Connection to ${host}:${port} timed out after ${timeout}s`,
      { connection: name, host, port, timeout, reason: 'timeout' }
    );
  }

  static connectionNotFound(name: string): SSHSessionError {
    return this.createError(
      ErrorCode.NOT_FOUND,
      `Connection ${name} not found`,
      { connection: name }
    );
  }

  static connectionUnavailable(name: string, reason: string): SSHSessionError {
    return this.createError(
      ErrorCode.CONNECTION_UNAVAILABLE,
      `Connection ${name} is unavailable: ${reason}`,
      { connection: name, reason }
    );
  }

  static connectionLimit(name: string, limit: number): SSHSessionError {
    return this.createError(
      ErrorCode.RESOURCE_EXHAUSTED,
      `Cannot open connection ${name}: limit of ${limit} connections reached`,
      { connection: name, limit, resource: 'connections' }
    );
  }

  static sessionNotFound(sessionId: string): SSHSessionError {
    return this.createError(
      ErrorCode.NOT_FOUND,
      `Session ${sessionId} not found`,
      { sessionId }
    );
  }

  static sessionLimit(limit: number): SSHSessionError {
    return this.createError(
      ErrorCode.RESOURCE_EXHAUSTED,
      `Cannot create session: limit of ${limit} sessions reached`,
      { limit, resource: 'sessions' }
    );
  }

  static sessionBusy(sessionId: string, reason = 'a command is already running'): SSHSessionError {
    return this.createError(
      ErrorCode.SESSION_BUSY,
      `Session ${sessionId} is busy: ${reason}`,
      { sessionId, reason }
    );
  }

  static commandTimeout(command: string, timeout: number, details?: ErrorDetails): SSHSessionError {
    return this.createError(
      ErrorCode.TIMEOUT,
      `Command execution timed out after ${timeout}s: ${command}`,
      { command, timeout, ...details }
    );
  }

  static operationTimeout(operation: string, timeout: number, details?: ErrorDetails): SSHSessionError {
    return this.createError(
      ErrorCode.TIMEOUT,
      `${operation} timed out after ${timeout}s`,
      { operation, timeout, ...details }
    );
  }

  static shellNotOpen(sessionId: string): SSHSessionError {
    return this.createError(
      ErrorCode.NOT_FOUND,
      `Session ${sessionId} has no open shell`,
      { sessionId }
    );
  }

  static channelClosed(sessionId: string): SSHSessionError {
    return this.createError(
      ErrorCode.CHANNEL_CLOSED,
      `Shell channel for session ${sessionId} is closed`,
      { sessionId }
    );
  }

  static localIO(operation: string, path: string, cause?: unknown): SSHSessionError {
    return this.createError(
      ErrorCode.LOCAL_IO,
      `Local ${operation} failed on ${path}${cause === undefined ? '' : `: ${messageOf(cause)}`}`,
      { operation, path, ...(cause === undefined ? {} : { error: messageOf(cause) }) }
    );
  }

  static remoteIO(connection: string, operation: string, path: string, cause?: unknown): SSHSessionError {
    return this.createError(
      ErrorCode.REMOTE_IO,
      `Remote ${operation} failed on ${path}${cause === undefined ? '' : `: ${messageOf(cause)}`}`,
      { connection, operation, path, ...(cause === undefined ? {} : { error: messageOf(cause) }) }
    );
  }

  static invalidConfig(key: string, reason: string): SSHSessionError {
    return this.createError(
      ErrorCode.INVALID_CONFIG,
      `Invalid configuration: ${key} - ${reason}`,
      { key, reason }
    );
  }

  static invalidParams(method: string, issues: string[]): SSHSessionError {
    return this.createError(
      ErrorCode.INVALID_PARAMS,
      `Invalid parameters for ${method}: ${issues.join('; ')}`,
      { method, issues }
    );
  }

  static methodNotFound(method: string): SSHSessionError {
    return this.createError(
      ErrorCode.METHOD_NOT_FOUND,
      `MCP method not found: ${method}`,
      { method }
    );
  }

  static internalError(message: string, details?: ErrorDetails): SSHSessionError {
    return this.createError(
      ErrorCode.INTERNAL_ERROR,
      `Internal error: ${message}`,
      details
    );
  }
}
