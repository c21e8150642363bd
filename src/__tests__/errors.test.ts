import { ErrorCode, ErrorFactory, SSHSessionError } from '../errors.js';

describe('SSHSessionError', () => {
  test('should expose kind and retryable from the code', () => {
    const error = ErrorFactory.sessionBusy('abc');
    expect(error).toBeInstanceOf(SSHSessionError);
    expect(error.code).toBe(ErrorCode.SESSION_BUSY);
    expect(error.kind).toBe('SessionBusyError');
    expect(error.retryable).toBe(true);
    expect(error.details).toEqual({ sessionId: 'abc', reason: 'a command is already running' });
  });

  test('should fall back to the default message', () => {
    const error = ErrorFactory.createError(ErrorCode.CHANNEL_CLOSED);
    expect(error.message).toBe('Channel is closed');
    expect(error.retryable).toBe(false);
  });

  test('should serialise to a payload', () => {
    const payload = ErrorFactory.connectionNotFound('srv').toPayload();
    expect(payload).toEqual({
      code: ErrorCode.NOT_FOUND,
      kind: 'NotFoundError',
      message: 'Connection srv not found',
      details: { connection: 'srv' },
      retryable: false
    });
  });
});

describe('ErrorFactory', () => {
  test('should classify a connect timeout as a retryable ConnectError', () => {
    const error = ErrorFactory.connectTimeout('srv', '10.0.0.1', 22, 2);
    expect(error.kind).toBe('ConnectError');
    expect(error.retryable).toBe(true);
    expect(error.details.reason).toBe('timeout');
  });

  test('should not treat authentication failures as retryable', () => {
    const error = ErrorFactory.authenticationFailed('srv', 'host.test', 'tester', new Error('All configured authentication methods failed'));
    expect(error.code).toBe(ErrorCode.AUTHENTICATION_FAILED);
    expect(error.retryable).toBe(false);
    expect(error.details.error).toBe('All configured authentication methods failed');
  });

  test('should wrap foreign errors as internal errors', () => {
    const wrapped = ErrorFactory.from(new TypeError('bad thing'), { tool: 'ssh_list' });
    expect(wrapped.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(wrapped.message).toBe('Internal error: bad thing');
    expect(wrapped.details).toEqual({ tool: 'ssh_list' });
  });

  test('should pass structured errors through unchanged', () => {
    const original = ErrorFactory.channelClosed('abc');
    expect(ErrorFactory.from(original)).toBe(original);
  });

  test('should list every issue for invalid params', () => {
    const error = ErrorFactory.invalidParams('ssh_connect', ['host is required', 'username is required']);
    expect(error.message).toBe('Invalid parameters for ssh_connect: host is required; username is required');
    expect(error.kind).toBe('InvalidParamsError');
  });
});
