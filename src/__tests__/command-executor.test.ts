import { ErrorCode, SSHSessionError } from '../errors.js';
import { logger } from '../logger.js';
import type { OutputChunk } from '../types.js';
import { createTestRuntime, descriptor } from './helpers/runtime.js';

const codeOf = async (promise: Promise<unknown>): Promise<ErrorCode | undefined> => {
  try {
    await promise;
  } catch (error) {
    return error instanceof SSHSessionError ? error.code : undefined;
  }
  return undefined;
};

describe('CommandExecutor', () => {
  test('should run a one-shot command without touching any session', async () => {
    const { runtime } = createTestRuntime();
    await runtime.pool.connect(descriptor('srv'));
    const session = runtime.sessions.create('s1', 'srv');

    const result = await runtime.executor.execute('srv', 'echo hello');

    expect(result.stdout).toBe('hello\n');
    expect(result.stderr).toBe('');
    expect(result.exitCode).toBe(0);
    expect(result.signal).toBeNull();
    expect(result.timedOut).toBe(false);
    expect(result.truncated).toBe(false);
    expect(result.sessionId).toBeUndefined();
    expect(result.error).toBeUndefined();
    expect(runtime.sessions.history(session.id)).toEqual([]);
  });

  test('should report stderr and the exit code as given', async () => {
    const { runtime } = createTestRuntime();
    await runtime.pool.connect(descriptor('srv'));

    const result = await runtime.executor.execute('srv', 'fail');

    expect(result.stderr).toBe('boom\n');
    expect(result.exitCode).toBe(2);
  });

  test('should use -1 when only a signal is reported', async () => {
    const { runtime, factory } = createTestRuntime();
    await runtime.pool.connect(descriptor('srv'));
    factory.last().execHandler = (channel) => channel.exit(null, 'TERM');

    const result = await runtime.executor.execute('srv', 'long-task');

    expect(result.exitCode).toBe(-1);
    expect(result.signal).toBe('TERM');
  });

  test('should stream chunks in arrival order with sequence numbers', async () => {
    const { runtime, factory } = createTestRuntime();
    await runtime.pool.connect(descriptor('srv'));
    factory.last().execHandler = (channel) => {
      channel.stdout('a');
      channel.stderr('b');
      channel.stdout('c');
      channel.exit(0);
    };
    const chunks: OutputChunk[] = [];

    const result = await runtime.executor.execute('srv', 'build', { onOutput: (chunk) => chunks.push(chunk) });

    expect(chunks).toEqual([
      { stream: 'stdout', data: 'a', sequence: 1 },
      { stream: 'stderr', data: 'b', sequence: 2 },
      { stream: 'stdout', data: 'c', sequence: 3 }
    ]);
    expect(result.stdout).toBe('ac');
    expect(result.stderr).toBe('b');
  });

  test('should truncate output beyond the byte limit', async () => {
    const { runtime } = createTestRuntime({ maxOutputBytes: 4 });
    await runtime.pool.connect(descriptor('srv'));

    const result = await runtime.executor.execute('srv', 'echo hello');

    expect(result.stdout).toBe('hell');
    expect(result.truncated).toBe(true);
  });

  test('should kill a command that runs past its timeout and keep the session usable', async () => {
    const { runtime, factory } = createTestRuntime();
    await runtime.pool.connect(descriptor('srv'));
    const { id } = runtime.sessions.create('s1', 'srv');

    const result = await runtime.executor.executeInSession(id, 'sleep 10', { timeout: 0.05 });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBe(-1);
    expect(result.error?.code).toBe(ErrorCode.TIMEOUT);
    expect(result.error?.kind).toBe('TimeoutError');
    expect(factory.last().execChannels[0]?.terminated).toBe(true);
    expect(runtime.sessions.history(id).map(entry => entry.command)).toEqual(['sleep 10']);

    const next = await runtime.executor.executeInSession(id, 'echo ok');
    expect(next.stdout).toBe('ok\n');
    expect(runtime.sessions.get(id).busy).toBe(false);
  });

  test('should reject a second command while one is running', async () => {
    const { runtime } = createTestRuntime();
    await runtime.pool.connect(descriptor('srv'));
    const { id } = runtime.sessions.create('s1', 'srv');

    const running = runtime.executor.executeInSession(id, 'sleep 10', { timeout: 0.05 });
    expect(await codeOf(runtime.executor.executeInSession(id, 'echo second'))).toBe(ErrorCode.SESSION_BUSY);

    await running;
    expect(runtime.sessions.history(id).map(entry => entry.command)).toEqual(['sleep 10']);
  });

  test('should derive context from successful commands and carry it forward', async () => {
    const { runtime, factory } = createTestRuntime();
    await runtime.pool.connect(descriptor('srv'));
    const { id } = runtime.sessions.create('s1', 'srv');

    await runtime.executor.executeInSession(id, 'cd /srv && export APP_ENV=prod');
    const result = await runtime.executor.executeInSession(id, 'ls');

    expect(runtime.sessions.context(id).workingDirectory).toBe('/srv');
    expect(runtime.sessions.context(id).environment).toEqual({ APP_ENV: 'prod' });
    expect(factory.last().commands[1]).toBe('export APP_ENV=prod; cd /srv && ls');
    expect(result.command).toBe('ls');
  });

  test('should leave the context alone when the command fails', async () => {
    const { runtime } = createTestRuntime();
    await runtime.pool.connect(descriptor('srv'));
    const { id } = runtime.sessions.create('s1', 'srv');

    const result = await runtime.executor.executeInSession(id, 'cd /missing && false');

    expect(result.exitCode).toBe(1);
    expect(runtime.sessions.context(id).workingDirectory).toBeNull();
  });

  test('should send commands verbatim when context carry-over is off', async () => {
    const { runtime, factory } = createTestRuntime({ carryContext: false });
    await runtime.pool.connect(descriptor('srv'));
    const { id } = runtime.sessions.create('s1', 'srv');

    await runtime.executor.executeInSession(id, 'cd /srv');
    await runtime.executor.executeInSession(id, 'pwd');

    expect(factory.last().commands).toEqual(['cd /srv', 'pwd']);
    expect(runtime.sessions.context(id).workingDirectory).toBe('/srv');
  });

  test('should fail on unknown or disconnected connections', async () => {
    const { runtime } = createTestRuntime();
    expect(await codeOf(runtime.executor.execute('nope', 'echo hi'))).toBe(ErrorCode.CONNECTION_UNAVAILABLE);

    await runtime.pool.connect(descriptor('srv'));
    const { id } = runtime.sessions.create('s1', 'srv');
    await runtime.pool.disconnect('srv');

    expect(await codeOf(runtime.executor.executeInSession(id, 'echo hi'))).toBe(ErrorCode.CONNECTION_UNAVAILABLE);
    expect(runtime.sessions.get(id).busy).toBe(false);
  });

  test('should keep command text out of info logs', async () => {
    const info = jest.spyOn(logger, 'info');
    const debug = jest.spyOn(logger, 'debug');
    try {
      const { runtime } = createTestRuntime();
      await runtime.pool.connect(descriptor('srv'));
      const session = runtime.sessions.create('s1', 'srv');

      await runtime.executor.executeInSession(session.id, 'export TOKEN=test-secret');

      const infoCalls: unknown[][] = info.mock.calls;
      const executing = infoCalls.find(call => call[0] === 'Executing command on srv');
      expect(executing?.[1]).toMatchObject({ sessionId: session.id });
      expect(executing?.[1]).not.toHaveProperty('command');
      const debugCalls: unknown[][] = debug.mock.calls;
      expect(debugCalls).toContainEqual(['Command text', { connection: 'srv', command: 'export TOKEN=test-secret' }]);
    } finally {
      info.mockRestore();
      debug.mockRestore();
    }
  });
});
