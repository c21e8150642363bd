import { SessionManager, SessionManagerOptions } from '../session-manager.js';
import { ErrorCode, SSHSessionError } from '../errors.js';
import type { CommandResult } from '../types.js';

const codeOf = (action: () => unknown): ErrorCode | undefined => {
  try {
    action();
  } catch (error) {
    return error instanceof SSHSessionError ? error.code : undefined;
  }
  return undefined;
};

const result = (command: string): CommandResult => ({
  id: `result-${command}`,
  connection: 'srv',
  command,
  stdout: `${command} output\n`,
  stderr: '',
  exitCode: 0,
  signal: null,
  durationMs: 1,
  timestamp: new Date(0).toISOString(),
  timedOut: false,
  truncated: false
});

describe('SessionManager', () => {
  let clock: number;
  let connections: Set<string>;

  const createManager = (overrides: Partial<SessionManagerOptions> = {}): SessionManager =>
    new SessionManager(
      { maxSessions: 100, historyLimit: 0, sessionIdleTimeout: 86400, now: () => clock, ...overrides },
      { isActive: (name) => connections.has(name) }
    );

  beforeEach(() => {
    clock = 5_000_000;
    connections = new Set(['srv']);
  });

  test('should create a session bound to an active connection', () => {
    const manager = createManager();
    const session = manager.create('s1', 'srv');

    expect(session.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(session).toEqual({
      id: session.id,
      name: 's1',
      connection: 'srv',
      createdAt: new Date(clock).toISOString(),
      lastActivity: new Date(clock).toISOString(),
      historySize: 0,
      workingDirectory: null,
      busy: false,
      shellOpen: false
    });
    expect(manager.list()).toHaveLength(1);
  });

  test('should refuse sessions on unknown connections', () => {
    const manager = createManager();
    expect(codeOf(() => manager.create('s1', 'other'))).toBe(ErrorCode.NOT_FOUND);
  });

  test('should refuse sessions beyond the limit without touching existing ones', () => {
    const manager = createManager({ maxSessions: 2 });
    const first = manager.create('a', 'srv');
    manager.create('b', 'srv');

    expect(codeOf(() => manager.create('c', 'srv'))).toBe(ErrorCode.RESOURCE_EXHAUSTED);
    expect(manager.list().map(session => session.name)).toEqual(['a', 'b']);
    expect(manager.get(first.id).name).toBe('a');
  });

  test('should fail every lookup after delete', () => {
    const manager = createManager();
    const { id } = manager.create('s1', 'srv');

    manager.delete(id);

    expect(codeOf(() => manager.history(id))).toBe(ErrorCode.NOT_FOUND);
    expect(codeOf(() => manager.delete(id))).toBe(ErrorCode.NOT_FOUND);
  });

  test('should keep history in submission order', () => {
    const manager = createManager();
    const { id } = manager.create('s1', 'srv');

    manager.record(id, result('first'));
    manager.record(id, result('second'));

    const history = manager.history(id);
    expect(history.map(entry => [entry.sequence, entry.command, entry.sessionId])).toEqual([
      [1, 'first', id],
      [2, 'second', id]
    ]);
  });

  test('should evict the oldest entries when the history ring is full', () => {
    const manager = createManager({ historyLimit: 3 });
    const { id } = manager.create('s1', 'srv');

    for (let i = 1; i <= 5; i++) {
      manager.record(id, result(`c${i}`));
    }

    const history = manager.history(id, 20);
    expect(history.map(entry => entry.command)).toEqual(['c3', 'c4', 'c5']);
    expect(history.map(entry => entry.sequence)).toEqual([3, 4, 5]);
    expect(manager.context(id).historySize).toBe(3);
  });

  test('should keep everything when the history is unbounded', () => {
    const manager = createManager({ historyLimit: 0 });
    const { id } = manager.create('s1', 'srv');

    for (let i = 1; i <= 25; i++) {
      manager.record(id, result(`c${i}`));
    }

    expect(manager.history(id)).toHaveLength(20);
    expect(manager.history(id)[0]?.command).toBe('c6');
    expect(manager.history(id, 100)).toHaveLength(25);
    expect(manager.history(id, 1).map(entry => entry.command)).toEqual(['c25']);
  });

  test('should reject a second acquire until release', () => {
    const manager = createManager();
    const { id } = manager.create('s1', 'srv');

    manager.acquire(id);
    expect(codeOf(() => manager.acquire(id))).toBe(ErrorCode.SESSION_BUSY);
    expect(manager.get(id).busy).toBe(true);

    manager.release(id);
    expect(codeOf(() => manager.acquire(id))).toBeUndefined();
  });

  test('should track working directory and environment', () => {
    const manager = createManager();
    const { id } = manager.create('s1', 'srv');

    manager.setWorkingDirectory(id, '/srv/app');
    manager.setEnvironment(id, 'APP_ENV', 'prod');
    manager.setEnvironment(id, 'DEBUG', '1');
    manager.unsetEnvironment(id, 'DEBUG');

    expect(manager.context(id)).toEqual({
      sessionId: id,
      name: 's1',
      connection: 'srv',
      workingDirectory: '/srv/app',
      environment: { APP_ENV: 'prod' },
      historySize: 0,
      lastActivity: new Date(clock).toISOString(),
      shellOpen: false
    });
  });

  test('should sweep idle sessions but skip busy ones', () => {
    const manager = createManager({ sessionIdleTimeout: 60 });
    const idle = manager.create('idle', 'srv');
    const busy = manager.create('busy', 'srv');
    const recent = manager.create('recent', 'srv');
    manager.acquire(busy.id);

    clock += 61_000;
    manager.touch(recent.id);
    const swept = manager.sweep();

    expect(swept.removed).toEqual([idle.id]);
    expect(manager.list().map(session => session.name)).toEqual(['busy', 'recent']);
  });

  test('should close the shell before deleting a session', () => {
    const manager = createManager();
    const closed: string[] = [];
    manager.setShellHandler({ isOpen: () => true, closeIfOpen: (id) => closed.push(id) });
    const { id } = manager.create('s1', 'srv');

    expect(manager.context(id).shellOpen).toBe(true);
    manager.delete(id);

    expect(closed).toEqual([id]);
  });

  test('should list the sessions bound to a connection', () => {
    connections.add('other');
    const manager = createManager();
    const a = manager.create('a', 'srv');
    manager.create('b', 'other');

    expect(manager.orphanedBy('srv')).toEqual([a.id]);
  });

  test('should restore an exported session under a new id', () => {
    const manager = createManager();
    const original = manager.create('s1', 'srv');
    manager.setWorkingDirectory(original.id, '/srv');
    manager.setEnvironment(original.id, 'APP_ENV', 'prod');
    manager.record(original.id, result('first'));
    manager.record(original.id, result('second'));

    const imported = manager.import(manager.export(original.id));

    expect(imported.id).not.toBe(original.id);
    expect(imported.name).toBe('s1');
    expect(imported.historySize).toBe(2);
    expect(manager.context(imported.id).environment).toEqual({ APP_ENV: 'prod' });
    expect(manager.context(imported.id).workingDirectory).toBe('/srv');
    expect(manager.history(imported.id).map(entry => entry.sessionId)).toEqual([imported.id, imported.id]);

    const next = manager.record(imported.id, result('third'));
    expect(next.sequence).toBe(3);
  });

  test('should trim imported history to the limit', () => {
    const source = createManager();
    const { id } = source.create('s1', 'srv');
    source.record(id, result('first'));
    source.record(id, result('second'));

    const target = createManager({ historyLimit: 1 });
    const imported = target.import(source.export(id));

    expect(target.history(imported.id).map(entry => entry.command)).toEqual(['second']);
  });

  test('should reject malformed documents and unknown connections on import', () => {
    const manager = createManager();
    const { id } = manager.create('s1', 'srv');
    const document = manager.export(id);

    expect(codeOf(() => manager.import('{ nope'))).toBe(ErrorCode.INVALID_PARAMS);
    expect(codeOf(() => manager.import(JSON.stringify({ version: 1, name: 's1' })))).toBe(ErrorCode.INVALID_PARAMS);

    connections.delete('srv');
    expect(codeOf(() => manager.import(document))).toBe(ErrorCode.NOT_FOUND);
  });
});
