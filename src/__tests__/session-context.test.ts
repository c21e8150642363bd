import { contextPrefix, deriveContextChange, resolveDirectory, shellPath } from '../session-context.js';

describe('resolveDirectory', () => {
  test('should treat a bare cd as the home directory', () => {
    expect(resolveDirectory(null, undefined)).toBe('~');
    expect(resolveDirectory('/var', '~')).toBe('~');
  });

  test('should resolve absolute and relative targets', () => {
    expect(resolveDirectory('/x', '/etc/')).toBe('/etc');
    expect(resolveDirectory('/var', 'log')).toBe('/var/log');
    expect(resolveDirectory('/var/log', '..')).toBe('/var');
    expect(resolveDirectory('/x', '~/projects')).toBe('~/projects');
  });

  test('should resolve relative targets against home when the directory is unknown', () => {
    expect(resolveDirectory(null, 'src')).toBe('~/src');
  });

  test('should give up where the result cannot be known', () => {
    expect(resolveDirectory('/x', '-')).toBeUndefined();
    expect(resolveDirectory('~/a', '../..')).toBeUndefined();
  });
});

describe('deriveContextChange', () => {
  test('should collect cd, export and unset segments', () => {
    const change = deriveContextChange('cd /srv && export APP_ENV="prod" ; unset OLD', {
      workingDirectory: null,
      environment: {}
    });

    expect(change).toEqual({ workingDirectory: '/srv', set: [['APP_ENV', 'prod']], unset: ['OLD'] });
  });

  test('should apply successive cd segments from left to right', () => {
    const change = deriveContextChange('cd /opt; cd app && ls', { workingDirectory: '/home/tester', environment: {} });
    expect(change.workingDirectory).toBe('/opt/app');
  });

  test('should leave the context alone for other commands', () => {
    expect(deriveContextChange('ls -la', { workingDirectory: '/srv', environment: {} })).toEqual({ set: [], unset: [] });
  });
});

describe('contextPrefix', () => {
  test('should be empty without context', () => {
    expect(contextPrefix({ workingDirectory: null, environment: {} })).toBe('');
  });

  test('should export variables and change directory with quoting', () => {
    const prefix = contextPrefix({ workingDirectory: '/srv/my app', environment: { A: '1', B: "it's" } });
    expect(prefix).toBe("export A=1 B='it'\\''s'; cd '/srv/my app' && ");
  });

  test('should keep the home prefix expandable', () => {
    expect(contextPrefix({ workingDirectory: '~/src', environment: {} })).toBe('cd ~/src && ');
    expect(shellPath('~/my dir')).toBe("~/'my dir'");
  });
});
