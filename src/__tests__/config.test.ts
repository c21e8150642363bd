import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { homedir, tmpdir } from 'os';
import { join } from 'path';
import { ConfigManager } from '../config.js';
import { ErrorCode, SSHSessionError } from '../errors.js';

describe('ConfigManager', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ssh-session-config-'));
    configPath = join(dir, 'config.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('should use defaults when nothing is set', () => {
    const config = new ConfigManager({ MCP_SSH_CONFIG: configPath }).getConfig();
    expect(config.maxConnections).toBe(10);
    expect(config.maxSessions).toBe(100);
    expect(config.commandTimeout).toBe(30);
    expect(config.connectionTimeout).toBe(30);
    expect(config.historyLimit).toBe(0);
    expect(config.carryContext).toBe(true);
    expect(config.logLevel).toBe('INFO');
    expect(config.configFile).toBe(configPath);
    expect(config.connections).toEqual({});
  });

  test('should read overrides from the environment', () => {
    const config = new ConfigManager({
      MCP_SSH_CONFIG: configPath,
      MCP_SSH_MAX_SESSIONS: '5',
      MCP_SSH_CARRY_CONTEXT: 'false',
      MCP_SSH_DEBUG: 'true',
      MCP_SSH_TIMEOUT: 'soon'
    }).getConfig();

    expect(config.maxSessions).toBe(5);
    expect(config.carryContext).toBe(false);
    expect(config.debug).toBe(true);
    expect(config.logLevel).toBe('DEBUG');
    expect(config.commandTimeout).toBe(30);
  });

  test('should load profiles and settings from the config file', () => {
    writeFileSync(configPath, JSON.stringify({
      max_sessions: 7,
      history_limit: 50,
      connections: {
        web: { host: 'web.test', username: 'deploy', key_filename: '~/.ssh/id_ed25519' }
      }
    }));

    const config = new ConfigManager({ MCP_SSH_CONFIG: configPath, MCP_SSH_HISTORY_LIMIT: '10' }).getConfig();

    expect(config.maxSessions).toBe(7);
    expect(config.historyLimit).toBe(10);
    expect(config.connections.web).toEqual({
      host: 'web.test',
      port: undefined,
      username: 'deploy',
      password: undefined,
      privateKeyPath: `${homedir()}/.ssh/id_ed25519`,
      passphrase: undefined,
      useAgent: undefined,
      timeout: undefined
    });
  });

  test('should read every tunable from the config file', () => {
    writeFileSync(configPath, JSON.stringify({
      debug: true,
      probe_timeout: 9,
      max_output_bytes: 100,
      shell_buffer_bytes: 200,
      shell_settle_ms: 5,
      carry_context: false,
      command_timeout: 12,
      server_name: 'ops-bridge'
    }));

    const config = new ConfigManager({ MCP_SSH_CONFIG: configPath, MCP_SSH_SHELL_SETTLE_MS: '50' }).getConfig();

    expect(config.debug).toBe(true);
    expect(config.logLevel).toBe('DEBUG');
    expect(config.probeTimeout).toBe(9);
    expect(config.maxOutputBytes).toBe(100);
    expect(config.shellBufferBytes).toBe(200);
    expect(config.shellSettleMs).toBe(50);
    expect(config.carryContext).toBe(false);
    expect(config.commandTimeout).toBe(12);
    expect(config.serverName).toBe('ops-bridge');
  });

  test('should reject a config file that is not JSON', () => {
    writeFileSync(configPath, '{ not json');
    expect(() => new ConfigManager({ MCP_SSH_CONFIG: configPath })).toThrow(SSHSessionError);
  });

  test('should reject a config file with invalid fields', () => {
    writeFileSync(configPath, JSON.stringify({ connections: { web: { port: 'twenty-two' } } }));

    let caught: unknown;
    try {
      new ConfigManager({ MCP_SSH_CONFIG: configPath });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SSHSessionError);
    expect(caught instanceof SSHSessionError && caught.code).toBe(ErrorCode.INVALID_CONFIG);
  });

  test('should fall back to the environment in lenient mode', () => {
    writeFileSync(configPath, '{ not json');
    const manager = new ConfigManager({ MCP_SSH_CONFIG: configPath }, true);
    expect(manager.loadError).toBeInstanceOf(SSHSessionError);
    expect(manager.getConfig().connections).toEqual({});
  });
});
