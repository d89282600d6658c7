import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigurationError } from '@flotilla/shared/Types/errors.js';
import { PathManager } from '@flotilla/shared/Utils/paths.js';
import { loadConfig, parseConfigFile } from '../../src/config/index.js';
import { makeTempDir } from '../helpers/agents.js';

const ENV_KEYS = [
  'FLOTILLA_HOST',
  'FLOTILLA_API_PORT',
  'FLOTILLA_BASE_PORT',
  'FLOTILLA_MAX_AGENTS',
  'FLOTILLA_HEALTH_CHECK_INTERVAL',
  'FLOTILLA_RESTART_ON_FAILURE',
  'FLOTILLA_AGENTS_DIR',
  'FLOTILLA_STORAGE_PATH',
  'FLOTILLA_PYTHON',
  'FLOTILLA_API_KEY',
  'LOG_LEVEL',
];

let root: string;

beforeEach(() => {
  root = makeTempDir('config');
  for (const key of ENV_KEYS) vi.stubEnv(key, undefined);
  vi.stubEnv('FLOTILLA_HOME', join(root, 'home'));
  PathManager.reset();
});

afterEach(() => {
  vi.unstubAllEnvs();
  PathManager.reset();
  rmSync(root, { recursive: true, force: true });
});

function writeConfig(name: string, content: string): string {
  const path = join(root, name);
  writeFileSync(path, content);
  return path;
}

describe('loadConfig', () => {
  it('uses defaults rooted at FLOTILLA_HOME without a file', () => {
    const config = loadConfig();

    expect(config.deployment.apiPort).toBe(8080);
    expect(config.deployment.basePort).toBe(8100);
    expect(config.deployment.maxAgents).toBe(10);
    expect(config.deployment.agentsDirectory).toBe(join(root, 'home', 'agents'));
    expect(config.deployment.storagePath).toBe(join(root, 'home', 'data'));
    expect(config.deployment.auth.apiKey).toBeUndefined();
    expect(config.logLevel).toBe('info');
    expect(config.mcpServers).toEqual({});
  });

  it('reads TOML and resolves relative directories against the file', () => {
    const path = writeConfig(
      'flotilla.toml',
      [
        'logLevel = "debug"',
        '[deployment]',
        'basePort = 9100',
        'maxAgents = 4',
        'agentsDirectory = "agents"',
        'storagePath = "state"',
        '[mcpServers.search]',
        'command = "search-server"',
      ].join('\n')
    );

    const config = loadConfig({ configPath: path });

    expect(config.logLevel).toBe('debug');
    expect(config.deployment.basePort).toBe(9100);
    expect(config.deployment.maxAgents).toBe(4);
    expect(config.deployment.agentsDirectory).toBe(join(root, 'agents'));
    expect(config.deployment.storagePath).toBe(join(root, 'state'));
    expect(config.mcpServers.search).toMatchObject({ transport: 'stdio', command: 'search-server', enabled: true });
  });

  it('lets the environment beat the file and overrides beat the environment', () => {
    const path = writeConfig('flotilla.json', JSON.stringify({ deployment: { basePort: 9100, apiPort: 7000 } }));
    vi.stubEnv('FLOTILLA_BASE_PORT', '9200');
    vi.stubEnv('FLOTILLA_API_PORT', '7100');
    vi.stubEnv('FLOTILLA_API_KEY', 'test-secret');
    vi.stubEnv('FLOTILLA_RESTART_ON_FAILURE', 'false');

    const config = loadConfig({ configPath: path, overrides: { apiPort: 7200 } });

    expect(config.deployment.basePort).toBe(9200);
    expect(config.deployment.apiPort).toBe(7200);
    expect(config.deployment.restartOnFailure).toBe(false);
    expect(config.deployment.auth.apiKey).toBe('test-secret');
  });

  it('ignores overrides left undefined', () => {
    const path = writeConfig('flotilla.json', JSON.stringify({ deployment: { host: '0.0.0.0' } }));

    const config = loadConfig({ configPath: path, overrides: { host: undefined } });

    expect(config.deployment.host).toBe('0.0.0.0');
  });

  it('rejects invalid values', () => {
    const path = writeConfig('flotilla.json', JSON.stringify({ deployment: { maxAgents: 0 } }));

    expect(() => loadConfig({ configPath: path })).toThrow(ConfigurationError);
    expect(() => loadConfig({ configPath: path })).toThrow(/deployment\.maxAgents/);
  });

  it('rejects a stdio provider without a command', () => {
    const path = writeConfig('flotilla.json', JSON.stringify({ mcpServers: { search: { transport: 'stdio' } } }));

    expect(() => loadConfig({ configPath: path })).toThrow('mcpServers.search.command: stdio providers need a command');
  });
});

describe('parseConfigFile', () => {
  it('rejects documents that are not objects', () => {
    const path = writeConfig('list.json', '[1, 2]');

    expect(() => parseConfigFile(path)).toThrow(`Config file ${path} must contain an object`);
  });

  it('reports unreadable files', () => {
    const path = join(root, 'missing.toml');

    expect(() => parseConfigFile(path)).toThrow(`Cannot read config file ${path}`);
  });
});
