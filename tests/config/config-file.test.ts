/**
 * Tests for config file loading and the global config
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CONFIG_ENV_VAR, loadConfigFile, parseConfig, resolveConfigPath } from '../../src/config/config-file';
import { getGlobalConfig, resetGlobalConfig, setGlobalConfig } from '../../src/config/global';

describe('parseConfig', () => {
  test('accepts known keys', () => {
    const patch = parseConfig({
      maxSessions: 4,
      gracePeriodMs: 1000,
      includeDescendants: true,
      logLevel: 'debug',
      stateDir: '/var/run/supervisor',
      policy: { workerMarkers: ['automation-profile'] },
    });

    expect(patch).toEqual({
      maxSessions: 4,
      gracePeriodMs: 1000,
      includeDescendants: true,
      logLevel: 'debug',
      stateDir: '/var/run/supervisor',
      policy: { workerMarkers: ['automation-profile'] },
    });
  });

  test.each([
    [[], 'expected a JSON object'],
    [{ maxSesions: 3 }, 'unknown key "maxSesions"'],
    [{ maxSessions: -1 }, 'maxSessions must be a non-negative integer'],
    [{ settleDelayMs: 1.5 }, 'settleDelayMs must be a non-negative integer'],
    [{ maxTabsPerSession: 0 }, 'ceilings must be at least 1'],
    [{ includeDescendants: 'yes' }, 'includeDescendants must be a boolean'],
    [{ logLevel: 'trace' }, 'logLevel must be one of debug, info, warn, error'],
    [{ stateDir: '' }, 'stateDir must be a path'],
    [{ policy: ['x'] }, 'policy must be an object'],
    [{ policy: { markers: [] } }, 'unknown policy key "markers"'],
    [{ policy: { workerMarkers: [1] } }, 'policy.workerMarkers must be an array of strings'],
  ])('rejects %j', (raw, message) => {
    expect(() => parseConfig(raw, 'test.json')).toThrow(`Invalid config test.json: ${message}`);
  });
});

describe('loadConfigFile', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'supervisor-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  test('reads and validates a JSON file', () => {
    const file = path.join(tmpDir, 'supervisor.json');
    fs.writeFileSync(file, JSON.stringify({ maxSessions: 2 }));

    expect(loadConfigFile(file)).toEqual({ maxSessions: 2 });
  });

  test('reports unreadable and malformed files as InvalidConfig', () => {
    const bad = path.join(tmpDir, 'bad.json');
    fs.writeFileSync(bad, '{ nope');

    const missing = path.join(tmpDir, 'missing.json');
    expect(() => loadConfigFile(missing)).toThrow(`Cannot read config ${missing}`);
    expect(() => loadConfigFile(bad)).toThrow(`Config ${bad} is not valid JSON`);
  });
});

describe('resolveConfigPath', () => {
  test('prefers the explicit path over the environment', () => {
    expect(resolveConfigPath('a.json', { [CONFIG_ENV_VAR]: 'b.json' })).toBe('a.json');
    expect(resolveConfigPath(undefined, { [CONFIG_ENV_VAR]: 'b.json' })).toBe('b.json');
    expect(resolveConfigPath(undefined, {})).toBeUndefined();
  });
});

describe('global config', () => {
  test('merges policy fields individually and resets to defaults', () => {
    setGlobalConfig({ maxSessions: 5, policy: { workerMarkers: ['w'] } });

    expect(getGlobalConfig().maxSessions).toBe(5);
    expect(getGlobalConfig().policy).toEqual({
      supervisorMarkers: ['mcp-server-playwright'],
      workerMarkers: ['w'],
      workerExecutables: ['chrome'],
    });

    resetGlobalConfig();
    expect(getGlobalConfig().maxSessions).toBe(3);
    expect(getGlobalConfig().policy.workerMarkers).toEqual(['mcp-chrome-profile']);
  });
});
