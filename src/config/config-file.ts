/**
 * Config file - optional JSON overrides for the global configuration
 *
 * {
 *   "maxSessions": 3,
 *   "maxTabsPerSession": 5,
 *   "gracePeriodMs": 5000,
 *   "policy": { "supervisorMarkers": ["mcp-server-playwright"], "workerMarkers": ["mcp-chrome-profile"] }
 * }
 */

import * as fs from 'fs';
import { GlobalConfigPatch, LogLevel, PolicyConfig } from './global';
import { SupervisorError } from '../errors';

export const CONFIG_ENV_VAR = 'BROWSER_SUPERVISOR_CONFIG';

const NUMERIC_KEYS = [
  'maxSessions',
  'maxTabsPerSession',
  'operationTimeoutMs',
  'settleDelayMs',
  'gracePeriodMs',
  'killWaitMs',
  'debugPort',
] as const;

const POLICY_KEYS = ['supervisorMarkers', 'workerMarkers', 'workerExecutables'] as const;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function invalid(filePath: string, detail: string): SupervisorError {
  return new SupervisorError('InvalidConfig', `Invalid config ${filePath}: ${detail}`, { filePath });
}

/**
 * Validate parsed JSON into a config patch. Unknown keys are rejected so typos surface.
 */
export function parseConfig(raw: unknown, filePath = '<inline>'): GlobalConfigPatch {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw invalid(filePath, 'expected a JSON object');
  }

  const patch: GlobalConfigPatch = {};
  for (const [key, value] of Object.entries(raw)) {
    const numericKey = NUMERIC_KEYS.find((k) => k === key);
    if (numericKey) {
      if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
        throw invalid(filePath, `${key} must be a non-negative integer`);
      }
      patch[numericKey] = value;
      continue;
    }

    switch (key) {
      case 'includeDescendants':
        if (typeof value !== 'boolean') throw invalid(filePath, `${key} must be a boolean`);
        patch.includeDescendants = value;
        break;
      case 'logLevel':
        if (!isLogLevel(value)) throw invalid(filePath, `${key} must be one of ${LOG_LEVELS.join(', ')}`);
        patch.logLevel = value;
        break;
      case 'stateDir':
        if (typeof value !== 'string' || value.length === 0) throw invalid(filePath, `${key} must be a path`);
        patch.stateDir = value;
        break;
      case 'policy':
        patch.policy = parsePolicy(value, filePath);
        break;
      default:
        throw invalid(filePath, `unknown key "${key}"`);
    }
  }

  if (patch.maxSessions === 0 || patch.maxTabsPerSession === 0) {
    throw invalid(filePath, 'ceilings must be at least 1');
  }
  return patch;
}

function parsePolicy(value: unknown, filePath: string): Partial<PolicyConfig> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw invalid(filePath, 'policy must be an object');
  }
  const policy: Partial<PolicyConfig> = {};
  for (const [key, entry] of Object.entries(value)) {
    const policyKey = POLICY_KEYS.find((k) => k === key);
    if (!policyKey) {
      throw invalid(filePath, `unknown policy key "${key}"`);
    }
    if (!isStringArray(entry)) {
      throw invalid(filePath, `policy.${key} must be an array of strings`);
    }
    policy[policyKey] = entry;
  }
  return policy;
}

export function loadConfigFile(filePath: string): GlobalConfigPatch {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new SupervisorError('InvalidConfig', `Cannot read config ${filePath}`, { filePath }, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new SupervisorError('InvalidConfig', `Config ${filePath} is not valid JSON`, { filePath }, { cause: error });
  }
  return parseConfig(raw, filePath);
}

/**
 * Resolve the config path from an explicit flag or the environment
 */
export function resolveConfigPath(explicit?: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  return explicit ?? env[CONFIG_ENV_VAR] ?? undefined;
}
