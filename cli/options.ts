/**
 * Shared CLI option handling: config file first, then flags on top
 */

import { GlobalConfig, GlobalConfigPatch, PolicyConfig, getGlobalConfig, setGlobalConfig } from '../src/config/global';
import { loadConfigFile, resolveConfigPath } from '../src/config/config-file';
import { SupervisorError } from '../src/errors';

export interface CommonOptions {
  verbose?: boolean;
  config?: string;
  workerMarker?: string[];
  supervisorMarker?: string[];
}

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_ERROR = 2;
export const EXIT_INTERRUPTED = 130;

/**
 * Parse a non-negative millisecond flag
 */
export function parseMs(flag: string, value: string): number {
  const trimmed = value.trim();
  const ms = /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
  if (Number.isNaN(ms)) {
    throw new SupervisorError('InvalidConfig', `${flag} expects a non-negative integer (got "${value}")`);
  }
  return ms;
}

/**
 * Apply the config file and flags to the global config and return the result
 */
export function applyCommandConfig(
  options: CommonOptions,
  extra: GlobalConfigPatch = {},
  env: NodeJS.ProcessEnv = process.env,
): GlobalConfig {
  const configPath = resolveConfigPath(options.config, env);
  if (configPath) {
    setGlobalConfig(loadConfigFile(configPath));
  }

  const patch: GlobalConfigPatch = { ...extra };
  if (options.verbose) {
    patch.logLevel = 'debug';
  }
  const policy: Partial<PolicyConfig> = {};
  if (options.workerMarker && options.workerMarker.length > 0) {
    policy.workerMarkers = options.workerMarker;
  }
  if (options.supervisorMarker && options.supervisorMarker.length > 0) {
    policy.supervisorMarkers = options.supervisorMarker;
  }
  if (Object.keys(policy).length > 0) {
    patch.policy = policy;
  }
  setGlobalConfig(patch);
  return getGlobalConfig();
}
