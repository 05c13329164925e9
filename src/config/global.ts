/**
 * Global Configuration - Runtime settings for the supervisor
 */

import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_GRACE_PERIOD_MS,
  DEFAULT_KILL_WAIT_MS,
  DEFAULT_MAX_SESSIONS,
  DEFAULT_MAX_TABS_PER_SESSION,
  DEFAULT_OPERATION_TIMEOUT_MS,
  DEFAULT_SETTLE_DELAY_MS,
  DEFAULT_SUPERVISOR_MARKERS,
  DEFAULT_WORKER_EXECUTABLES,
  DEFAULT_WORKER_MARKERS,
  DEFAULT_DEBUG_PORT,
} from './defaults';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface PolicyConfig {
  /** Tokens identifying the automation-control process (Protected) */
  supervisorMarkers: string[];
  /** Tokens identifying browser worker processes (Disposable) */
  workerMarkers: string[];
  /** Optional executable-name filter for workers (empty = any executable) */
  workerExecutables: string[];
}

export interface GlobalConfig {
  /** Maximum simultaneous sessions (default: 3) */
  maxSessions: number;
  /** Maximum tabs per session (default: 5) */
  maxTabsPerSession: number;
  /** Per-operation deadline in ms (default: 30000) */
  operationTimeoutMs: number;
  /** Fixed settle delay between a corrective action and the retry (default: 2500) */
  settleDelayMs: number;
  /** SIGTERM → SIGKILL grace period in ms (default: 5000) */
  gracePeriodMs: number;
  /** Wait after SIGKILL before reporting a survivor (default: 2000) */
  killWaitMs: number;
  /** Also target unrelated descendants of disposable workers (default: false) */
  includeDescendants: boolean;
  /** Process identification markers */
  policy: PolicyConfig;
  /** Minimum log level written by the default collector (default: 'info') */
  logLevel: LogLevel;
  /** Directory for the PID file, cleanup lock and verification baseline */
  stateDir: string;
  /** Chrome remote debugging port for the puppeteer backend (default: 9222) */
  debugPort: number;
}

export function createDefaultConfig(): GlobalConfig {
  return {
    maxSessions: DEFAULT_MAX_SESSIONS,
    maxTabsPerSession: DEFAULT_MAX_TABS_PER_SESSION,
    operationTimeoutMs: DEFAULT_OPERATION_TIMEOUT_MS,
    settleDelayMs: DEFAULT_SETTLE_DELAY_MS,
    gracePeriodMs: DEFAULT_GRACE_PERIOD_MS,
    killWaitMs: DEFAULT_KILL_WAIT_MS,
    includeDescendants: false,
    policy: {
      supervisorMarkers: [...DEFAULT_SUPERVISOR_MARKERS],
      workerMarkers: [...DEFAULT_WORKER_MARKERS],
      workerExecutables: [...DEFAULT_WORKER_EXECUTABLES],
    },
    logLevel: 'info',
    stateDir: path.join(os.tmpdir(), 'browser-supervisor'),
    debugPort: DEFAULT_DEBUG_PORT,
  };
}

export type GlobalConfigPatch = Partial<Omit<GlobalConfig, 'policy'>> & {
  policy?: Partial<PolicyConfig>;
};

const config: GlobalConfig = createDefaultConfig();

/**
 * Get global configuration
 */
export function getGlobalConfig(): GlobalConfig {
  return config;
}

/**
 * Set global configuration. Policy fields merge individually.
 */
export function setGlobalConfig(newConfig: GlobalConfigPatch): void {
  const { policy, ...rest } = newConfig;
  Object.assign(config, rest);
  if (policy) {
    config.policy = { ...config.policy, ...policy };
  }
}

/**
 * Restore defaults (tests and embedded callers that reconfigure between runs)
 */
export function resetGlobalConfig(): void {
  Object.assign(config, createDefaultConfig());
}
