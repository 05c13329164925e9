/**
 * browser-supervisor - session and process supervision for automated browser fleets
 */

export { Supervisor, createSupervisor, createCleanupStack } from './supervisor';
export type { CleanupStack, SupervisorOptions, SupervisorStats } from './supervisor';

export { ProcessRegistry, classify, selectTargets, summarize } from './process/registry';
export type { ProcessRegistryOptions, SnapshotSummary } from './process/registry';
export { MarkerPolicy, RegexPolicy, containsToken, createPolicyFromConfig, withPidOverrides } from './process/policy';
export { PsProcessSource } from './process/process-source';
export type { CommandRunner } from './process/process-source';
export { NodeProcessSignaller } from './process/signaller';
export { CleanupExecutor, verifyPreservation } from './process/cleanup-executor';
export type { CleanupBaseline, CleanupExecutorOptions } from './process/cleanup-executor';

export { ConcurrencyGovernor } from './concurrency-governor';
export type {
  AdmissionDecision,
  AdmissionRequest,
  AdmissionTicket,
  DenialReason,
  GovernorLimits,
  GovernorUsage,
} from './concurrency-governor';
export { SessionTracker } from './session-tracker';
export type { SessionTrackerStats } from './session-tracker';
export { RecoveryEngine } from './recovery/recovery-engine';
export type { RecoveryEngineOptions } from './recovery/recovery-engine';
export { classifyFailure } from './recovery/failure-classifier';

export type { BrowserBackend } from './browser/backend';
export { PuppeteerBackend } from './browser/puppeteer-backend';
export type { PuppeteerBackendOptions } from './browser/puppeteer-backend';

export { SupervisorError, isSupervisorError } from './errors';
export type { SupervisorErrorKind } from './errors';
export { getGlobalConfig, setGlobalConfig, resetGlobalConfig } from './config/global';
export type { GlobalConfig, GlobalConfigPatch, PolicyConfig } from './config/global';
export { loadConfigFile } from './config/config-file';
export { addLogCollector, createLogger, setStderrLogging } from './utils/logger';
export type { LogEvent, Logger } from './utils/logger';

export * from './types/process';
export * from './types/session';
export * from './types/recovery';
