/**
 * Supervisor - wires registry, governor, tracker, recovery and cleanup together
 *
 * Session callers go through this facade. Process signalling only ever happens
 * inside the CleanupExecutor built by createCleanupStack.
 */

import * as path from 'path';
import { getGlobalConfig, GlobalConfig } from './config/global';
import { BrowserBackend } from './browser/backend';
import { PuppeteerBackend } from './browser/puppeteer-backend';
import { ConcurrencyGovernor, GovernorUsage } from './concurrency-governor';
import { SessionTracker, SessionTrackerStats } from './session-tracker';
import { RecoveryEngine } from './recovery/recovery-engine';
import { CleanupExecutor } from './process/cleanup-executor';
import { ProcessRegistry } from './process/registry';
import { createPolicyFromConfig } from './process/policy';
import { PsProcessSource } from './process/process-source';
import { NodeProcessSignaller } from './process/signaller';
import { CleanupMode, CleanupReport, IdentificationPolicy, ProcessRecord, ProcessSignaller, ProcessSource } from './types/process';
import { OpenSessionOptions, Session, SessionEvent, SessionInfo, TabHandle } from './types/session';
import { RecoveryAttempt, RecoveryResult, RunOptions, SupervisedOperation } from './types/recovery';
import { listActivePids, removePidFile, writePidFile } from './utils/pid-manager';
import { createLogger } from './utils/logger';

const log = createLogger('Supervisor');

export interface SupervisorOptions {
  /** Overrides on top of the global config */
  config?: Partial<GlobalConfig>;
  backend?: BrowserBackend;
  source?: ProcessSource;
  signaller?: ProcessSignaller;
  policy?: IdentificationPolicy;
  /** Register this process in the PID file so other supervisors treat it as Protected (default: true) */
  registerPid?: boolean;
}

export interface SupervisorStats {
  sessions: SessionTrackerStats;
  usage: GovernorUsage;
  lastCleanup: CleanupReport | null;
  recoveries: RecoveryAttempt[];
}

export interface CleanupStack {
  registry: ProcessRegistry;
  executor: CleanupExecutor;
}

/**
 * Registry and executor over the shared state directory. Pids registered in the
 * PID file are Protected; the lock and baseline files live beside it.
 */
export function createCleanupStack(
  config: GlobalConfig,
  overrides: Pick<SupervisorOptions, 'source' | 'signaller' | 'policy'> = {},
): CleanupStack {
  const registry = new ProcessRegistry({
    source: overrides.source ?? new PsProcessSource(),
    policy: overrides.policy ?? createPolicyFromConfig(config.policy),
    protectedPids: () => listActivePids(config.stateDir),
  });
  const executor = new CleanupExecutor({
    registry,
    signaller: overrides.signaller ?? new NodeProcessSignaller(),
    gracePeriodMs: config.gracePeriodMs,
    killWaitMs: config.killWaitMs,
    includeDescendants: config.includeDescendants,
    lockFile: path.join(config.stateDir, 'cleanup.lock'),
    baselineFile: path.join(config.stateDir, 'baseline.json'),
  });
  return { registry, executor };
}

export class Supervisor {
  readonly config: GlobalConfig;
  readonly registry: ProcessRegistry;
  readonly governor: ConcurrencyGovernor;
  readonly tracker: SessionTracker;
  readonly recovery: RecoveryEngine;
  private executor: CleanupExecutor;
  private backend: BrowserBackend;
  private registeredPid: boolean;

  constructor(options: SupervisorOptions = {}) {
    const config: GlobalConfig = { ...getGlobalConfig(), ...options.config };
    this.config = config;
    this.backend = options.backend ?? new PuppeteerBackend({ port: config.debugPort });

    const stack = createCleanupStack(config, options);
    this.registry = stack.registry;
    this.executor = stack.executor;

    this.governor = new ConcurrencyGovernor({
      maxSessions: config.maxSessions,
      maxTabsPerSession: config.maxTabsPerSession,
    });
    this.tracker = new SessionTracker(this.governor, this.backend);
    this.recovery = new RecoveryEngine({
      tracker: this.tracker,
      executor: this.executor,
      registry: this.registry,
      operationTimeoutMs: config.operationTimeoutMs,
      settleDelayMs: config.settleDelayMs,
    });

    // Contexts die with the connection; the next operation opens a fresh session
    this.backend.addDisconnectListener?.(() => {
      void this.closeOpenSessions('Browser disconnected');
    });

    this.registeredPid = options.registerPid ?? true;
    if (this.registeredPid) {
      writePidFile(config.stateDir);
    }
  }

  // ==================== SESSIONS ====================

  openSession(workflowId: string, options?: OpenSessionOptions): Promise<Session> {
    return this.tracker.openSession(workflowId, options);
  }

  suspendSession(sessionId: string): Promise<Session> {
    return this.tracker.suspendSession(sessionId);
  }

  closeSession(sessionId: string): Promise<Session> {
    return this.tracker.closeSession(sessionId);
  }

  openTab(sessionId: string): Promise<TabHandle> {
    return this.tracker.openTab(sessionId);
  }

  closeTab(tabId: string): Promise<void> {
    return this.tracker.closeTab(tabId);
  }

  touchTab(tabId: string, memoryEstimate?: number): void {
    this.tracker.touchTab(tabId, memoryEstimate);
  }

  listSessions(options?: { includeClosed?: boolean }): SessionInfo[] {
    return this.tracker.listSessions(options);
  }

  onSessionEvent(listener: (event: SessionEvent) => void): () => void {
    this.tracker.addEventListener(listener);
    return () => this.tracker.removeEventListener(listener);
  }

  // ==================== OPERATIONS ====================

  /**
   * Run a browser operation for a workflow under timeout and bounded recovery
   */
  runOperation<T>(workflowId: string, operation: SupervisedOperation<T>, options?: RunOptions): Promise<RecoveryResult<T>> {
    return this.recovery.run(workflowId, operation, options);
  }

  // ==================== PROCESSES ====================

  scan(): Promise<ProcessRecord[]> {
    return this.registry.scan();
  }

  cleanup(mode: CleanupMode = 'live'): Promise<CleanupReport> {
    return this.executor.cleanup(mode);
  }

  getStats(): SupervisorStats {
    return {
      sessions: this.tracker.getStats(),
      usage: this.governor.getUsage(),
      lastCleanup: this.executor.getLastReport(),
      recoveries: this.recovery.getHistory(),
    };
  }

  /**
   * Close every open session and deregister. Browser processes are left to cleanup.
   */
  async shutdown(): Promise<void> {
    await this.closeOpenSessions('Shutting down');
    if (this.registeredPid) {
      removePidFile(this.config.stateDir);
      this.registeredPid = false;
    }
  }

  /**
   * Never rejects; failures are logged per session.
   */
  private async closeOpenSessions(reason: string): Promise<void> {
    const open = this.tracker.listSessions().map((s) => s.id);
    log.info(`${reason}, closing ${open.length} session(s)`);
    const results = await Promise.allSettled(open.map((id) => this.tracker.closeSession(id)));
    for (const result of results) {
      if (result.status === 'rejected') {
        log.warn('Session close failed', { error: result.reason });
      }
    }
  }
}

export function createSupervisor(options?: SupervisorOptions): Supervisor {
  return new Supervisor(options);
}
