/**
 * Cleanup Executor - the only component allowed to signal processes
 *
 * live:        SIGTERM every Disposable target, SIGKILL survivors after the grace
 *              period, then re-scan and check the Protected set.
 * dry-run:     report the selection, signal nothing.
 * verify-only: re-scan and check the Protected set against the last baseline.
 *
 * A Protected process disappearing because of a cleanup is a
 * SupervisorPreservationViolation and aborts the run.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as lockfile from 'proper-lockfile';
import writeFileAtomic from 'write-file-atomic';
import {
  CleanupFailure,
  CleanupFailureReason,
  CleanupMode,
  CleanupReport,
  ProcessRecord,
  ProcessSignaller,
} from '../types/process';
import { ProcessRegistry, selectTargets } from './registry';
import { SupervisorError } from '../errors';
import { RequestQueue } from '../utils/request-queue';
import { createLogger } from '../utils/logger';
import {
  DEFAULT_CLEANUP_LOCK_RETRIES,
  DEFAULT_CLEANUP_LOCK_STALE_MS,
  DEFAULT_EXIT_POLL_INTERVAL_MS,
  DEFAULT_GRACE_PERIOD_MS,
  DEFAULT_KILL_WAIT_MS,
} from '../config/defaults';

const log = createLogger('CleanupExecutor');

export interface CleanupExecutorOptions {
  registry: ProcessRegistry;
  signaller: ProcessSignaller;
  /** SIGTERM → SIGKILL grace period (default: 5000) */
  gracePeriodMs?: number;
  /** Wait after SIGKILL before a target counts as survived (default: 2000) */
  killWaitMs?: number;
  /** Liveness poll interval (default: 100) */
  pollIntervalMs?: number;
  /** Also target Unrelated descendants of Disposable workers */
  includeDescendants?: boolean;
  /** Cross-process lock file; null keeps the lock in-process only */
  lockFile?: string | null;
  /** Attempts to take a held lock before failing with LockConflict (default: 30) */
  lockRetries?: number;
  /** Where the Protected baseline for verify-only is persisted; null disables */
  baselineFile?: string | null;
  /** Pids never targeted (default: this process and its parent) */
  excludePids?: number[];
}

export interface CleanupBaseline {
  capturedAt: number;
  protected: ProcessRecord[];
}

function isProcessRecord(value: unknown): value is ProcessRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'pid' in value &&
    typeof value.pid === 'number' &&
    'ppid' in value &&
    typeof value.ppid === 'number' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'command' in value &&
    typeof value.command === 'string' &&
    'classification' in value &&
    typeof value.classification === 'string' &&
    'launchTime' in value &&
    (typeof value.launchTime === 'number' || value.launchTime === null)
  );
}

function isBaseline(value: unknown): value is CleanupBaseline {
  return (
    typeof value === 'object' &&
    value !== null &&
    'capturedAt' in value &&
    typeof value.capturedAt === 'number' &&
    'protected' in value &&
    Array.isArray(value.protected) &&
    value.protected.every(isProcessRecord)
  );
}

function protectedOf(records: readonly ProcessRecord[]): ProcessRecord[] {
  return records.filter((r) => r.classification === 'Protected');
}

/**
 * Post-condition: no targeted pid was Protected, and a non-empty Protected set stays non-empty.
 * Throws SupervisorPreservationViolation otherwise.
 */
export function verifyPreservation(
  before: readonly ProcessRecord[],
  after: readonly ProcessRecord[],
  targetedPids: ReadonlySet<number>,
): void {
  const protectedBefore = protectedOf(before);
  const protectedAfter = protectedOf(after);
  const afterPids = new Set(after.map((r) => r.pid));

  const targetedProtected = protectedBefore.filter((r) => targetedPids.has(r.pid));
  if (targetedProtected.length > 0) {
    throw new SupervisorError(
      'SupervisorPreservationViolation',
      `Protected process(es) were selected for termination: ${targetedProtected.map((r) => r.pid).join(', ')}`,
      { targeted: targetedProtected },
    );
  }

  if (protectedBefore.length > 0 && protectedAfter.length === 0) {
    throw new SupervisorError(
      'SupervisorPreservationViolation',
      `All ${protectedBefore.length} protected process(es) are gone after cleanup`,
      { before: protectedBefore },
    );
  }

  const vanished = protectedBefore.filter((r) => !afterPids.has(r.pid));
  if (vanished.length > 0) {
    log.warn('Protected process(es) exited during cleanup without being targeted', {
      pids: vanished.map((r) => r.pid),
    });
  }
}

export class CleanupExecutor {
  private registry: ProcessRegistry;
  private signaller: ProcessSignaller;
  private gracePeriodMs: number;
  private killWaitMs: number;
  private pollIntervalMs: number;
  private includeDescendants: boolean;
  private lockFile: string | null;
  private lockRetries: number;
  private baselineFile: string | null;
  private excludePids: Set<number>;
  // No item timeout: a timed-out run would keep signalling while the next one starts,
  // and a preservation violation it threw later would be lost.
  private queue = new RequestQueue('cleanup', null);
  private lastReport: CleanupReport | null = null;

  constructor(options: CleanupExecutorOptions) {
    this.registry = options.registry;
    this.signaller = options.signaller;
    this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
    this.killWaitMs = options.killWaitMs ?? DEFAULT_KILL_WAIT_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_EXIT_POLL_INTERVAL_MS;
    this.includeDescendants = options.includeDescendants ?? false;
    this.lockFile = options.lockFile ?? null;
    this.lockRetries = options.lockRetries ?? DEFAULT_CLEANUP_LOCK_RETRIES;
    this.baselineFile = options.baselineFile ?? null;
    this.excludePids = new Set(options.excludePids ?? [process.pid, process.ppid]);
  }

  getLastReport(): CleanupReport | null {
    return this.lastReport;
  }

  /**
   * Run one cleanup. Concurrent calls queue behind each other, and behind
   * cleanups of other supervisor processes sharing the lock file.
   */
  async cleanup(mode: CleanupMode): Promise<CleanupReport> {
    return this.withGlobalLock(async () => {
      const report = mode === 'verify-only' ? await this.verifyOnly() : await this.run(mode);
      this.lastReport = report;
      return report;
    });
  }

  /**
   * verify-only with an explicit baseline (e.g. captured before a manual cleanup)
   */
  async verify(baseline?: CleanupBaseline): Promise<CleanupReport> {
    return this.withGlobalLock(async () => {
      const report = await this.verifyOnly(baseline);
      this.lastReport = report;
      return report;
    });
  }

  private async run(mode: 'live' | 'dry-run'): Promise<CleanupReport> {
    const startedAt = Date.now();
    const before = await this.registry.scan();
    const targets = selectTargets(before, {
      includeDescendants: this.includeDescendants,
      exclude: this.excludePids,
    });
    const preservedBefore = protectedOf(before);

    log.info(`Cleanup (${mode}): ${targets.length} target(s), ${preservedBefore.length} protected`);
    for (const target of targets) {
      log.debug(`Target ${target.pid} ${target.name}`, { command: target.command });
    }

    await this.saveBaseline(preservedBefore);

    if (mode === 'dry-run') {
      return {
        mode,
        selected: targets.length,
        terminated: targets,
        preserved: preservedBefore,
        errors: [],
        startedAt,
        durationMs: Date.now() - startedAt,
      };
    }

    const failures = await this.terminateAll(targets);

    const after = await this.registry.scan();
    verifyPreservation(before, after, new Set(targets.map((t) => t.pid)));

    const errors: CleanupFailure[] = [];
    const terminated: ProcessRecord[] = [];
    for (const target of targets) {
      const reason = failures.get(target.pid);
      if (reason) {
        errors.push({ ...target, reason });
      } else {
        terminated.push(target);
      }
    }

    if (errors.length > 0) {
      log.warn(`${errors.length} target(s) could not be terminated`, {
        pids: errors.map((e) => e.pid),
      });
    }
    log.info(`Cleanup (live): terminated ${terminated.length}, preserved ${protectedOf(after).length}`);

    return {
      mode,
      selected: targets.length,
      terminated,
      preserved: protectedOf(after),
      errors,
      startedAt,
      durationMs: Date.now() - startedAt,
    };
  }

  private async terminateAll(targets: readonly ProcessRecord[]): Promise<Map<number, CleanupFailureReason>> {
    const failures = new Map<number, CleanupFailureReason>();
    const signalled: number[] = [];

    for (const target of targets) {
      const result = await this.signaller.terminate(target.pid);
      if (result === 'denied') {
        log.error(`Permission denied terminating ${target.pid}`);
        failures.set(target.pid, 'denied');
      } else if (result === 'sent') {
        signalled.push(target.pid);
      }
    }

    const survivors = await this.waitForExit(signalled, this.gracePeriodMs);
    if (survivors.length === 0) {
      return failures;
    }

    log.warn(`${survivors.length} process(es) ignored SIGTERM after ${this.gracePeriodMs}ms, forcing`);
    const killed: number[] = [];
    for (const pid of survivors) {
      const result = await this.signaller.kill(pid);
      if (result === 'denied') {
        failures.set(pid, 'denied');
      } else if (result === 'sent') {
        killed.push(pid);
      }
    }

    for (const pid of await this.waitForExit(killed, this.killWaitMs)) {
      log.error(`Process ${pid} still running after SIGKILL`);
      failures.set(pid, 'survived');
    }
    return failures;
  }

  /**
   * Poll until every pid has exited or the timeout passes. Returns the pids still alive.
   */
  private async waitForExit(pids: readonly number[], timeoutMs: number): Promise<number[]> {
    let alive = pids.filter((pid) => this.signaller.isAlive(pid));
    const deadline = Date.now() + timeoutMs;
    while (alive.length > 0 && Date.now() < deadline) {
      await new Promise((r) => setTimeout(r, this.pollIntervalMs));
      alive = alive.filter((pid) => this.signaller.isAlive(pid));
    }
    return alive;
  }

  private async verifyOnly(explicitBaseline?: CleanupBaseline): Promise<CleanupReport> {
    const startedAt = Date.now();
    const baseline = explicitBaseline ?? this.loadBaseline();
    const after = await this.registry.scan();

    // Without a baseline there is no "before" to compare against; the current
    // Protected set is still reported.
    const before = baseline ? baseline.protected.map((r) => ({ ...r, classification: 'Protected' as const })) : [];
    verifyPreservation(before, after, new Set());

    const errors: CleanupFailure[] = after
      .filter((r) => r.classification === 'Disposable' && !this.excludePids.has(r.pid))
      .map((r) => ({ ...r, reason: 'still-running' as const }));

    if (errors.length > 0) {
      log.warn(`${errors.length} disposable process(es) still running`, { pids: errors.map((e) => e.pid) });
    } else {
      log.info('Verification passed: no disposable processes running');
    }

    return {
      mode: 'verify-only',
      selected: 0,
      terminated: [],
      preserved: protectedOf(after),
      errors,
      startedAt,
      durationMs: Date.now() - startedAt,
    };
  }

  private async saveBaseline(protectedRecords: ProcessRecord[]): Promise<void> {
    if (!this.baselineFile) return;
    const baseline: CleanupBaseline = { capturedAt: Date.now(), protected: protectedRecords };
    try {
      fs.mkdirSync(path.dirname(this.baselineFile), { recursive: true });
      await writeFileAtomic(this.baselineFile, JSON.stringify(baseline, null, 2), { encoding: 'utf8' });
    } catch (err) {
      // The cleanup itself does not depend on the baseline
      log.warn(`Failed to write baseline ${this.baselineFile}`, { error: err });
    }
  }

  loadBaseline(): CleanupBaseline | null {
    if (!this.baselineFile) return null;
    let content: string;
    try {
      content = fs.readFileSync(this.baselineFile, 'utf8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
        log.warn(`Failed to read baseline ${this.baselineFile}`, { error: err });
      }
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(content);
      if (isBaseline(parsed)) {
        return parsed;
      }
      log.warn(`Ignoring malformed baseline ${this.baselineFile}`);
    } catch (err) {
      log.warn(`Ignoring corrupted baseline ${this.baselineFile}`, { error: err });
    }
    return null;
  }

  private async withGlobalLock<T>(fn: () => Promise<T>): Promise<T> {
    return this.queue.enqueue(async () => {
      const lockPath = this.lockFile;
      if (!lockPath) {
        return fn();
      }

      fs.mkdirSync(path.dirname(lockPath), { recursive: true });
      let release: () => Promise<void>;
      try {
        release = await lockfile.lock(lockPath, {
          realpath: false,
          stale: DEFAULT_CLEANUP_LOCK_STALE_MS,
          retries: { retries: this.lockRetries, minTimeout: 100, maxTimeout: 1000 },
        });
      } catch (err) {
        throw new SupervisorError('LockConflict', `Another cleanup holds ${lockPath}`, { lockFile: lockPath }, { cause: err });
      }

      try {
        return await fn();
      } finally {
        await release();
      }
    });
  }
}
