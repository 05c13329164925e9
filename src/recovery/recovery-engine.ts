/**
 * Recovery Engine - bounded retry for supervised browser operations
 *
 * Per failure: Detected → Retrying → Recovered | Escalated.
 *
 * - Timeout / Disconnect: replace the session, settle, retry once.
 * - LockConflict: clean up disposable lock holders, settle, retry once;
 *   a lock that survives the retry escalates as PersistentLock.
 *
 * The settle delay is fixed and the attempt ceiling is hard. Outcomes are
 * returned, not thrown; only a SupervisorPreservationViolation propagates.
 */

import { v4 as uuidv4 } from 'uuid';
import { SessionTracker } from '../session-tracker';
import { CleanupExecutor } from '../process/cleanup-executor';
import { ProcessRegistry } from '../process/registry';
import { Session } from '../types/session';
import { ProcessRecord, CleanupReport } from '../types/process';
import {
  RecoveryAttempt,
  RecoveryResult,
  RecoveryTrigger,
  RunOptions,
  SupervisedOperation,
} from '../types/recovery';
import { isSupervisorError, SupervisorError, TerminalErrorKind, toError } from '../errors';
import { classifyFailure } from './failure-classifier';
import { createLogger } from '../utils/logger';
import {
  DEFAULT_OPERATION_TIMEOUT_MS,
  DEFAULT_SETTLE_DELAY_MS,
  MAX_RECOVERY_ATTEMPTS,
  MAX_RECOVERY_HISTORY,
} from '../config/defaults';

const log = createLogger('RecoveryEngine');

type AttemptOutcome<T> = { ok: true; value: T } | { ok: false; error: Error };

export interface RecoveryEngineOptions {
  tracker: SessionTracker;
  executor: CleanupExecutor;
  registry: ProcessRegistry;
  /** Per-attempt deadline (default: 30000) */
  operationTimeoutMs?: number;
  /** Fixed pause between the corrective action and the retry (default: 2500) */
  settleDelayMs?: number;
}

function cancellationError(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Operation cancelled');
}

export class RecoveryEngine {
  private tracker: SessionTracker;
  private executor: CleanupExecutor;
  private registry: ProcessRegistry;
  private operationTimeoutMs: number;
  private settleDelayMs: number;
  private history: RecoveryAttempt[] = [];

  constructor(options: RecoveryEngineOptions) {
    this.tracker = options.tracker;
    this.executor = options.executor;
    this.registry = options.registry;
    this.operationTimeoutMs = options.operationTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS;
    this.settleDelayMs = options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
  }

  /**
   * Finished and in-flight attempts, oldest first
   */
  getHistory(): RecoveryAttempt[] {
    return this.history.map((attempt) => ({ ...attempt }));
  }

  async run<T>(workflowId: string, operation: SupervisedOperation<T>, options: RunOptions = {}): Promise<RecoveryResult<T>> {
    const name = options.name ?? 'operation';
    const signal = options.signal;

    let session: Session;
    try {
      session = await this.resolveSession(workflowId, options.sessionId);
    } catch (error) {
      return { status: 'failed', error: toError(error), attemptCount: 0 };
    }

    if (signal?.aborted) {
      return this.cancel(session, 0, null);
    }

    const first = await this.attempt(session, operation, name, options);
    if (first.ok) {
      return { status: 'succeeded', value: first.value, session, attemptCount: 1 };
    }
    if (signal?.aborted) {
      return this.cancel(session, 1, null);
    }

    const trigger = classifyFailure(first.error);
    if (!trigger) {
      log.error(`${name} failed for workflow ${workflowId}`, { error: first.error });
      return { status: 'failed', error: first.error, attemptCount: 1 };
    }

    const attempt = this.record({
      id: uuidv4(),
      workflowId,
      operation: name,
      trigger,
      state: 'Detected',
      attemptCount: 1,
      backoffDeadline: null,
      outcome: 'pending',
      startedAt: Date.now(),
      finishedAt: null,
      lastError: first.error.message,
      snapshot: null,
    });
    log.warn(`${name} hit ${trigger} for workflow ${workflowId}, recovering`, { error: first.error });

    try {
      session = await this.correct(trigger, session, workflowId, attempt, signal);
    } catch (error) {
      if (isSupervisorError(error, 'SupervisorPreservationViolation')) {
        this.finish(attempt, 'Escalated', 'escalated');
        log.error('Cleanup during recovery broke supervisor preservation', { error });
        throw error;
      }
      if (signal?.aborted) {
        return this.cancel(session, attempt.attemptCount, attempt);
      }
      return this.escalate(attempt, trigger === 'LockConflict' ? 'PersistentLock' : 'Escalated', toError(error));
    }

    attempt.state = 'Retrying';
    attempt.attemptCount = Math.min(attempt.attemptCount + 1, MAX_RECOVERY_ATTEMPTS);
    const retry = await this.attempt(session, operation, name, options);

    if (retry.ok) {
      this.finish(attempt, 'Recovered', 'recovered');
      log.info(`${name} recovered from ${trigger} for workflow ${workflowId}`);
      return { status: 'recovered', value: retry.value, session, attemptCount: attempt.attemptCount, attempt: { ...attempt } };
    }
    if (signal?.aborted) {
      return this.cancel(session, attempt.attemptCount, attempt);
    }

    attempt.lastError = retry.error.message;
    const persistentLock = trigger === 'LockConflict' && classifyFailure(retry.error) === 'LockConflict';
    return this.escalate(attempt, persistentLock ? 'PersistentLock' : 'Escalated', retry.error);
  }

  private async resolveSession(workflowId: string, sessionId?: string): Promise<Session> {
    if (sessionId === undefined) {
      return this.tracker.openSession(workflowId, { reuse: true });
    }
    const session = this.tracker.getSession(sessionId);
    if (!session) {
      throw new SupervisorError('NotFound', `Session ${sessionId} not found`, { sessionId });
    }
    if (session.status !== 'Active') {
      throw new SupervisorError('InvalidState', `Session ${sessionId} is ${session.status}`, { sessionId });
    }
    return session;
  }

  /**
   * One attempt under its own deadline, aborted early if the caller cancels
   */
  private async attempt<T>(
    session: Session,
    operation: SupervisedOperation<T>,
    name: string,
    options: RunOptions,
  ): Promise<AttemptOutcome<T>> {
    const timeoutMs = options.timeoutMs ?? this.operationTimeoutMs;
    const controller = new AbortController();
    const outer = options.signal;
    const onOuterAbort = () => controller.abort(outer ? cancellationError(outer) : undefined);
    outer?.addEventListener('abort', onOuterAbort, { once: true });

    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(cancellationError(controller.signal)), { once: true });
    });
    const timer = setTimeout(() => {
      log.warn(`${name} exceeded ${timeoutMs}ms in session ${session.id}`);
      controller.abort(
        new SupervisorError('Timeout', `${name} timed out after ${timeoutMs}ms`, { sessionId: session.id, timeoutMs }),
      );
    }, timeoutMs);

    try {
      const value = await Promise.race([operation(session, controller.signal), aborted]);
      return { ok: true, value };
    } catch (error) {
      return { ok: false, error: toError(error) };
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener('abort', onOuterAbort);
    }
  }

  /**
   * Corrective action for a trigger, followed by the settle delay.
   * Returns the session the retry should run on.
   */
  private async correct(
    trigger: RecoveryTrigger,
    session: Session,
    workflowId: string,
    attempt: RecoveryAttempt,
    signal?: AbortSignal,
  ): Promise<Session> {
    if (trigger === 'LockConflict') {
      const report = await this.executor.cleanup('live');
      if (report.errors.length > 0) {
        log.warn(`${report.errors.length} lock holder(s) survived cleanup`, { pids: report.errors.map((e) => e.pid) });
      }
      await this.settle(attempt, signal);
      if (session.status === 'Active') {
        return session;
      }
      return this.tracker.openSession(workflowId, { reuse: true });
    }

    try {
      await this.tracker.closeSession(session.id);
    } catch (error) {
      log.warn(`Closing failed session ${session.id} failed`, { error: toError(error) });
    }
    await this.settle(attempt, signal);
    return this.tracker.openSession(workflowId);
  }

  private async settle(attempt: RecoveryAttempt, signal?: AbortSignal): Promise<void> {
    attempt.backoffDeadline = Date.now() + this.settleDelayMs;
    await new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(cancellationError(signal));
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        if (signal) reject(cancellationError(signal));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, this.settleDelayMs);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private async escalate<T>(attempt: RecoveryAttempt, kind: TerminalErrorKind, cause: Error): Promise<RecoveryResult<T>> {
    let snapshot: ProcessRecord[] | null = null;
    try {
      snapshot = await this.registry.scan();
    } catch (error) {
      log.warn('Could not capture a process snapshot for escalation', { error: toError(error) });
    }
    attempt.snapshot = snapshot;
    this.finish(attempt, 'Escalated', 'escalated');

    const message = kind === 'PersistentLock'
      ? `${attempt.operation} still blocked by a profile lock after cleanup: ${cause.message}`
      : `${attempt.operation} failed after ${attempt.attemptCount} attempt(s): ${cause.message}`;
    const error = new SupervisorError(
      kind,
      message,
      {
        operation: attempt.operation,
        workflowId: attempt.workflowId,
        trigger: attempt.trigger,
        attemptCount: attempt.attemptCount,
        snapshot,
      },
      { cause },
    );
    log.error(message, { trigger: attempt.trigger, attemptCount: attempt.attemptCount });
    return { status: 'escalated', error, attemptCount: attempt.attemptCount, attempt: { ...attempt } };
  }

  /**
   * Release the session, then confirm the Protected set is intact before returning
   */
  private async cancel<T>(session: Session, attemptCount: number, attempt: RecoveryAttempt | null): Promise<RecoveryResult<T>> {
    try {
      await this.tracker.closeSession(session.id);
    } catch (error) {
      log.warn(`Closing cancelled session ${session.id} failed`, { error: toError(error) });
    }

    let verification: CleanupReport | null = null;
    try {
      verification = await this.executor.cleanup('verify-only');
    } catch (error) {
      if (isSupervisorError(error, 'SupervisorPreservationViolation')) {
        throw error;
      }
      log.error('Verification after cancel failed', { error: toError(error) });
    }

    if (attempt) {
      this.finish(attempt, attempt.state, 'cancelled');
    }
    log.info(`Cancelled operation in session ${session.id}`);
    return { status: 'cancelled', verification, attemptCount };
  }

  private record(attempt: RecoveryAttempt): RecoveryAttempt {
    this.history.push(attempt);
    while (this.history.length > MAX_RECOVERY_HISTORY) {
      this.history.shift();
    }
    return attempt;
  }

  private finish(attempt: RecoveryAttempt, state: RecoveryAttempt['state'], outcome: RecoveryAttempt['outcome']): void {
    attempt.state = state;
    attempt.outcome = outcome;
    attempt.finishedAt = Date.now();
  }
}
