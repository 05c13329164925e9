/**
 * Recovery Types
 */

import { RecoverableErrorKind, SupervisorError } from '../errors';
import { CleanupReport, ProcessRecord } from './process';
import { Session } from './session';

export type RecoveryTrigger = RecoverableErrorKind;

export type RecoveryState = 'Detected' | 'Retrying' | 'Recovered' | 'Escalated';

export interface RecoveryAttempt {
  id: string;
  workflowId: string;
  operation: string;
  trigger: RecoveryTrigger;
  state: RecoveryState;
  /** Attempts made so far, the original included */
  attemptCount: number;
  /** When the settle delay ends (epoch ms), null before the corrective action */
  backoffDeadline: number | null;
  outcome: 'pending' | 'recovered' | 'escalated' | 'cancelled';
  startedAt: number;
  finishedAt: number | null;
  lastError: string | null;
  /** Classification snapshot captured when the attempt escalated */
  snapshot: ProcessRecord[] | null;
}

export type SupervisedOperation<T> = (session: Session, signal: AbortSignal) => Promise<T>;

export interface RunOptions {
  /** Label used in logs and escalation context (default: 'operation') */
  name?: string;
  /** Run against this session instead of the workflow's current one */
  sessionId?: string;
  /** Per-attempt deadline (default: configured operation timeout) */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type RecoveryResult<T> =
  | { status: 'succeeded'; value: T; session: Session; attemptCount: number }
  | { status: 'recovered'; value: T; session: Session; attemptCount: number; attempt: RecoveryAttempt }
  | { status: 'failed'; error: Error; attemptCount: number }
  | { status: 'escalated'; error: SupervisorError; attemptCount: number; attempt: RecoveryAttempt }
  | { status: 'cancelled'; verification: CleanupReport | null; attemptCount: number };
