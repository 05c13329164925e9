/**
 * Supervisor error kinds
 *
 * Caller-correctable kinds are returned immediately. Recoverable kinds are retried at most
 * once inside the recovery engine. Terminal kinds come back inside a RecoveryResult.
 * SupervisorPreservationViolation aborts a cleanup and is never swallowed.
 */

export type CallerErrorKind =
  | 'CapacityExceeded'
  | 'TabLimitExceeded'
  | 'WorkflowConflict'
  | 'InvalidState'
  | 'NotFound'
  | 'InvalidConfig';

export type RecoverableErrorKind = 'Timeout' | 'Disconnect' | 'LockConflict';

export type TerminalErrorKind = 'PersistentLock' | 'Escalated';

export type FatalErrorKind = 'SupervisorPreservationViolation';

export type SupervisorErrorKind =
  | CallerErrorKind
  | RecoverableErrorKind
  | TerminalErrorKind
  | FatalErrorKind;

const RECOVERABLE_KINDS: ReadonlySet<SupervisorErrorKind> = new Set<SupervisorErrorKind>([
  'Timeout',
  'Disconnect',
  'LockConflict',
]);

export class SupervisorError extends Error {
  readonly kind: SupervisorErrorKind;
  readonly context: Record<string, unknown>;

  constructor(kind: SupervisorErrorKind, message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SupervisorError';
    this.kind = kind;
    this.context = context;
  }
}

export function isSupervisorError(error: unknown, kind?: SupervisorErrorKind): error is SupervisorError {
  return error instanceof SupervisorError && (kind === undefined || error.kind === kind);
}

export function isRecoverableKind(kind: SupervisorErrorKind): kind is RecoverableErrorKind {
  return RECOVERABLE_KINDS.has(kind);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
