/**
 * Failure classifier - maps a thrown value to a recovery trigger
 *
 * Typed supervisor errors are authoritative. Errors raised by the browser
 * library are recognised by name and message.
 */

import { isRecoverableKind, isSupervisorError, RecoverableErrorKind } from '../errors';

const LOCK_PATTERNS: readonly RegExp[] = [
  /SingletonLock/,
  /ProcessSingleton/,
  /profile (?:appears to be|is) (?:already )?in use/i,
  /user data directory is already in use/i,
  /\bELOCKED\b/,
];

const DISCONNECT_PATTERNS: readonly RegExp[] = [
  /Target closed/i,
  /Session closed/i,
  /Connection closed/i,
  /browser has disconnected/i,
  /WebSocket is not open/i,
  /Navigating frame was detached/i,
  /\bECONNRESET\b/,
  /\bECONNREFUSED\b/,
  /\bEPIPE\b/,
];

const TIMEOUT_PATTERNS: readonly RegExp[] = [/timed? ?out/i, /\bETIMEDOUT\b/];

export function classifyFailure(error: unknown): RecoverableErrorKind | null {
  if (isSupervisorError(error)) {
    return isRecoverableKind(error.kind) ? error.kind : null;
  }
  if (!(error instanceof Error)) {
    return null;
  }

  // Lock errors often mention a timeout while waiting for the lock; check them first
  const text = `${error.name}: ${error.message}`;
  if (LOCK_PATTERNS.some((re) => re.test(text))) {
    return 'LockConflict';
  }
  if (error.name === 'TimeoutError' || TIMEOUT_PATTERNS.some((re) => re.test(text))) {
    return 'Timeout';
  }
  if (DISCONNECT_PATTERNS.some((re) => re.test(text))) {
    return 'Disconnect';
  }
  return null;
}
