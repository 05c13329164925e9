/**
 * Process Types
 */

export type ProcessClass = 'Protected' | 'Disposable' | 'Unrelated';

/**
 * One row of the OS process table as reported by a ProcessSource.
 */
export interface RawProcess {
  pid: number;
  ppid: number;
  /** Executable name (comm / image name) */
  name: string;
  /** Full command line, argv joined with single spaces */
  command: string;
  /** Epoch ms, or null when the platform does not report it */
  launchTime: number | null;
}

/**
 * A classified process. The classification is derived from one scan and
 * is never carried over to the next.
 */
export interface ProcessRecord extends RawProcess {
  classification: ProcessClass;
}

/**
 * Pluggable identification strategy (marker substring, regex, ...)
 */
export interface IdentificationPolicy {
  readonly name: string;
  classify(record: RawProcess): ProcessClass;
}

/**
 * Enumerates the OS process table
 */
export interface ProcessSource {
  list(): Promise<RawProcess[]>;
}

export type SignalResult = 'sent' | 'gone' | 'denied';

/**
 * Delivers termination signals and checks liveness
 */
export interface ProcessSignaller {
  terminate(pid: number): Promise<SignalResult>;
  kill(pid: number): Promise<SignalResult>;
  isAlive(pid: number): boolean;
}

export type CleanupMode = 'live' | 'dry-run' | 'verify-only';

export interface CleanupReport {
  mode: CleanupMode;
  /** Terminated (live), would-be terminated (dry-run), empty (verify-only) */
  terminated: ProcessRecord[];
  /** Protected records seen by the final scan */
  preserved: ProcessRecord[];
  /** Targets that could not be signalled or survived SIGKILL; verify-only: disposable survivors */
  errors: CleanupFailure[];
  /** Disposable targets selected by the pre-scan (verify-only: none) */
  selected: number;
  startedAt: number;
  durationMs: number;
}

export type CleanupFailureReason = 'denied' | 'survived' | 'still-running';

export interface CleanupFailure extends ProcessRecord {
  reason: CleanupFailureReason;
}
