/**
 * `cleanup` command - terminate disposable browser workers, keep the supervisor
 */

import { createCleanupStack } from '../src/supervisor';
import { CleanupMode, CleanupReport, ProcessRecord, ProcessSignaller, ProcessSource } from '../src/types/process';
import { isSupervisorError, SupervisorError, toError } from '../src/errors';
import { createLogger } from '../src/utils/logger';
import {
  applyCommandConfig,
  CommonOptions,
  EXIT_ERROR,
  EXIT_FAILURES,
  EXIT_INTERRUPTED,
  EXIT_OK,
  parseMs,
} from './options';

const log = createLogger('Cleanup');

export interface CleanupCommandOptions extends CommonOptions {
  dryRun?: boolean;
  verifyOnly?: boolean;
  gracePeriod?: string;
  includeDescendants?: boolean;
}

export interface CommandDeps {
  source?: ProcessSource;
  signaller?: ProcessSignaller;
  /** stdout writer (default: console.log) */
  out?: (line: string) => void;
  /** Aborted on SIGINT / SIGTERM */
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
}

function describeProcess(record: ProcessRecord): string {
  return `  ${String(record.pid).padStart(7)}  ${record.name}  ${record.command}`;
}

export function formatCleanupReport(report: CleanupReport): string[] {
  const lines: string[] = [];
  if (report.mode === 'dry-run') {
    lines.push(`Dry run: would terminate ${report.terminated.length} process(es)`);
    lines.push(...report.terminated.map(describeProcess));
  } else if (report.mode === 'live') {
    lines.push(`Terminated ${report.terminated.length} of ${report.selected} process(es)`);
    lines.push(...report.terminated.map(describeProcess));
  }

  if (report.errors.length > 0) {
    lines.push(
      report.mode === 'verify-only'
        ? `Verification failed: ${report.errors.length} disposable process(es) still running`
        : `Failed to terminate ${report.errors.length} process(es)`,
    );
    lines.push(...report.errors.map((e) => `${describeProcess(e)}  [${e.reason}]`));
  } else if (report.mode === 'verify-only') {
    lines.push('Verification passed: no disposable processes running');
  }

  lines.push(`Preserved ${report.preserved.length} protected process(es)`);
  lines.push(...report.preserved.map(describeProcess));
  return lines;
}

function resolveMode(options: CleanupCommandOptions): CleanupMode {
  if (options.dryRun && options.verifyOnly) {
    throw new SupervisorError('InvalidConfig', '--dry-run and --verify-only cannot be combined');
  }
  if (options.dryRun) return 'dry-run';
  if (options.verifyOnly) return 'verify-only';
  return 'live';
}

/**
 * Run one cleanup and map the outcome to an exit code:
 * 0 success, 1 targets left running, 2 preservation violation or unexpected error, 130 interrupted.
 * An interrupted run resolves only once the cleanup in flight has settled.
 */
export async function runCleanupCommand(options: CleanupCommandOptions, deps: CommandDeps = {}): Promise<number> {
  const out = deps.out ?? ((line: string) => console.log(line));

  let cleanup: Promise<CleanupReport>;
  try {
    const mode = resolveMode(options);
    const extra = {
      ...(options.gracePeriod !== undefined ? { gracePeriodMs: parseMs('--grace-period', options.gracePeriod) } : {}),
      ...(options.includeDescendants ? { includeDescendants: true } : {}),
    };
    const config = applyCommandConfig(options, extra, deps.env);
    if (deps.signal?.aborted) {
      return EXIT_INTERRUPTED;
    }
    const { executor } = createCleanupStack(config, { source: deps.source, signaller: deps.signaller });
    cleanup = executor.cleanup(mode);
  } catch (error) {
    log.error(toError(error).message);
    return EXIT_ERROR;
  }

  let report: CleanupReport;
  try {
    report = await raceAbort(cleanup, deps.signal);
  } catch (error) {
    if (error instanceof InterruptedError) {
      return finishInterrupted(cleanup);
    }
    if (isSupervisorError(error, 'SupervisorPreservationViolation')) {
      log.error(`ABORTED: ${error.message}`);
      return EXIT_ERROR;
    }
    log.error(`Cleanup failed: ${toError(error).message}`);
    return EXIT_ERROR;
  }

  for (const line of formatCleanupReport(report)) {
    out(line);
  }
  return report.errors.length > 0 ? EXIT_FAILURES : EXIT_OK;
}

/**
 * Signals already sent cannot be taken back, so an interrupted run still waits for
 * the in-flight cleanup and its post-scan before reporting.
 */
async function finishInterrupted(cleanup: Promise<CleanupReport>): Promise<number> {
  log.warn('Interrupted; waiting for the in-flight cleanup to finish its post-scan');
  try {
    const report = await cleanup;
    log.warn(`Interrupted after terminating ${report.terminated.length} of ${report.selected} process(es)`);
  } catch (error) {
    if (isSupervisorError(error, 'SupervisorPreservationViolation')) {
      log.error(`ABORTED: ${error.message}`);
      return EXIT_ERROR;
    }
    log.error(`Cleanup failed after interrupt: ${toError(error).message}`);
  }
  return EXIT_INTERRUPTED;
}

class InterruptedError extends Error {
  constructor() {
    super('Interrupted');
    this.name = 'InterruptedError';
  }
}

function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new InterruptedError());
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
