/**
 * Identification policies - decide Protected / Disposable / Unrelated for one process
 *
 * Precedence is the same for every policy: a supervisor match wins over a worker
 * match, and anything matching neither is Unrelated.
 */

import { IdentificationPolicy, ProcessClass, RawProcess } from '../types/process';
import { PolicyConfig } from '../config/global';

const TOKEN_CHAR = /[A-Za-z0-9_-]/;

function isTokenChar(ch: string | undefined): boolean {
  return ch !== undefined && TOKEN_CHAR.test(ch);
}

/**
 * Case-sensitive whole-token substring match. The characters on either side of the
 * occurrence must not extend the token (letters, digits, '_' or '-').
 */
export function containsToken(haystack: string, token: string): boolean {
  if (token.length === 0) {
    return false;
  }
  const checkBefore = isTokenChar(token[0]);
  const checkAfter = isTokenChar(token[token.length - 1]);

  let from = 0;
  for (;;) {
    const idx = haystack.indexOf(token, from);
    if (idx === -1) {
      return false;
    }
    const beforeOk = !checkBefore || idx === 0 || !isTokenChar(haystack[idx - 1]);
    const afterOk = !checkAfter || !isTokenChar(haystack[idx + token.length]);
    if (beforeOk && afterOk) {
      return true;
    }
    from = idx + 1;
  }
}

export function executableBasename(name: string): string {
  const parts = name.split(/[\\/]/);
  return parts[parts.length - 1] ?? name;
}

function matchesExecutable(name: string, executables: readonly string[]): boolean {
  if (executables.length === 0) {
    return true;
  }
  const base = executableBasename(name).toLowerCase();
  return executables.some((exe) => base.includes(exe.toLowerCase()));
}

export interface MarkerPolicyOptions {
  supervisorMarkers: readonly string[];
  workerMarkers: readonly string[];
  workerExecutables?: readonly string[];
}

export class MarkerPolicy implements IdentificationPolicy {
  readonly name = 'marker';
  private supervisorMarkers: readonly string[];
  private workerMarkers: readonly string[];
  private workerExecutables: readonly string[];

  constructor(options: MarkerPolicyOptions) {
    this.supervisorMarkers = options.supervisorMarkers.filter((m) => m.length > 0);
    this.workerMarkers = options.workerMarkers.filter((m) => m.length > 0);
    this.workerExecutables = options.workerExecutables ?? [];
  }

  classify(record: RawProcess): ProcessClass {
    if (this.supervisorMarkers.some((marker) => containsToken(record.command, marker))) {
      return 'Protected';
    }
    if (
      this.workerMarkers.some((marker) => containsToken(record.command, marker)) &&
      matchesExecutable(record.name, this.workerExecutables)
    ) {
      return 'Disposable';
    }
    return 'Unrelated';
  }
}

export interface RegexPolicyOptions {
  supervisorPatterns: readonly RegExp[];
  workerPatterns: readonly RegExp[];
}

/**
 * Regex-based variant for signatures that do not tokenise cleanly
 */
export class RegexPolicy implements IdentificationPolicy {
  readonly name = 'regex';
  private supervisorPatterns: RegExp[];
  private workerPatterns: RegExp[];

  constructor(options: RegexPolicyOptions) {
    // Stateful 'g'/'y' flags would make test() depend on the previous call
    const stateless = (re: RegExp) => new RegExp(re.source, re.flags.replace(/[gy]/g, ''));
    this.supervisorPatterns = options.supervisorPatterns.map(stateless);
    this.workerPatterns = options.workerPatterns.map(stateless);
  }

  classify(record: RawProcess): ProcessClass {
    if (this.supervisorPatterns.some((re) => re.test(record.command))) {
      return 'Protected';
    }
    if (this.workerPatterns.some((re) => re.test(record.command))) {
      return 'Disposable';
    }
    return 'Unrelated';
  }
}

/**
 * Wrap a policy so the given pids are Protected and the excluded pids Unrelated,
 * whatever their command line says.
 */
export function withPidOverrides(
  policy: IdentificationPolicy,
  protectedPids: ReadonlySet<number>,
  excludedPids: ReadonlySet<number> = new Set(),
): IdentificationPolicy {
  return {
    name: `${policy.name}+pids`,
    classify(record: RawProcess): ProcessClass {
      if (protectedPids.has(record.pid)) {
        return 'Protected';
      }
      if (excludedPids.has(record.pid)) {
        return 'Unrelated';
      }
      return policy.classify(record);
    },
  };
}

export function createPolicyFromConfig(config: PolicyConfig): MarkerPolicy {
  return new MarkerPolicy({
    supervisorMarkers: config.supervisorMarkers,
    workerMarkers: config.workerMarkers,
    workerExecutables: config.workerExecutables,
  });
}
