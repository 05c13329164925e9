/**
 * Process Registry - enumerates OS processes and classifies each one
 *
 * Every scan() is a fresh snapshot: classification is recomputed from the
 * current policy and never reused across scans, since other programs can
 * spawn and kill processes at any time.
 */

import {
  IdentificationPolicy,
  ProcessClass,
  ProcessRecord,
  ProcessSource,
  RawProcess,
} from '../types/process';
import { withPidOverrides } from './policy';
import { createLogger } from '../utils/logger';

const log = createLogger('ProcessRegistry');

/**
 * Pure classification of one record against a policy.
 */
export function classify(record: RawProcess, policy: IdentificationPolicy): ProcessClass {
  return policy.classify(record);
}

export interface ProcessRegistryOptions {
  source: ProcessSource;
  policy: IdentificationPolicy;
  /** Pids to treat as Protected on every scan (e.g. registered supervisor pids) */
  protectedPids?: () => Iterable<number>;
  /** The registry's own pid is never a target (default: process.pid) */
  selfPid?: number;
}

export interface SnapshotSummary {
  total: number;
  protected: number;
  disposable: number;
  unrelated: number;
}

export class ProcessRegistry {
  private source: ProcessSource;
  private policy: IdentificationPolicy;
  private protectedPids: () => Iterable<number>;
  private selfPid: number;

  constructor(options: ProcessRegistryOptions) {
    this.source = options.source;
    this.policy = options.policy;
    this.protectedPids = options.protectedPids ?? (() => []);
    this.selfPid = options.selfPid ?? process.pid;
  }

  getPolicy(): IdentificationPolicy {
    return this.policy;
  }

  /**
   * Capture and classify the process table, ordered by ascending pid.
   */
  async scan(): Promise<ProcessRecord[]> {
    const raw = await this.source.list();
    const scanPolicy = withPidOverrides(this.policy, new Set(this.protectedPids()), new Set([this.selfPid]));

    const records = raw
      .map((proc): ProcessRecord => ({ ...proc, classification: classify(proc, scanPolicy) }))
      .sort((a, b) => a.pid - b.pid);

    const summary = summarize(records);
    log.debug('Scan complete', { ...summary });
    return records;
  }
}

export function summarize(records: readonly ProcessRecord[]): SnapshotSummary {
  const summary: SnapshotSummary = { total: records.length, protected: 0, disposable: 0, unrelated: 0 };
  for (const record of records) {
    if (record.classification === 'Protected') summary.protected++;
    else if (record.classification === 'Disposable') summary.disposable++;
    else summary.unrelated++;
  }
  return summary;
}

/**
 * Pick termination targets from one snapshot.
 *
 * Disposable records are always targets. With includeDescendants, Unrelated
 * descendants of a target are added too. Protected records are never targets,
 * whatever their ancestry.
 */
export function selectTargets(
  snapshot: readonly ProcessRecord[],
  options: { includeDescendants?: boolean; exclude?: ReadonlySet<number> } = {},
): ProcessRecord[] {
  const exclude = options.exclude ?? new Set<number>();
  const targets = new Map<number, ProcessRecord>();
  for (const record of snapshot) {
    if (record.classification === 'Disposable' && !exclude.has(record.pid)) {
      targets.set(record.pid, record);
    }
  }

  if (options.includeDescendants) {
    const children = new Map<number, ProcessRecord[]>();
    for (const record of snapshot) {
      const siblings = children.get(record.ppid) ?? [];
      siblings.push(record);
      children.set(record.ppid, siblings);
    }

    const pending = [...targets.keys()];
    let pid = pending.pop();
    while (pid !== undefined) {
      for (const child of children.get(pid) ?? []) {
        if (child.classification === 'Unrelated' && !targets.has(child.pid) && !exclude.has(child.pid)) {
          targets.set(child.pid, child);
          pending.push(child.pid);
        }
      }
      pid = pending.pop();
    }
  }

  return [...targets.values()]
    .filter((record) => record.classification !== 'Protected')
    .sort((a, b) => a.pid - b.pid);
}
