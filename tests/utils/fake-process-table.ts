/// <reference types="jest" />
/**
 * In-memory process table standing in for `ps` and kill(2)
 */

import { ProcessSignaller, ProcessSource, RawProcess, SignalResult } from '../../src/types/process';

export interface FakeProcess {
  pid: number;
  ppid?: number;
  name?: string;
  command: string;
  launchTime?: number | null;
  /** Survives SIGTERM */
  ignoresTerm?: boolean;
  /** Survives SIGKILL too */
  unkillable?: boolean;
  /** Signals fail with EPERM */
  denied?: boolean;
  /** Pids that exit together with this one */
  takesDown?: number[];
}

export interface SentSignal {
  pid: number;
  signal: 'SIGTERM' | 'SIGKILL';
}

export class FakeProcessTable implements ProcessSource, ProcessSignaller {
  private processes: Map<number, FakeProcess> = new Map();
  readonly sent: SentSignal[] = [];
  listCalls = 0;
  listError: Error | null = null;

  constructor(entries: FakeProcess[] = []) {
    for (const entry of entries) {
      this.add(entry);
    }
  }

  add(entry: FakeProcess): void {
    this.processes.set(entry.pid, entry);
  }

  remove(pid: number): void {
    this.processes.delete(pid);
  }

  pids(): number[] {
    return [...this.processes.keys()].sort((a, b) => a - b);
  }

  async list(): Promise<RawProcess[]> {
    this.listCalls++;
    if (this.listError) {
      throw this.listError;
    }
    return [...this.processes.values()].map((entry) => ({
      pid: entry.pid,
      ppid: entry.ppid ?? 1,
      name: entry.name ?? 'chrome',
      command: entry.command,
      launchTime: entry.launchTime ?? null,
    }));
  }

  async terminate(pid: number): Promise<SignalResult> {
    return this.signal(pid, 'SIGTERM');
  }

  async kill(pid: number): Promise<SignalResult> {
    return this.signal(pid, 'SIGKILL');
  }

  isAlive(pid: number): boolean {
    return this.processes.has(pid);
  }

  private signal(pid: number, signal: SentSignal['signal']): SignalResult {
    const entry = this.processes.get(pid);
    if (!entry) {
      return 'gone';
    }
    if (entry.denied) {
      return 'denied';
    }
    this.sent.push({ pid, signal });

    const survives = signal === 'SIGTERM' ? entry.ignoresTerm || entry.unkillable : entry.unkillable;
    if (!survives) {
      this.processes.delete(pid);
      for (const other of entry.takesDown ?? []) {
        this.processes.delete(other);
      }
    }
    return 'sent';
  }
}

/** Automation server: Protected under the default markers */
export const SERVER_COMMAND = 'node /opt/mcp/node_modules/.bin/mcp-server-playwright --port 8931';

/** Browser worker: Disposable under the default markers */
export function workerCommand(profile: string): string {
  return `/usr/bin/chrome --user-data-dir=/tmp/mcp-chrome-profile --profile-directory=${profile}`;
}
