/**
 * Process Source - Cross-platform process table enumeration
 *
 * Uses `ps` on macOS/Linux (not /proc, which is Linux-only) and PowerShell CIM on Windows.
 * Rows that cannot be parsed are dropped; a process that exits between the two `ps`
 * passes is simply absent from the snapshot.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { RawProcess, ProcessSource } from '../types/process';
import { DEFAULT_SCAN_TIMEOUT_MS } from '../config/defaults';

const execFileAsync = promisify(execFile);

export type CommandRunner = (file: string, args: string[]) => Promise<string>;

const defaultRunner: CommandRunner = async (file, args) => {
  const { stdout } = await execFileAsync(file, args, {
    timeout: DEFAULT_SCAN_TIMEOUT_MS,
    maxBuffer: 16 * 1024 * 1024,
    windowsHide: true,
  });
  return stdout;
};

/**
 * Parse `ps` etime ([[DD-]hh:]mm:ss) into seconds. Returns -1 when unparseable.
 */
export function parseElapsedSeconds(etime: string): number {
  const cleaned = etime.trim();
  const match = /^(?:(\d+)-)?(?:(\d+):)?(\d+):(\d+)$/.exec(cleaned);
  if (!match) {
    return -1;
  }
  const [, days, hours, minutes, seconds] = match;
  return (
    parseInt(days ?? '0', 10) * 86400 +
    parseInt(hours ?? '0', 10) * 3600 +
    parseInt(minutes, 10) * 60 +
    parseInt(seconds, 10)
  );
}

interface PsStatRow {
  pid: number;
  ppid: number;
  elapsedSeconds: number;
  name: string;
}

/**
 * Parse `ps -axo pid=,ppid=,etime=,comm=` output. comm may contain spaces (macOS app bundles).
 */
export function parsePsStat(stdout: string): PsStatRow[] {
  const rows: PsStatRow[] = [];
  for (const line of stdout.split('\n')) {
    const match = /^\s*(\d+)\s+(\d+)\s+(\S+)\s+(.+?)\s*$/.exec(line);
    if (!match) continue;
    rows.push({
      pid: parseInt(match[1], 10),
      ppid: parseInt(match[2], 10),
      elapsedSeconds: parseElapsedSeconds(match[3]),
      name: match[4],
    });
  }
  return rows;
}

/**
 * Parse `ps -axo pid=,args=` output into a pid → command line map.
 */
export function parsePsArgs(stdout: string): Map<number, string> {
  const commands = new Map<number, string>();
  for (const line of stdout.split('\n')) {
    const match = /^\s*(\d+)\s+(.*?)\s*$/.exec(line);
    if (!match) continue;
    commands.set(parseInt(match[1], 10), match[2]);
  }
  return commands;
}

export function mergePsOutput(statOut: string, argsOut: string, now: number = Date.now()): RawProcess[] {
  const commands = parsePsArgs(argsOut);
  const processes: RawProcess[] = [];
  for (const row of parsePsStat(statOut)) {
    const command = commands.get(row.pid);
    if (command === undefined) continue;
    processes.push({
      pid: row.pid,
      ppid: row.ppid,
      name: row.name,
      command,
      launchTime: row.elapsedSeconds >= 0 ? now - row.elapsedSeconds * 1000 : null,
    });
  }
  return processes;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Parse `Get-CimInstance Win32_Process | ConvertTo-Json` output.
 * A single process serialises as an object rather than an array.
 */
export function parseWin32Processes(stdout: string): RawProcess[] {
  const trimmed = stdout.trim();
  if (trimmed === '' || trimmed === 'null') {
    return [];
  }
  const parsed: unknown = JSON.parse(trimmed);
  const list: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
  const processes: RawProcess[] = [];

  for (const entry of list) {
    if (!isRecord(entry)) continue;
    const pid = entry.ProcessId;
    const ppid = entry.ParentProcessId;
    if (typeof pid !== 'number' || !Number.isInteger(pid) || pid <= 0) continue;

    const created = typeof entry.Created === 'string' ? Date.parse(entry.Created) : NaN;
    processes.push({
      pid,
      ppid: typeof ppid === 'number' ? ppid : 0,
      name: typeof entry.Name === 'string' ? entry.Name : '',
      command: typeof entry.CommandLine === 'string' ? entry.CommandLine : '',
      launchTime: Number.isNaN(created) ? null : created,
    });
  }
  return processes;
}

const WIN32_QUERY =
  "Get-CimInstance Win32_Process | Select-Object ProcessId,ParentProcessId,Name,CommandLine," +
  "@{n='Created';e={if ($_.CreationDate) { $_.CreationDate.ToString('o') } else { $null }}} | ConvertTo-Json -Compress";

export class PsProcessSource implements ProcessSource {
  private run: CommandRunner;
  private platform: NodeJS.Platform;

  constructor(options: { run?: CommandRunner; platform?: NodeJS.Platform } = {}) {
    this.run = options.run ?? defaultRunner;
    this.platform = options.platform ?? process.platform;
  }

  async list(): Promise<RawProcess[]> {
    if (this.platform === 'win32') {
      const stdout = await this.run('powershell', ['-NoProfile', '-NonInteractive', '-Command', WIN32_QUERY]);
      return parseWin32Processes(stdout);
    }

    const statOut = await this.run('ps', ['-axo', 'pid=,ppid=,etime=,comm=']);
    const argsOut = await this.run('ps', ['-axo', 'pid=,args=']);
    return mergePsOutput(statOut, argsOut);
  }
}
