import * as fs from "fs";
import * as path from "path";
import writeFileAtomic from "write-file-atomic";
import { createLogger } from "./logger";

const log = createLogger("PidManager");

/**
 * Get the path to the PID file listing registered supervisor processes.
 * @param stateDir - Directory holding supervisor state.
 */
export function getPidFilePath(stateDir: string): string {
  return path.join(stateDir, "supervisor.pid");
}

function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    return (err as NodeJS.ErrnoException).code === "EPERM";
  }
}

/**
 * Read all PIDs from the PID file.
 * Returns an empty array if the file does not exist or cannot be read.
 */
function readPids(filePath: string): number[] {
  try {
    const content = fs.readFileSync(filePath, "utf8");
    return content
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .map((line) => parseInt(line, 10))
      .filter((pid) => !isNaN(pid) && pid > 0);
  } catch (err: unknown) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code !== "ENOENT") {
      log.error(`Failed to read PID file at ${filePath}`, { error: err });
    }
    return [];
  }
}

function writePids(filePath: string, pids: number[]): void {
  const content = pids.join("\n") + (pids.length > 0 ? "\n" : "");
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    writeFileAtomic.sync(filePath, content, { encoding: "utf8" });
  } catch (err) {
    log.error(`Failed to write PID file at ${filePath}`, { error: err });
  }
}

/**
 * Remove dead PIDs from the PID file.
 * @returns The number of stale PIDs that were removed.
 */
export function cleanStalePids(stateDir: string): number {
  const filePath = getPidFilePath(stateDir);
  const pids = readPids(filePath);
  if (pids.length === 0) {
    return 0;
  }

  const alivePids = pids.filter((pid) => isPidAlive(pid));
  const removedCount = pids.length - alivePids.length;

  if (removedCount > 0) {
    log.info(`Cleaning ${removedCount} stale PID(s) from ${filePath}`);
    writePids(filePath, alivePids);
  }

  return removedCount;
}

/**
 * Register a supervisor PID (default: this process) after cleaning stale entries.
 * Registered live PIDs are always classified Protected. When registering this
 * process, an 'exit' handler deregisters it on normal exit.
 */
export function writePidFile(stateDir: string, pid: number = process.pid): void {
  const filePath = getPidFilePath(stateDir);

  cleanStalePids(stateDir);

  const pids = readPids(filePath);
  if (!pids.includes(pid)) {
    pids.push(pid);
    writePids(filePath, pids);
    log.info(`Registered PID ${pid} in ${filePath}`);
  }

  if (pid === process.pid) {
    process.once("exit", () => {
      removePidFile(stateDir);
    });
  }
}

/**
 * Remove a PID (default: this process) from the PID file.
 * If the file becomes empty after removal, it is deleted.
 */
export function removePidFile(stateDir: string, pid: number = process.pid): void {
  const filePath = getPidFilePath(stateDir);
  const pids = readPids(filePath);
  const remaining = pids.filter((p) => p !== pid);

  if (remaining.length === 0) {
    try {
      fs.unlinkSync(filePath);
      log.debug(`Removed PID file ${filePath} (no active PIDs remain)`);
    } catch (err: unknown) {
      const code = (err as NodeJS.ErrnoException).code;
      if (code !== "ENOENT") {
        log.error(`Failed to delete PID file at ${filePath}`, { error: err });
      }
    }
  } else {
    writePids(filePath, remaining);
    log.debug(`Deregistered PID ${pid} from ${filePath}`);
  }
}

/**
 * List registered PIDs that are still running.
 */
export function listActivePids(stateDir: string): number[] {
  return readPids(getPidFilePath(stateDir)).filter((pid) => isPidAlive(pid));
}
