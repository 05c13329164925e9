/**
 * Process Signaller - graceful and forced termination of worker processes
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { ProcessSignaller, SignalResult } from '../types/process';

const execFileAsync = promisify(execFile);

function errnoCode(err: unknown): string | undefined {
  return (err as NodeJS.ErrnoException).code;
}

function resultFromError(err: unknown): SignalResult {
  const code = errnoCode(err);
  if (code === 'ESRCH') return 'gone';
  if (code === 'EPERM') return 'denied';
  throw err;
}

export class NodeProcessSignaller implements ProcessSignaller {
  private platform: NodeJS.Platform;

  constructor(platform: NodeJS.Platform = process.platform) {
    this.platform = platform;
  }

  async terminate(pid: number): Promise<SignalResult> {
    if (this.platform === 'win32') {
      // taskkill without /F asks the window to close
      return this.taskkill(pid, false);
    }
    return this.send(pid, 'SIGTERM');
  }

  async kill(pid: number): Promise<SignalResult> {
    if (this.platform === 'win32') {
      return this.taskkill(pid, true);
    }
    return this.send(pid, 'SIGKILL');
  }

  isAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (err) {
      // EPERM means process exists but owned by another user
      return errnoCode(err) === 'EPERM';
    }
  }

  private send(pid: number, signal: NodeJS.Signals): SignalResult {
    try {
      process.kill(pid, signal);
      return 'sent';
    } catch (err) {
      return resultFromError(err);
    }
  }

  /**
   * No /T: a tree kill would take Protected or Unrelated children with it.
   * Descendants are targeted individually by the executor.
   */
  private async taskkill(pid: number, force: boolean): Promise<SignalResult> {
    const args = ['/PID', String(pid)];
    if (force) args.push('/F');
    try {
      await execFileAsync('taskkill', args, { windowsHide: true });
      return 'sent';
    } catch {
      return this.isAlive(pid) ? 'denied' : 'gone';
    }
  }
}
