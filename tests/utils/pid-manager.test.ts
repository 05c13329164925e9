/**
 * Tests for the supervisor PID file
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  cleanStalePids,
  getPidFilePath,
  listActivePids,
  removePidFile,
  writePidFile,
} from '../../src/utils/pid-manager';

// Far above any real pid, so kill(pid, 0) reports ESRCH
const DEAD_PID = 999999999;
// Alive for the whole test run and not this process (no exit hook)
const LIVE_PID = process.ppid;

describe('pid-manager', () => {
  let stateDir: string;

  beforeEach(() => {
    stateDir = fs.mkdtempSync(path.join(os.tmpdir(), 'supervisor-pids-'));
  });

  afterEach(() => {
    fs.rmSync(stateDir, { recursive: true, force: true });
  });

  test('getPidFilePath places the file in the state directory', () => {
    expect(getPidFilePath(stateDir)).toBe(path.join(stateDir, 'supervisor.pid'));
  });

  test('writePidFile registers a pid once', () => {
    writePidFile(stateDir, LIVE_PID);
    writePidFile(stateDir, LIVE_PID);

    expect(fs.readFileSync(getPidFilePath(stateDir), 'utf8')).toBe(`${LIVE_PID}\n`);
    expect(listActivePids(stateDir)).toEqual([LIVE_PID]);
  });

  test('writePidFile creates a missing state directory', () => {
    const nested = path.join(stateDir, 'nested', 'state');

    writePidFile(nested, LIVE_PID);

    expect(listActivePids(nested)).toEqual([LIVE_PID]);
  });

  test('cleanStalePids drops dead pids', () => {
    fs.writeFileSync(getPidFilePath(stateDir), `${DEAD_PID}\n${LIVE_PID}\n`);

    expect(cleanStalePids(stateDir)).toBe(1);
    expect(fs.readFileSync(getPidFilePath(stateDir), 'utf8')).toBe(`${LIVE_PID}\n`);
    expect(cleanStalePids(stateDir)).toBe(0);
  });

  test('listActivePids skips garbage and dead entries', () => {
    fs.writeFileSync(getPidFilePath(stateDir), `abc\n\n-5\n${DEAD_PID}\n${LIVE_PID}\n`);

    expect(listActivePids(stateDir)).toEqual([LIVE_PID]);
  });

  test('listActivePids is empty without a PID file', () => {
    expect(listActivePids(stateDir)).toEqual([]);
  });

  test('removePidFile deletes the file when the last pid leaves', () => {
    fs.writeFileSync(getPidFilePath(stateDir), `${DEAD_PID}\n${LIVE_PID}\n`);

    removePidFile(stateDir, DEAD_PID);
    expect(fs.readFileSync(getPidFilePath(stateDir), 'utf8')).toBe(`${LIVE_PID}\n`);

    removePidFile(stateDir, LIVE_PID);
    expect(fs.existsSync(getPidFilePath(stateDir))).toBe(false);

    // Removing from a missing file is harmless
    removePidFile(stateDir, LIVE_PID);
  });
});
