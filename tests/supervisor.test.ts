/**
 * Tests for the Supervisor facade
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createSupervisor, Supervisor } from '../src/supervisor';
import { SupervisorError } from '../src/errors';
import { SessionEvent } from '../src/types/session';
import { getPidFilePath, listActivePids } from '../src/utils/pid-manager';
import { FakeBackend } from './utils/fake-backend';
import { getCapturedLogs } from './setup';
import { FakeProcessTable, SERVER_COMMAND, workerCommand } from './utils/fake-process-table';

const SERVER = 5000100;
const WORKER = 5000200;

describe('Supervisor', () => {
  let stateDir: string;
  let backend: FakeBackend;
  let table: FakeProcessTable;
  let supervisor: Supervisor;

  beforeEach(() => {
    stateDir = fs.mkdtempSync(path.join(os.tmpdir(), 'supervisor-facade-'));
    backend = new FakeBackend();
    table = new FakeProcessTable([
      { pid: SERVER, name: 'node', command: SERVER_COMMAND },
      { pid: WORKER, ppid: SERVER, command: workerCommand('w1') },
    ]);
    supervisor = createSupervisor({
      config: { stateDir, maxSessions: 2, settleDelayMs: 0, gracePeriodMs: 20, killWaitMs: 20 },
      backend,
      source: table,
      signaller: table,
      registerPid: false,
    });
  });

  afterEach(async () => {
    await supervisor.shutdown();
    fs.rmSync(stateDir, { recursive: true, force: true });
  });

  test('routes session and tab calls to the tracker and reports events', async () => {
    const events: SessionEvent['type'][] = [];
    const unsubscribe = supervisor.onSessionEvent((event) => events.push(event.type));

    const session = await supervisor.openSession('wf-1');
    const tab = await supervisor.openTab(session.id);
    supervisor.touchTab(tab.id, 1024);

    expect(supervisor.listSessions()).toEqual([
      expect.objectContaining({ workflowId: 'wf-1', status: 'Active', tabCount: 1, memoryEstimate: 1024 }),
    ]);

    await supervisor.closeSession(session.id);
    unsubscribe();
    await supervisor.openSession('wf-2');

    expect(events).toEqual(['session:opened', 'tab:opened', 'tab:closed', 'session:closed']);
    expect(backend.pages.size).toBe(0);
    expect(supervisor.listSessions({ includeClosed: true })).toHaveLength(2);
  });

  test('closing a session never signals a process', async () => {
    const session = await supervisor.openSession('wf-1');
    await supervisor.openTab(session.id);

    await supervisor.closeSession(session.id);

    expect(table.sent).toEqual([]);
    expect(table.pids()).toEqual([SERVER, WORKER]);
  });

  test('enforces the configured session ceiling', async () => {
    await supervisor.openSession('wf-1');
    const suspended = await supervisor.openSession('wf-2');
    await supervisor.suspendSession(suspended.id);

    await expect(supervisor.openSession('wf-3')).rejects.toMatchObject({ kind: 'CapacityExceeded' });
    expect(supervisor.getStats().usage).toMatchObject({ maxSessions: 2, sessions: 2 });
  });

  test('runOperation recovers from a dropped connection on a fresh session', async () => {
    let calls = 0;
    const sessionsSeen: string[] = [];

    const result = await supervisor.runOperation(
      'wf-1',
      async (session) => {
        sessionsSeen.push(session.id);
        calls++;
        if (calls === 1) {
          throw new SupervisorError('Disconnect', 'Target closed');
        }
        return 'done';
      },
      { name: 'navigate' },
    );

    expect(result.status).toBe('recovered');
    expect(result.attemptCount).toBe(2);
    expect(new Set(sessionsSeen).size).toBe(2);
    expect(backend.createContext).toHaveBeenCalledTimes(2);

    const [attempt] = supervisor.getStats().recoveries;
    expect(attempt).toMatchObject({ workflowId: 'wf-1', operation: 'navigate', trigger: 'Disconnect', state: 'Recovered' });
  });

  test('cleanup terminates workers and keeps the report', async () => {
    const report = await supervisor.cleanup();

    expect(report.terminated.map((r) => r.pid)).toEqual([WORKER]);
    expect(report.preserved.map((r) => r.pid)).toEqual([SERVER]);
    expect(supervisor.getStats().lastCleanup).toBe(report);
    expect(fs.existsSync(path.join(stateDir, 'baseline.json'))).toBe(true);
  });

  test('scan classifies through the configured policy', async () => {
    const records = await supervisor.scan();

    expect(records.map((r) => [r.pid, r.classification])).toEqual([
      [SERVER, 'Protected'],
      [WORKER, 'Disposable'],
    ]);
  });

  test('shutdown closes open sessions', async () => {
    const a = await supervisor.openSession('wf-1');
    const b = await supervisor.openSession('wf-2');

    await supervisor.shutdown();

    expect(supervisor.listSessions()).toEqual([]);
    expect(backend.closeContext).toHaveBeenCalledWith(a.contextId);
    expect(backend.closeContext).toHaveBeenCalledWith(b.contextId);
    expect(supervisor.getStats().sessions).toMatchObject({ closed: 2, totalSessionsClosed: 2 });
  });

  test('a dropped browser connection closes every open session', async () => {
    const a = await supervisor.openSession('wf-1');
    const b = await supervisor.openSession('wf-2');
    await supervisor.openTab(a.id);

    backend.simulateDisconnect();
    await new Promise((r) => setTimeout(r, 10));

    expect(supervisor.listSessions()).toEqual([]);
    expect(backend.closeContext).toHaveBeenCalledWith(a.contextId);
    expect(backend.closeContext).toHaveBeenCalledWith(b.contextId);
    expect(supervisor.getStats().usage).toMatchObject({ sessions: 0 });
    expect(getCapturedLogs()).toContain('[Supervisor] Browser disconnected, closing 2 session(s)');

    const fresh = await supervisor.openSession('wf-1');
    expect(fresh.id).not.toBe(a.id);
    expect(fresh.status).toBe('Active');
  });
});

describe('Supervisor PID registration', () => {
  let stateDir: string;

  beforeEach(() => {
    stateDir = fs.mkdtempSync(path.join(os.tmpdir(), 'supervisor-pid-'));
  });

  afterEach(() => {
    fs.rmSync(stateDir, { recursive: true, force: true });
  });

  test('registers this process while running and deregisters on shutdown', async () => {
    const supervisor = new Supervisor({
      config: { stateDir },
      backend: new FakeBackend(),
      source: new FakeProcessTable(),
      signaller: new FakeProcessTable(),
    });

    expect(listActivePids(stateDir)).toEqual([process.pid]);

    await supervisor.shutdown();

    expect(fs.existsSync(getPidFilePath(stateDir))).toBe(false);
  });
});
