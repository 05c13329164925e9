/**
 * Tests for ProcessRegistry and target selection
 */

import { classify, ProcessRegistry, selectTargets, summarize } from '../../src/process/registry';
import { MarkerPolicy } from '../../src/process/policy';
import { ProcessClass, ProcessRecord } from '../../src/types/process';
import { FakeProcessTable, SERVER_COMMAND, workerCommand } from '../utils/fake-process-table';

const policy = new MarkerPolicy({
  supervisorMarkers: ['mcp-server-playwright'],
  workerMarkers: ['mcp-chrome-profile'],
});

function record(pid: number, ppid: number, classification: ProcessClass): ProcessRecord {
  return { pid, ppid, name: 'proc', command: `proc-${pid}`, launchTime: null, classification };
}

describe('ProcessRegistry', () => {
  test('scan classifies every record and orders by pid', async () => {
    const table = new FakeProcessTable([
      { pid: 300, command: workerCommand('Default') },
      { pid: 100, command: SERVER_COMMAND, name: 'node' },
      { pid: 200, command: '/usr/bin/chrome --user-data-dir=/home/user/.config/chrome' },
    ]);
    const registry = new ProcessRegistry({ source: table, policy, selfPid: 1 });

    const records = await registry.scan();

    expect(records.map((r) => [r.pid, r.classification])).toEqual([
      [100, 'Protected'],
      [200, 'Unrelated'],
      [300, 'Disposable'],
    ]);
  });

  test('classifies its own pid as Unrelated', async () => {
    const table = new FakeProcessTable([{ pid: 4242, command: workerCommand('Self') }]);
    const registry = new ProcessRegistry({ source: table, policy, selfPid: 4242 });

    const [self] = await registry.scan();

    expect(self.classification).toBe('Unrelated');
  });

  test('registered supervisor pids are Protected whatever their command line', async () => {
    const table = new FakeProcessTable([{ pid: 500, command: workerCommand('Default') }]);
    const registry = new ProcessRegistry({ source: table, policy, selfPid: 1, protectedPids: () => [500] });

    const [worker] = await registry.scan();

    expect(worker.classification).toBe('Protected');
  });

  test('recomputes classification on every scan', async () => {
    const table = new FakeProcessTable([{ pid: 600, command: 'chrome --type=renderer' }]);
    let registered: number[] = [];
    const registry = new ProcessRegistry({ source: table, policy, selfPid: 1, protectedPids: () => registered });

    expect((await registry.scan())[0].classification).toBe('Unrelated');

    table.add({ pid: 600, command: workerCommand('Reused') });
    expect((await registry.scan())[0].classification).toBe('Disposable');

    registered = [600];
    expect((await registry.scan())[0].classification).toBe('Protected');
    expect(table.listCalls).toBe(3);
  });

  test('propagates enumeration failures', async () => {
    const table = new FakeProcessTable();
    table.listError = new Error('ps: command not found');
    const registry = new ProcessRegistry({ source: table, policy, selfPid: 1 });

    await expect(registry.scan()).rejects.toThrow('ps: command not found');
  });

  test('getPolicy returns the configured policy', () => {
    const registry = new ProcessRegistry({ source: new FakeProcessTable(), policy });
    expect(registry.getPolicy()).toBe(policy);
  });
});

describe('classify', () => {
  test('delegates to the policy', () => {
    expect(classify({ pid: 1, ppid: 0, name: 'node', command: SERVER_COMMAND, launchTime: null }, policy)).toBe('Protected');
  });
});

describe('summarize', () => {
  test('counts each class', () => {
    const summary = summarize([
      record(1, 0, 'Protected'),
      record(2, 1, 'Disposable'),
      record(3, 1, 'Disposable'),
      record(4, 1, 'Unrelated'),
    ]);
    expect(summary).toEqual({ total: 4, protected: 1, disposable: 2, unrelated: 1 });
  });
});

describe('selectTargets', () => {
  // 10 server → 20 worker → 30 helper → 31 helper
  //                       → 40 protected child
  const snapshot: ProcessRecord[] = [
    record(10, 1, 'Protected'),
    record(20, 10, 'Disposable'),
    record(30, 20, 'Unrelated'),
    record(31, 30, 'Unrelated'),
    record(40, 20, 'Protected'),
    record(50, 1, 'Unrelated'),
  ];

  test('selects only Disposable records by default', () => {
    expect(selectTargets(snapshot).map((r) => r.pid)).toEqual([20]);
  });

  test('adds Unrelated descendants when asked, never Protected ones', () => {
    expect(selectTargets(snapshot, { includeDescendants: true }).map((r) => r.pid)).toEqual([20, 30, 31]);
  });

  test('never selects excluded pids or their descendants', () => {
    expect(selectTargets(snapshot, { includeDescendants: true, exclude: new Set([20]) })).toEqual([]);
  });

  test('a Protected parent does not shield a Disposable child', () => {
    expect(selectTargets([record(10, 1, 'Protected'), record(11, 10, 'Disposable')]).map((r) => r.pid)).toEqual([11]);
  });
});
