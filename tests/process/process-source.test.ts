/**
 * Tests for process table enumeration and parsing
 */

import {
  mergePsOutput,
  parseElapsedSeconds,
  parsePsArgs,
  parsePsStat,
  parseWin32Processes,
  PsProcessSource,
} from '../../src/process/process-source';

describe('parseElapsedSeconds', () => {
  test('parses mm:ss, hh:mm:ss and dd-hh:mm:ss', () => {
    expect(parseElapsedSeconds('05:03')).toBe(303);
    expect(parseElapsedSeconds('1:02:03')).toBe(3723);
    expect(parseElapsedSeconds('2-01:00:00')).toBe(176400);
    expect(parseElapsedSeconds('  00:07 ')).toBe(7);
  });

  test('returns -1 for unparseable values', () => {
    expect(parseElapsedSeconds('abc')).toBe(-1);
    expect(parseElapsedSeconds('')).toBe(-1);
  });
});

describe('parsePsStat', () => {
  test('keeps spaces inside the executable name', () => {
    const rows = parsePsStat('  123     1 01:00 Google Chrome Helper (Renderer)\n  7 0 10:00 launchd\n');
    expect(rows).toEqual([
      { pid: 123, ppid: 1, elapsedSeconds: 60, name: 'Google Chrome Helper (Renderer)' },
      { pid: 7, ppid: 0, elapsedSeconds: 600, name: 'launchd' },
    ]);
  });

  test('skips malformed lines', () => {
    expect(parsePsStat('garbage\n\n  12 x 00:01 sh\n')).toEqual([]);
  });
});

describe('parsePsArgs', () => {
  test('maps pid to the full command line', () => {
    const commands = parsePsArgs('  123 /usr/bin/chrome --user-data-dir=/tmp/a  \n   45 node server.js\n');
    expect(commands.get(123)).toBe('/usr/bin/chrome --user-data-dir=/tmp/a');
    expect(commands.get(45)).toBe('node server.js');
    expect(commands.size).toBe(2);
  });
});

describe('mergePsOutput', () => {
  test('joins both passes and derives launch time from elapsed time', () => {
    const statOut = '  10 1 01:00 node\n  20 10 bogus chrome\n  30 10 00:05 chrome\n';
    const argsOut = '  10 node mcp-server-playwright\n  20 chrome --type=gpu-process\n';

    expect(mergePsOutput(statOut, argsOut, 1_000_000)).toEqual([
      { pid: 10, ppid: 1, name: 'node', command: 'node mcp-server-playwright', launchTime: 940_000 },
      { pid: 20, ppid: 10, name: 'chrome', command: 'chrome --type=gpu-process', launchTime: null },
    ]);
  });
});

describe('parseWin32Processes', () => {
  test('accepts an array of CIM rows', () => {
    const stdout = JSON.stringify([
      { ProcessId: 4, ParentProcessId: 0, Name: 'System', CommandLine: null, Created: null },
      {
        ProcessId: 900,
        ParentProcessId: 4,
        Name: 'chrome.exe',
        CommandLine: 'chrome.exe --user-data-dir=C:\\tmp\\mcp-chrome-profile',
        Created: '2026-01-02T03:04:05.000Z',
      },
    ]);

    expect(parseWin32Processes(stdout)).toEqual([
      { pid: 4, ppid: 0, name: 'System', command: '', launchTime: null },
      {
        pid: 900,
        ppid: 4,
        name: 'chrome.exe',
        command: 'chrome.exe --user-data-dir=C:\\tmp\\mcp-chrome-profile',
        launchTime: Date.parse('2026-01-02T03:04:05.000Z'),
      },
    ]);
  });

  test('accepts a single object and empty output', () => {
    expect(parseWin32Processes('{"ProcessId":8,"ParentProcessId":4,"Name":"node.exe","CommandLine":"node"}')).toEqual([
      { pid: 8, ppid: 4, name: 'node.exe', command: 'node', launchTime: null },
    ]);
    expect(parseWin32Processes('')).toEqual([]);
    expect(parseWin32Processes('null')).toEqual([]);
  });

  test('drops rows without a usable pid', () => {
    expect(parseWin32Processes('[{"ProcessId":0},{"Name":"x"}]')).toEqual([]);
  });
});

describe('PsProcessSource', () => {
  test('runs both ps passes on POSIX platforms', async () => {
    const run = jest.fn(async (_file: string, args: string[]) =>
      args[1] === 'pid=,ppid=,etime=,comm=' ? '  10 1 00:01 node\n' : '  10 node mcp-server-playwright\n',
    );
    const source = new PsProcessSource({ run, platform: 'linux' });

    const processes = await source.list();

    expect(run).toHaveBeenNthCalledWith(1, 'ps', ['-axo', 'pid=,ppid=,etime=,comm=']);
    expect(run).toHaveBeenNthCalledWith(2, 'ps', ['-axo', 'pid=,args=']);
    expect(processes).toHaveLength(1);
    expect(processes[0]).toMatchObject({ pid: 10, ppid: 1, name: 'node', command: 'node mcp-server-playwright' });
  });

  test('queries CIM through PowerShell on Windows', async () => {
    const run = jest.fn(async (_file: string, _args: string[]) => '{"ProcessId":8,"ParentProcessId":4,"Name":"node.exe","CommandLine":"node"}');
    const source = new PsProcessSource({ run, platform: 'win32' });

    const processes = await source.list();

    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0][0]).toBe('powershell');
    expect(processes).toEqual([{ pid: 8, ppid: 4, name: 'node.exe', command: 'node', launchTime: null }]);
  });
});
