import { describe, expect, it } from 'vitest';
import { executeCommand, streamCommand } from './command.js';

const node = process.execPath;

describe('streamCommand', () => {
  it('splits stderr on every line terminator and resolves the exit code', async () => {
    const script = [
      "process.stdout.write('not forwarded');",
      "process.stderr.write('frame=1 time=00:00:01.00\\rframe=2 time=00:00:02.00\\r\\nlast line');",
      'process.exitCode = 3;',
    ].join('\n');
    const lines: string[] = [];

    const exitCode = await streamCommand(node, ['-e', script], {
      onStderrLine: (line) => lines.push(line),
    });

    expect(exitCode).toBe(3);
    expect(lines).toEqual([
      'frame=1 time=00:00:01.00',
      'frame=2 time=00:00:02.00',
      'last line',
    ]);
  });

  it('reports a signal death as 128 plus the signal number', async () => {
    const exitCode = await streamCommand(node, ['-e', "process.kill(process.pid, 'SIGTERM')"]);

    expect(exitCode).toBe(143);
  });

  it('rejects when the executable cannot be spawned', async () => {
    await expect(streamCommand('/nonexistent/dualsub-test-binary', [])).rejects.toThrow();
  });
});

describe('executeCommand', () => {
  it('captures stdout and stderr', async () => {
    const result = await executeCommand(node, [
      '-e',
      "process.stdout.write('out'); process.stderr.write('err');",
    ]);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe('out');
    expect(result.stderr).toBe('err');
    expect(result.timedOut).toBe(false);
  });
});
