/**
 * Command Execution Wrapper
 * 
 * Two ways to run an external command:
 * - executeCommand: capture everything, with a timeout (short probes)
 * - streamCommand: forward stderr line by line, no timeout (long encodes)
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import { createInterface } from 'node:readline';
import { constants } from 'node:os';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
}

export interface StreamCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  onStderrLine?: (line: string) => void;
}

/**
 * Runs a command and streams stderr. Resolves with the exit code.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: StreamCommandOptions
) => Promise<number>;

// Shell convention: killed by a signal -> 128 + signal number
function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  return signal ? 128 + (constants.signals[signal] ?? 0) : 1;
}

/**
 * Execute an external command and capture its output
 * 
 * @param command - The command to execute
 * @param args - Command arguments
 * @param options - Execution options
 * @returns Promise resolving to CommandResult
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 30000,
    maxOutputSize = 1024 * 1024, // 1MB default
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
    }, timeout);

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, signal) => {
      clearTimeout(timeoutId);

      resolve({
        exitCode: exitCodeOf(code, signal),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      clearTimeout(timeoutId);
      reject(error);
    });
  });
}

/**
 * Run a command to completion, handing each stderr line to a callback.
 * 
 * stdout is discarded. Lines end at \n, \r\n or a bare \r, which is how
 * ffmpeg rewrites its status line. The promise settles only after the
 * child has closed, so the process is always reaped.
 */
export const streamCommand: CommandRunner = (command, args, options = {}) => {
  const { cwd = process.cwd(), env = process.env, onStderrLine } = options;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      env,
      stdio: ['ignore', 'ignore', 'pipe'],
    });

    if (child.stderr) {
      child.stderr.setEncoding('utf8');
      const lines = createInterface({ input: child.stderr, crlfDelay: Infinity });
      lines.on('line', (line) => {
        onStderrLine?.(line);
      });
    }

    child.on('close', (code, signal) => {
      resolve(exitCodeOf(code, signal));
    });

    child.on('error', reject);
  });
};
