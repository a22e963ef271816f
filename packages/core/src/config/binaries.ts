/**
 * Binary Configuration
 * 
 * Locates the external media tool.
 * 
 * Priority order:
 * 1. Explicit override (FFMPEG_PATH)
 * 2. System PATH (with PATHEXT on Windows)
 * 3. Well-known install folder for the OS (Windows: C:/ffmpeg/bin)
 */

import { accessSync, constants, statSync } from 'node:fs';
import { posix, win32 } from 'node:path';
import { logger } from '@dualsub/utils';
import { ToolNotFoundError } from '../errors/index.js';

export interface ResolveBinaryOptions {
  override?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  exists?: (path: string) => boolean;
}

/**
 * Install folders checked after PATH, per OS
 */
export const FFMPEG_FALLBACKS: Partial<Record<NodeJS.Platform, string[]>> = {
  win32: ['C:/ffmpeg/bin/ffmpeg.exe'],
};

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    if (process.platform !== 'win32') {
      accessSync(path, constants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
}

/**
 * Candidate locations for a binary on PATH, in search order
 */
export function getPathCandidates(
  name: string,
  env: NodeJS.ProcessEnv,
  platform: NodeJS.Platform
): string[] {
  const isWindows = platform === 'win32';
  const pathValue = env['PATH'] ?? env['Path'] ?? '';
  const dirs = pathValue.split(isWindows ? ';' : ':').filter((dir) => dir.length > 0);
  const join = isWindows ? win32.join : posix.join;

  const names = isWindows
    ? (env['PATHEXT'] ?? '.EXE;.CMD;.BAT;.COM')
        .split(';')
        .filter((ext) => ext.length > 0)
        .map((ext) => name + ext.toLowerCase())
    : [name];

  return dirs.flatMap((dir) => names.map((exe) => join(dir, exe)));
}

/**
 * Resolve a binary, throwing ToolNotFoundError when nothing matches
 */
export function resolveBinaryPath(
  name: string,
  fallbacks: Partial<Record<NodeJS.Platform, string[]>>,
  options: ResolveBinaryOptions = {}
): string {
  const {
    override,
    env = process.env,
    platform = process.platform,
    exists = isExecutableFile,
  } = options;

  const searched: string[] = [];

  // 1. Explicit override
  if (override) {
    if (exists(override)) {
      return override;
    }
    logger.warn({ name, override }, 'Configured binary path does not exist, searching PATH');
    searched.push(override);
  }

  // 2. System PATH
  for (const candidate of getPathCandidates(name, env, platform)) {
    searched.push(candidate);
    if (exists(candidate)) {
      return candidate;
    }
  }

  // 3. Well-known install folder
  for (const candidate of fallbacks[platform] ?? []) {
    searched.push(candidate);
    if (exists(candidate)) {
      return candidate;
    }
  }

  throw new ToolNotFoundError(name, searched);
}

/**
 * Resolve the ffmpeg executable
 */
export function resolveFfmpegPath(options: ResolveBinaryOptions = {}): string {
  return resolveBinaryPath('ffmpeg', FFMPEG_FALLBACKS, options);
}
