/**
 * File Operations
 * 
 * Existence checks that answer with a boolean instead of throwing.
 */

import { stat } from 'node:fs/promises';
import { isErrnoException } from './guards.js';

export type PathKind = 'file' | 'directory' | 'other' | 'missing';

/**
 * Classify what a path points at. Missing paths are not an error.
 */
export async function getPathKind(filePath: string): Promise<PathKind> {
  try {
    const stats = await stat(filePath);
    if (stats.isFile()) return 'file';
    if (stats.isDirectory()) return 'directory';
    return 'other';
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return 'missing';
    }
    throw error;
  }
}

export async function isFile(filePath: string): Promise<boolean> {
  return (await getPathKind(filePath)) === 'file';
}
