/**
 * Path Utilities
 * 
 * Both / and \ count as separators so Windows paths behave the same on
 * every host.
 */

import { extname } from 'node:path';

/**
 * Get the file name component of a path
 */
export function getFileName(filePath: string): string {
  const parts = filePath.split(/[\\/]/);
  return parts[parts.length - 1] ?? '';
}

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(getFileName(filename));
  return ext.toLowerCase().replace(/^\./, '');
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const name = getFileName(filename);
  const ext = extname(name);
  return ext ? name.slice(0, -ext.length) : name;
}
