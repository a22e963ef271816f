/**
 * Time Utilities
 */

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  
  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

/**
 * Format milliseconds as seconds with one decimal, e.g. 12345 -> "12.3"
 */
export function formatSeconds(ms: number): string {
  return (ms / 1000).toFixed(1);
}

/**
 * Parse a timecode string (HH:MM:SS.mmm) to milliseconds
 */
export function parseTimecode(timecode: string): number {
  const parts = timecode.split(':');
  if (parts.length !== 3) {
    throw new Error(`Invalid timecode format: ${timecode}`);
  }
  
  const hours = parseInt(parts[0] ?? '0', 10);
  const minutes = parseInt(parts[1] ?? '0', 10);
  const secondsParts = (parts[2] ?? '0').split('.');
  const seconds = parseInt(secondsParts[0] ?? '0', 10);
  const milliseconds = parseInt((secondsParts[1] ?? '0').padEnd(3, '0').substring(0, 3), 10);

  if ([hours, minutes, seconds, milliseconds].some(Number.isNaN)) {
    throw new Error(`Invalid timecode format: ${timecode}`);
  }
  
  return (hours * 3600 + minutes * 60 + seconds) * 1000 + milliseconds;
}
