/**
 * Progress Parser
 * 
 * Turns ffmpeg's stderr status lines into typed progress events.
 * 
 *   frame=  240 fps= 48 q=28.0 size=    1024kB time=00:00:10.00 bitrate= 838.9kbits/s speed=1.99x
 * 
 * Lines without a usable time= value are ignored. The input duration is
 * taken from the "Duration:" line ffmpeg prints before encoding starts,
 * which lets later events carry a percentage.
 */

import { parseTimecode } from '@dualsub/utils';

export interface ProgressEvent {
  timestamp: string;   // HH:MM:SS.xx as printed by ffmpeg
  elapsedMs: number;   // encoded media time
  frame?: number;
  fps?: number;
  speed?: number;      // x realtime
  percent?: number;    // 0-100, only once the input duration is known
}

const TIMECODE = '(\\d+:\\d{2}:\\d{2}(?:\\.\\d+)?)';
const TIME_PATTERN = new RegExp(`time=\\s*${TIMECODE}`);
const DURATION_PATTERN = new RegExp(`Duration:\\s*${TIMECODE}`);

function matchNumber(line: string, pattern: RegExp): number | undefined {
  const match = line.match(pattern);
  if (!match?.[1]) return undefined;
  const value = parseFloat(match[1]);
  return Number.isNaN(value) ? undefined : value;
}

export class FFmpegProgressParser {
  private durationMs: number | null = null;

  /**
   * Input duration in ms, once seen
   */
  get duration(): number | null {
    return this.durationMs;
  }

  /**
   * Inspect one stderr line. Returns an event for progress lines, null otherwise.
   */
  parseLine(line: string): ProgressEvent | null {
    if (this.durationMs === null) {
      const duration = line.match(DURATION_PATTERN);
      if (duration?.[1]) {
        this.durationMs = parseTimecode(duration[1]);
        return null;
      }
    }

    const time = line.match(TIME_PATTERN);
    if (!time?.[1]) return null;

    const timestamp = time[1];
    const elapsedMs = parseTimecode(timestamp);

    const event: ProgressEvent = {
      timestamp,
      elapsedMs,
      frame: matchNumber(line, /frame=\s*(\d+)/),
      fps: matchNumber(line, /fps=\s*([\d.]+)/),
      speed: matchNumber(line, /speed=\s*([\d.]+)x/),
    };

    if (this.durationMs !== null && this.durationMs > 0) {
      event.percent = Math.min(100, (elapsedMs / this.durationMs) * 100);
    }

    return event;
  }
}

/**
 * Convenience for a single line with no duration context
 */
export function parseProgressLine(line: string): ProgressEvent | null {
  return new FFmpegProgressParser().parseLine(line);
}

/**
 * Format a progress event for a status line, e.g. "time=00:00:10.00 (16.7%)"
 */
export function formatProgress(event: ProgressEvent): string {
  const percent = event.percent !== undefined ? ` (${event.percent.toFixed(1)}%)` : '';
  return `time=${event.timestamp}${percent}`;
}
