import { describe, expect, it } from 'vitest';
import { FFmpegProgressParser, formatProgress, parseProgressLine } from './progressParser.js';

const STATUS =
  'frame=  240 fps= 48 q=28.0 size=    1024kB time=00:00:10.00 bitrate= 838.9kbits/s speed=1.99x';

describe('FFmpegProgressParser', () => {
  it('extracts the encoded time and counters from a status line', () => {
    expect(parseProgressLine(STATUS)).toEqual({
      timestamp: '00:00:10.00',
      elapsedMs: 10000,
      frame: 240,
      fps: 48,
      speed: 1.99,
    });
  });

  it('ignores lines without a usable marker', () => {
    const parser = new FFmpegProgressParser();

    expect(parser.parseLine('Stream mapping:')).toBeNull();
    expect(parser.parseLine('')).toBeNull();
    expect(parser.parseLine('frame=    0 fps=0.0 q=0.0 size=       0kB time=N/A bitrate=N/A speed=N/A')).toBeNull();
  });

  it('adds a percentage once the input duration is known', () => {
    const parser = new FFmpegProgressParser();

    expect(parser.parseLine('  Duration: 00:01:00.00, start: 0.000000, bitrate: 1205 kb/s')).toBeNull();
    expect(parser.duration).toBe(60000);

    const event = parser.parseLine(STATUS);
    expect(event?.percent).toBeCloseTo(16.667, 2);
    expect(event && formatProgress(event)).toBe('time=00:00:10.00 (16.7%)');
  });

  it('keeps the first duration seen', () => {
    const parser = new FFmpegProgressParser();

    parser.parseLine('  Duration: 00:00:20.00, start: 0.000000');
    parser.parseLine('  Duration: 00:05:00.00, start: 0.000000');

    expect(parser.duration).toBe(20000);
    expect(parser.parseLine('size=1kB time=00:00:30.00 bitrate=1kbits/s')?.percent).toBe(100);
  });

  it('formats events without a duration', () => {
    expect(formatProgress({ timestamp: '00:00:03.50', elapsedMs: 3500 })).toBe('time=00:00:03.50');
  });
});
