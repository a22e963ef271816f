import { describe, expect, it } from 'vitest';
import { getCompressionPreset, listCompressionPresets, resolveCompressionMode } from './presets.js';

function tuple(mode: string): [string, string, number, string, string] {
  const preset = getCompressionPreset(mode);
  return [preset.video.codec, preset.video.preset, preset.video.crf, preset.audio.codec, preset.audio.bitrate];
}

describe('compression presets', () => {
  it('matches the preset table', () => {
    expect(tuple('normal')).toEqual(['libx264', 'medium', 18, 'aac', '192k']);
    expect(tuple('smaller')).toEqual(['libx264', 'medium', 24, 'aac', '160k']);
    expect(tuple('smallest')).toEqual(['libx265', 'medium', 28, 'aac', '128k']);
  });

  it('falls back to normal for unknown modes', () => {
    expect(resolveCompressionMode('ultra')).toBe('normal');
    expect(resolveCompressionMode('')).toBe('normal');
    expect(tuple('tiny')).toEqual(['libx264', 'medium', 18, 'aac', '192k']);
  });

  it('ignores case and surrounding whitespace', () => {
    expect(resolveCompressionMode('Smallest')).toBe('smallest');
    expect(resolveCompressionMode('  SMALLER ')).toBe('smaller');
  });

  it('lists presets in display order', () => {
    expect(listCompressionPresets().map((preset) => preset.mode)).toEqual(['normal', 'smaller', 'smallest']);
  });
});
