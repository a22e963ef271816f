/**
 * Compression Presets
 * 
 * The three size/quality trade-offs offered for burned-in output.
 * All presets re-encode video (burn-in cannot stream copy) and
 * produce an MP4 with AAC audio.
 */

import { COMPRESSION_MODES, type CompressionMode } from '@dualsub/core';
import { logger } from '@dualsub/utils';
import type { VideoCodecOptions, AudioCodecOptions } from './commandBuilder.js';

export interface CompressionPreset {
  mode: CompressionMode;
  name: string;
  description: string;
  video: VideoCodecOptions & { crf: number; preset: string };
  audio: AudioCodecOptions & { bitrate: string };
  container: 'mp4';
}

export const DEFAULT_COMPRESSION_MODE: CompressionMode = 'normal';

export const COMPRESSION_PRESETS: Record<CompressionMode, CompressionPreset> = {
  normal: {
    mode: 'normal',
    name: 'Normal',
    description: 'H.264 at visually lossless quality.',
    video: { codec: 'libx264', preset: 'medium', crf: 18 },
    audio: { codec: 'aac', bitrate: '192k' },
    container: 'mp4',
  },

  smaller: {
    mode: 'smaller',
    name: 'Smaller',
    description: 'H.264 with a higher CRF for noticeably smaller files.',
    video: { codec: 'libx264', preset: 'medium', crf: 24 },
    audio: { codec: 'aac', bitrate: '160k' },
    container: 'mp4',
  },

  smallest: {
    mode: 'smallest',
    name: 'Smallest',
    description: 'H.265 for the smallest files. Slower, and older players may not decode it.',
    video: { codec: 'libx265', preset: 'medium', crf: 28 },
    audio: { codec: 'aac', bitrate: '128k' },
    container: 'mp4',
  },
};

function isCompressionMode(value: string): value is CompressionMode {
  return COMPRESSION_MODES.some((mode) => mode === value);
}

/**
 * Map a user-supplied mode to a known one.
 * Case and surrounding whitespace are ignored; anything unrecognized
 * becomes 'normal'.
 */
export function resolveCompressionMode(mode: string): CompressionMode {
  const normalized = mode.trim().toLowerCase();
  if (isCompressionMode(normalized)) {
    return normalized;
  }

  logger.warn({ mode, fallback: DEFAULT_COMPRESSION_MODE }, 'Unknown compression mode, using default');
  return DEFAULT_COMPRESSION_MODE;
}

/**
 * Get the preset for a mode, falling back to 'normal'
 */
export function getCompressionPreset(mode: string): CompressionPreset {
  return COMPRESSION_PRESETS[resolveCompressionMode(mode)];
}

/**
 * All presets in display order
 */
export function listCompressionPresets(): CompressionPreset[] {
  return COMPRESSION_MODES.map((mode) => COMPRESSION_PRESETS[mode]);
}
