/**
 * Burn Job Types
 * 
 * Parameters for one dual-subtitle burn-in run, validated with zod.
 */

import { join } from 'node:path';
import { z } from 'zod';
import { getBasename } from '@dualsub/utils';
import { ValidationError } from '../errors/index.js';

export const COMPRESSION_MODES = ['normal', 'smaller', 'smallest'] as const;

export type CompressionMode = (typeof COMPRESSION_MODES)[number];

// Style shared by both tracks
export const SUBTITLE_FONT = 'Arial';
export const SUBTITLE_OUTLINE = 2;
export const SUBTITLE_SHADOW = 1;
export const SUBTITLE_ALIGNMENT = 2; // bottom-center

export const DOWNSCALE_HEIGHT = 720;
export const OUTPUT_SUFFIX = '_dual_subbed';

export const subtitleStyleSchema = z
  .object({
    fontSize: z.number().int().min(14).max(64),
    // Pixels from the bottom edge
    englishMargin: z.number().int().min(10).max(300),
    vietnameseMargin: z.number().int().min(5).max(300),
  })
  .refine((style) => style.englishMargin > style.vietnameseMargin, {
    message: 'English margin must be greater than the Vietnamese margin',
    path: ['englishMargin'],
  });

export type SubtitleStyle = z.infer<typeof subtitleStyleSchema>;

export const DEFAULT_STYLE: SubtitleStyle = {
  fontSize: 24,
  englishMargin: 60,
  vietnameseMargin: 24,
};

export const burnJobSchema = z.object({
  videoPath: z.string().min(1),
  englishSubtitlePath: z.string().min(1),
  vietnameseSubtitlePath: z.string().min(1),
  outputDir: z.string().min(1),
  mode: z.enum(COMPRESSION_MODES),
  downscale: z.boolean(),
  style: subtitleStyleSchema,
});

export type BurnJob = z.infer<typeof burnJobSchema>;

function toValidationError(error: z.ZodError, fallbackField: string): ValidationError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : fallbackField;
  return new ValidationError(field, issue?.message ?? 'invalid value');
}

/**
 * Validate subtitle style values, throwing ValidationError on the first problem
 */
export function parseSubtitleStyle(input: unknown): SubtitleStyle {
  const result = subtitleStyleSchema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error, 'style');
  }
  return result.data;
}

/**
 * Validate a complete job, throwing ValidationError on the first problem
 */
export function parseBurnJob(input: unknown): BurnJob {
  const result = burnJobSchema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error, 'job');
  }
  return result.data;
}

/**
 * Output file for a video: <outputDir>/<video-stem>_dual_subbed.mp4
 */
export function buildOutputPath(videoPath: string, outputDir: string): string {
  return join(outputDir, `${getBasename(videoPath)}${OUTPUT_SUFFIX}.mp4`);
}
