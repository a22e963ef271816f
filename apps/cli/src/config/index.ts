/**
 * CLI Configuration
 * 
 * Loaded before anything else so LOG_LEVEL is in place when the
 * shared logger is created.
 */

import { config as dotenvConfig } from 'dotenv';
import { homedir } from 'node:os';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

// Load .env from monorepo root
dotenvConfig({ path: resolve(monorepoRoot, '.env') });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),

  // Media tools
  FFMPEG_PATH: z.string().min(1).optional(),

  // Where finished videos go unless a folder is dropped
  DUALSUB_OUTPUT_DIR: z.string().min(1).optional(),
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment configuration:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env = parseResult.data;

export const config = {
  nodeEnv: env.NODE_ENV,
  logLevel: env.LOG_LEVEL,
  ffmpegPath: env.FFMPEG_PATH,
  defaultOutputDir: env.DUALSUB_OUTPUT_DIR ?? homedir(),
} as const;

export type Config = typeof config;
