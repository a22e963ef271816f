/**
 * Burn Job Executor
 * 
 * Runs one burn-in job end to end: locate ffmpeg, build the command,
 * stream progress, and decide success from the exit code and the
 * presence of the output file.
 */

import { EventEmitter } from 'node:events';
import {
  ProcessFailureError,
  buildOutputPath,
  resolveFfmpegPath,
  type BurnJob,
  type ResolveBinaryOptions,
} from '@dualsub/core';
import { isFile, logger, streamCommand, type CommandRunner } from '@dualsub/utils';
import { createDualSubtitleCommand } from './commandBuilder.js';
import { FFmpeg } from './ffmpeg.js';
import type { ProgressEvent } from './progressParser.js';

export interface BurnJobExecutorOptions {
  // Skips resolution when set
  ffmpegPath?: string;
  resolveOptions?: ResolveBinaryOptions;
  runner?: CommandRunner;
  fileExists?: (path: string) => Promise<boolean>;
}

export interface BurnResult {
  success: boolean;
  outputPath: string;
  exitCode: number;
  durationMs: number;
  command: string;
  error?: ProcessFailureError;
}

export interface BurnJobExecutorEvents {
  progress: (event: ProgressEvent) => void;
}

export interface BurnJobExecutor {
  on<K extends keyof BurnJobExecutorEvents>(event: K, listener: BurnJobExecutorEvents[K]): this;
  off<K extends keyof BurnJobExecutorEvents>(event: K, listener: BurnJobExecutorEvents[K]): this;
  emit<K extends keyof BurnJobExecutorEvents>(
    event: K,
    ...args: Parameters<BurnJobExecutorEvents[K]>
  ): boolean;
}

export class BurnJobExecutor extends EventEmitter {
  private readonly options: BurnJobExecutorOptions;

  constructor(options: BurnJobExecutorOptions = {}) {
    super();
    this.options = options;
  }

  /**
   * Execute a burn job.
   * Encoder failures come back as an unsuccessful result; a missing
   * ffmpeg or a failed spawn throws.
   */
  async execute(job: BurnJob): Promise<BurnResult> {
    const startTime = Date.now();
    const ffmpegPath = this.options.ffmpegPath ?? resolveFfmpegPath(this.options.resolveOptions);
    const outputPath = buildOutputPath(job.videoPath, job.outputDir);

    const builder = createDualSubtitleCommand(job, outputPath);
    const args = builder.build();
    const command = builder.buildString(ffmpegPath);

    logger.info({ video: job.videoPath, output: outputPath, mode: job.mode }, 'Starting burn-in');
    logger.debug({ command }, 'FFmpeg command');

    const ffmpeg = new FFmpeg(ffmpegPath, this.options.runner ?? streamCommand);
    ffmpeg.on('progress', (event) => this.emit('progress', event));

    const { exitCode, stderrTail } = await ffmpeg.run(args);
    const fileExists = this.options.fileExists ?? isFile;
    const outputExists = await fileExists(outputPath);
    const durationMs = Date.now() - startTime;

    if (exitCode === 0 && outputExists) {
      logger.info({ output: outputPath, durationMs }, 'Burn-in complete');
      return { success: true, outputPath, exitCode, durationMs, command };
    }

    const lastLine = [...stderrTail].reverse().find((line) => line.trim().length > 0);
    const detail = lastLine ? `: ${lastLine.trim()}` : '';
    const error = exitCode !== 0
      ? new ProcessFailureError(`ffmpeg exited with code ${exitCode}${detail}`, exitCode, stderrTail)
      : new ProcessFailureError(`ffmpeg finished but the output file was not created${detail}`, exitCode, stderrTail);

    logger.error({ exitCode, output: outputPath, stderrTail }, 'Burn-in failed');

    return { success: false, outputPath, exitCode, durationMs, command, error };
  }
}

/**
 * The command a job would run, without running it
 */
export function describeBurnCommand(job: BurnJob, ffmpegPath: string = 'ffmpeg'): string {
  return createDualSubtitleCommand(job, buildOutputPath(job.videoPath, job.outputDir)).buildString(ffmpegPath);
}
