/**
 * FFmpeg Wrapper
 * 
 * Runs ffmpeg with stderr streamed through the progress parser and
 * emits typed events. Every command is logged.
 */

import { EventEmitter } from 'node:events';
import { executeCommand, logger, streamCommand, type CommandRunner } from '@dualsub/utils';
import { FFmpegProgressParser, type ProgressEvent } from './progressParser.js';

// Lines kept for error reporting
export const STDERR_TAIL_LINES = 20;

export interface FFmpegEvents {
  progress: (event: ProgressEvent) => void;
  line: (line: string) => void;
}

export interface FFmpegRunResult {
  exitCode: number;
  stderrTail: string[];
}

export interface FFmpegProbe {
  available: boolean;
  version?: string;
}

export interface FFmpeg {
  on<K extends keyof FFmpegEvents>(event: K, listener: FFmpegEvents[K]): this;
  off<K extends keyof FFmpegEvents>(event: K, listener: FFmpegEvents[K]): this;
  emit<K extends keyof FFmpegEvents>(event: K, ...args: Parameters<FFmpegEvents[K]>): boolean;
}

export class FFmpeg extends EventEmitter {
  private readonly ffmpegPath: string;
  private readonly runner: CommandRunner;

  constructor(ffmpegPath: string = 'ffmpeg', runner: CommandRunner = streamCommand) {
    super();
    this.ffmpegPath = ffmpegPath;
    this.runner = runner;
  }

  /**
   * Run ffmpeg to completion. Resolves with the exit code whatever it is;
   * only a failure to spawn rejects.
   */
  async run(args: string[]): Promise<FFmpegRunResult> {
    const parser = new FFmpegProgressParser();
    const stderrTail: string[] = [];

    logger.debug({ ffmpeg: this.ffmpegPath, args }, 'Executing FFmpeg');

    const exitCode = await this.runner(this.ffmpegPath, args, {
      onStderrLine: (line) => {
        stderrTail.push(line);
        if (stderrTail.length > STDERR_TAIL_LINES) {
          stderrTail.shift();
        }

        this.emit('line', line);

        const event = parser.parseLine(line);
        if (event) {
          this.emit('progress', event);
        }
      },
    });

    logger.debug({ exitCode }, 'FFmpeg exited');

    return { exitCode, stderrTail };
  }

  /**
   * Check that the binary runs and report its version line
   */
  async probe(): Promise<FFmpegProbe> {
    try {
      const result = await executeCommand(this.ffmpegPath, ['-version'], {
        timeout: 5000,
      });
      if (result.exitCode !== 0) {
        return { available: false };
      }
      return { available: true, version: result.stdout.split('\n')[0]?.trim() };
    } catch (error) {
      logger.debug({ err: error, ffmpeg: this.ffmpegPath }, 'FFmpeg probe failed');
      return { available: false };
    }
  }
}
