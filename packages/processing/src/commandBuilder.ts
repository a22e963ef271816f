/**
 * FFmpeg Command Builder
 * 
 * Fluent API for building FFmpeg argument lists.
 * The executable itself is never part of the list.
 */

import { logger } from '@dualsub/utils';
import type { BurnJob } from '@dualsub/core';
import { buildBurnInFilterGraph, OUTPUT_LABEL } from './subtitleFilter.js';
import { getCompressionPreset } from './presets.js';

export interface OutputOptions {
  movflags?: string;      // -movflags for mp4
}

export type StreamMapping =
  | { kind: 'stream'; inputIndex: number; streamSpec: string; optional: boolean }
  | { kind: 'label'; label: string };

export interface VideoCodecOptions {
  codec: 'copy' | 'libx264' | 'libx265';
  preset?: string;
  crf?: number;
}

export interface AudioCodecOptions {
  codec: 'copy' | 'aac';
  bitrate?: string;
}

export class FFmpegCommandBuilder {
  private inputs: string[] = [];
  private mappings: StreamMapping[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private complexFilter: string | null = null;
  private outputOpts: OutputOptions = {};
  private outputFile: string = '';
  private globalArgs: string[] = [];

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Overwrite the output without prompting
   */
  overwrite(): this {
    return this.addGlobalArg('-y');
  }

  /**
   * Add input file
   */
  addInput(file: string): this {
    this.inputs.push(file);
    return this;
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec: string, optional: boolean = false): this {
    this.mappings.push({ kind: 'stream', inputIndex, streamSpec, optional });
    return this;
  }

  /**
   * Map all audio streams from input, optional by default
   */
  mapAudio(inputIndex: number = 0, optional: boolean = true): this {
    return this.map(inputIndex, 'a', optional);
  }

  /**
   * Map the output pad of the complex filter graph
   */
  mapLabel(label: string): this {
    this.mappings.push({ kind: 'label', label });
    return this;
  }

  /**
   * Set video codec (copy = no re-encode)
   */
  setVideoCodec(options: VideoCodecOptions | 'copy'): this {
    this.videoCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  /**
   * Set audio codec (copy = no re-encode)
   */
  setAudioCodec(options: AudioCodecOptions | 'copy'): this {
    this.audioCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  /**
   * Set complex filter graph
   */
  setComplexFilter(filterGraph: string): this {
    this.complexFilter = filterGraph;
    return this;
  }

  /**
   * Set output options
   */
  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  /**
   * Set output file
   */
  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [];

    // Global args
    args.push(...this.globalArgs);

    // Inputs
    for (const input of this.inputs) {
      args.push('-i', input);
    }

    // Complex filter (before mappings)
    if (this.complexFilter) {
      args.push('-filter_complex', this.complexFilter);
    }

    // Mappings
    for (const mapping of this.mappings) {
      if (mapping.kind === 'label') {
        args.push('-map', `[${mapping.label}]`);
      } else {
        const opt = mapping.optional ? '?' : '';
        args.push('-map', `${mapping.inputIndex}:${mapping.streamSpec}${opt}`);
      }
    }

    // Video codec
    if (this.videoCodec) {
      args.push('-c:v', this.videoCodec.codec);
      
      if (this.videoCodec.codec !== 'copy') {
        if (this.videoCodec.preset) args.push('-preset', this.videoCodec.preset);
        if (this.videoCodec.crf !== undefined) args.push('-crf', this.videoCodec.crf.toString());
      } else if (this.complexFilter) {
        logger.warn('Complex filter specified but video codec is copy - ffmpeg will reject this');
      }
    }

    // Audio codec
    if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);
      
      if (this.audioCodec.codec !== 'copy') {
        if (this.audioCodec.bitrate) args.push('-b:a', this.audioCodec.bitrate);
      }
    }

    // Output options
    if (this.outputOpts.movflags) {
      args.push('-movflags', this.outputOpts.movflags);
    }

    // Output file
    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }

  /**
   * Build command as string for logging
   */
  buildString(executable: string = 'ffmpeg'): string {
    return [executable, ...this.build()].map(quoteArg).join(' ');
  }
}

function quoteArg(arg: string): string {
  return /[\s"'[\];]/.test(arg) ? `"${arg.replace(/(["\\$`])/g, '\\$1')}"` : arg;
}

/**
 * Create the burn-in command: two subtitle tracks, preset codecs,
 * optional audio passthrough, fast-start MP4.
 */
export function createDualSubtitleCommand(job: BurnJob, outputFile: string): FFmpegCommandBuilder {
  const preset = getCompressionPreset(job.mode);

  return new FFmpegCommandBuilder()
    .overwrite()
    .addInput(job.videoPath)
    .setComplexFilter(buildBurnInFilterGraph(job))
    .mapLabel(OUTPUT_LABEL)
    .mapAudio(0, true)
    .setVideoCodec(preset.video)
    .setAudioCodec(preset.audio)
    .setOutputOptions({ movflags: '+faststart' })
    .setOutput(outputFile);
}
