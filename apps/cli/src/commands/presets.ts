/**
 * Presets Command
 * 
 * Lists the compression modes and the encoder settings behind them.
 */

import { listCompressionPresets } from '@dualsub/processing';
import { printHeader, printTable } from '../lib/output.js';

export function presetsCommand(): void {
  printHeader('Compression Modes');

  printTable(
    listCompressionPresets().map((preset) => ({
      mode: preset.mode,
      video: preset.video.codec,
      crf: preset.video.crf,
      speed: preset.video.preset,
      audio: `${preset.audio.codec} ${preset.audio.bitrate}`,
      notes: preset.description,
    }))
  );
}
