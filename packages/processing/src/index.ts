/**
 * @dualsub/processing
 * 
 * Builds and runs the ffmpeg burn-in command.
 * 
 * CRITICAL RULES:
 * - English track is always stage one, with the larger bottom margin
 * - Audio is optional: a silent video must still encode
 * - Log every FFmpeg command executed
 */

// FFmpeg wrapper
export {
  FFmpeg,
  STDERR_TAIL_LINES,
  type FFmpegEvents,
  type FFmpegRunResult,
  type FFmpegProbe,
} from './ffmpeg.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  createDualSubtitleCommand,
  type VideoCodecOptions,
  type AudioCodecOptions,
  type OutputOptions,
  type StreamMapping,
} from './commandBuilder.js';

// Filter graph
export {
  OUTPUT_LABEL,
  escapeSubtitlePath,
  buildSubtitleStyle,
  buildBurnInStages,
  buildBurnInFilterGraph,
  renderFilterGraph,
  type FilterStage,
} from './subtitleFilter.js';

// Compression Presets
export {
  COMPRESSION_PRESETS,
  DEFAULT_COMPRESSION_MODE,
  resolveCompressionMode,
  getCompressionPreset,
  listCompressionPresets,
  type CompressionPreset,
} from './presets.js';

// Job Executor
export {
  BurnJobExecutor,
  describeBurnCommand,
  type BurnJobExecutorOptions,
  type BurnJobExecutorEvents,
  type BurnResult,
} from './jobExecutor.js';

// Progress Parser
export {
  FFmpegProgressParser,
  parseProgressLine,
  formatProgress,
  type ProgressEvent,
} from './progressParser.js';
