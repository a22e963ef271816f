/**
 * @dualsub/core
 * 
 * Core package containing:
 * - Burn job parameters and validation
 * - Session state machine
 * - Error handling
 * - External binary resolution
 */

// State machine
export {
  SessionState,
  SessionStateMachine,
  isValidTransition,
  getNextStates,
} from './stateMachine.js';

export type { SessionStateTransition } from './stateMachine.js';

// Types
export {
  COMPRESSION_MODES,
  SUBTITLE_FONT,
  SUBTITLE_OUTLINE,
  SUBTITLE_SHADOW,
  SUBTITLE_ALIGNMENT,
  DOWNSCALE_HEIGHT,
  OUTPUT_SUFFIX,
  DEFAULT_STYLE,
  subtitleStyleSchema,
  burnJobSchema,
  parseSubtitleStyle,
  parseBurnJob,
  buildOutputPath,
} from './types/job.js';

export type { CompressionMode, SubtitleStyle, BurnJob } from './types/job.js';

// Errors
export {
  DualSubError,
  ToolNotFoundError,
  MissingInputError,
  ValidationError,
  ProcessFailureError,
  StateTransitionError,
  getErrorMessage,
} from './errors/index.js';

export type { InputField } from './errors/index.js';

// Binaries
export {
  FFMPEG_FALLBACKS,
  getPathCandidates,
  resolveBinaryPath,
  resolveFfmpegPath,
} from './config/binaries.js';

export type { ResolveBinaryOptions } from './config/binaries.js';
