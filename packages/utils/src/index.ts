/**
 * @dualsub/utils
 * 
 * Shared utilities package containing:
 * - Command execution (captured and streamed)
 * - File existence checks
 * - Path and time helpers
 * - Type guards
 * - Logger
 */

// Command execution
export {
  executeCommand,
  streamCommand,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
  type StreamCommandOptions,
} from './command.js';

// File operations
export { getPathKind, isFile, type PathKind } from './file.js';

// Path utilities
export { getExtension, getBasename, getFileName } from './path.js';

// Type guards
export { isNonEmptyString, isErrnoException } from './guards.js';

// Time utilities
export { formatDuration, formatSeconds, parseTimecode } from './time.js';

// Logger
export { logger, createLogger, setLogLevel, type Logger } from './logger.js';
