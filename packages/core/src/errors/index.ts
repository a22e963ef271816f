/**
 * Custom Error Classes
 */

import type { SessionState } from '../stateMachine.js';

/**
 * Base error class for all dualsub errors
 */
export class DualSubError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DualSubError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The external media tool could not be located
 */
export class ToolNotFoundError extends DualSubError {
  public readonly tool: string;

  constructor(tool: string, searched: string[]) {
    super(
      `${tool} executable not found. Install it or add it to PATH.`,
      'TOOL_NOT_FOUND',
      { tool, searched }
    );
    this.name = 'ToolNotFoundError';
    this.tool = tool;
  }
}

export type InputField = 'video' | 'english' | 'vietnamese' | 'outputDir';

/**
 * A selected input path does not exist or has the wrong kind
 */
export class MissingInputError extends DualSubError {
  public readonly field: InputField;
  public readonly path: string;

  constructor(field: InputField, path: string, message: string) {
    super(message, 'MISSING_INPUT', { field, path });
    this.name = 'MissingInputError';
    this.field = field;
    this.path = path;
  }
}

/**
 * Validation error for invalid parameters
 */
export class ValidationError extends DualSubError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * The encoder exited non-zero or produced no output file
 */
export class ProcessFailureError extends DualSubError {
  public readonly exitCode: number;
  public readonly stderrTail: string[];

  constructor(message: string, exitCode: number, stderrTail: string[] = []) {
    super(message, 'PROCESS_FAILURE', { exitCode, stderrTail });
    this.name = 'ProcessFailureError';
    this.exitCode = exitCode;
    this.stderrTail = stderrTail;
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends DualSubError {
  constructor(
    fromState: SessionState,
    toState: SessionState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Best-effort message for anything thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
