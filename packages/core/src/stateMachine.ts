/**
 * Session State Machine
 * 
 * Lifecycle of one interactive embed session.
 * 
 * State Flow:
 * IDLE → VALIDATING → RUNNING → IDLE
 *             ↘ IDLE (validation failed)
 * 
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - Every transition is logged
 */

import { logger } from '@dualsub/utils';
import { StateTransitionError } from './errors/index.js';

export const SessionState = {
  IDLE: 'IDLE',
  VALIDATING: 'VALIDATING',
  RUNNING: 'RUNNING',
} as const;

export type SessionState = (typeof SessionState)[keyof typeof SessionState];

/**
 * Represents a state transition with metadata
 */
export interface SessionStateTransition {
  from: SessionState;
  to: SessionState;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<SessionState, Set<SessionState>> = {
  IDLE: new Set<SessionState>(['VALIDATING']),
  VALIDATING: new Set<SessionState>([
    'RUNNING',
    'IDLE', // Validation failed
  ]),
  RUNNING: new Set<SessionState>(['IDLE']),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: SessionState, to: SessionState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: SessionState): SessionState[] {
  return Array.from(validTransitions[current]);
}

/**
 * Session State Machine class
 * Manages state transitions with validation and logging
 */
export class SessionStateMachine {
  private currentState: SessionState;
  private history: SessionStateTransition[];

  constructor(initialState: SessionState = 'IDLE') {
    this.currentState = initialState;
    this.history = [];
  }

  /**
   * Get the current state
   */
  get state(): SessionState {
    return this.currentState;
  }

  /**
   * Get the transition history
   */
  get transitions(): readonly SessionStateTransition[] {
    return this.history;
  }

  /**
   * Check if the machine can move to the given state
   */
  canTransitionTo(to: SessionState): boolean {
    return isValidTransition(this.currentState, to);
  }

  /**
   * Move to a new state, throwing on an invalid transition
   */
  transition(to: SessionState, reason?: string): SessionStateTransition {
    const from = this.currentState;

    if (!isValidTransition(from, to)) {
      throw new StateTransitionError(from, to);
    }

    const record: SessionStateTransition = {
      from,
      to,
      timestamp: new Date(),
      reason,
    };

    this.currentState = to;
    this.history.push(record);

    logger.debug({ from, to, reason }, 'Session state transition');

    return record;
  }
}
