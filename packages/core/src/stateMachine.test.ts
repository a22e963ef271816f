import { describe, expect, it } from 'vitest';
import { StateTransitionError } from './errors/index.js';
import { SessionStateMachine, getNextStates, isValidTransition } from './stateMachine.js';

describe('session transitions', () => {
  it('allows the documented flow', () => {
    expect(isValidTransition('IDLE', 'VALIDATING')).toBe(true);
    expect(isValidTransition('VALIDATING', 'IDLE')).toBe(true);
    expect(isValidTransition('VALIDATING', 'RUNNING')).toBe(true);
    expect(isValidTransition('RUNNING', 'IDLE')).toBe(true);
  });

  it('forbids starting a run straight from idle or validating while running', () => {
    expect(isValidTransition('IDLE', 'RUNNING')).toBe(false);
    expect(isValidTransition('RUNNING', 'VALIDATING')).toBe(false);
    expect(getNextStates('RUNNING')).toEqual(['IDLE']);
  });
});

describe('SessionStateMachine', () => {
  it('records every transition', () => {
    const machine = new SessionStateMachine();

    machine.transition('VALIDATING', 'start');
    machine.transition('RUNNING');
    machine.transition('IDLE', 'done');

    expect(machine.state).toBe('IDLE');
    expect(machine.transitions.map((t) => `${t.from}->${t.to}`)).toEqual([
      'IDLE->VALIDATING',
      'VALIDATING->RUNNING',
      'RUNNING->IDLE',
    ]);
    expect(machine.transitions[2]?.reason).toBe('done');
  });

  it('throws on an invalid transition and keeps its state', () => {
    const machine = new SessionStateMachine('RUNNING');

    expect(() => machine.transition('VALIDATING')).toThrow(StateTransitionError);
    expect(() => machine.transition('VALIDATING')).toThrow(
      'Invalid state transition from RUNNING to VALIDATING'
    );
    expect(machine.state).toBe('RUNNING');
    expect(machine.canTransitionTo('IDLE')).toBe(true);
  });
});
