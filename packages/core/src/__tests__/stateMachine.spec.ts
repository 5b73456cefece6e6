import { describe, it, expect } from 'vitest';
import { AssetStateMachine, isValidTransition } from '../stateMachine.js';
import { StateTransitionError } from '../errors/index.js';

describe('AssetStateMachine', () => {
  it('should walk the full happy path', () => {
    const machine = new AssetStateMachine('a/b.mp4');

    machine.transitionTo('PROBED');
    machine.transitionTo('TRANSCODED');
    machine.transitionTo('SUBTITLE_EXTRACTED');
    machine.transitionTo('TRANSFERRED');
    machine.transitionTo('CLEANED_UP');

    expect(machine.getState()).toBe('CLEANED_UP');
    expect(machine.isTerminal()).toBe(true);
    expect(machine.getHistory()).toHaveLength(5);
  });

  it('should allow skipping subtitle extraction', () => {
    expect(isValidTransition('TRANSCODED', 'TRANSFERRED')).toBe(true);
  });

  it('should reject skipping the transcode', () => {
    const machine = new AssetStateMachine('a/b.mp4');
    machine.transitionTo('PROBED');

    expect(() => machine.transitionTo('TRANSFERRED')).toThrow(StateTransitionError);
    expect(machine.getState()).toBe('PROBED');
  });

  it('should treat FAILED as terminal', () => {
    const machine = new AssetStateMachine('a/b.mp4');
    machine.transitionTo('PROBED');
    machine.fail('encoder exhausted');

    expect(machine.hasFailed()).toBe(true);
    expect(machine.isTerminal()).toBe(true);
    expect(() => machine.transitionTo('TRANSCODED')).toThrow(StateTransitionError);
  });
});
