/**
 * Asset State Machine
 * 
 * State Flow:
 * DISCOVERED → PROBED → TRANSCODED → SUBTITLE_EXTRACTED → TRANSFERRED → CLEANED_UP
 *                    ↘ FAILED (from any non-terminal state)
 * 
 * SUBTITLE_EXTRACTED is skipped when the asset carries no subtitle stream.
 * Invalid transitions throw.
 */

import { StateTransitionError } from './errors/index.js';

export const ASSET_STATES = [
  'DISCOVERED',
  'PROBED',
  'TRANSCODED',
  'SUBTITLE_EXTRACTED',
  'TRANSFERRED',
  'CLEANED_UP',
  'FAILED',
] as const;

export type AssetState = (typeof ASSET_STATES)[number];

export interface AssetStateTransition {
  from: AssetState;
  to: AssetState;
  timestamp: Date;
  reason?: string;
}

const validTransitions: Record<AssetState, ReadonlySet<AssetState>> = {
  DISCOVERED: new Set<AssetState>(['PROBED', 'FAILED']),
  PROBED: new Set<AssetState>(['TRANSCODED', 'FAILED']),
  TRANSCODED: new Set<AssetState>([
    'SUBTITLE_EXTRACTED',
    'TRANSFERRED', // No subtitle stream
    'FAILED',
  ]),
  SUBTITLE_EXTRACTED: new Set<AssetState>(['TRANSFERRED', 'FAILED']),
  TRANSFERRED: new Set<AssetState>(['CLEANED_UP', 'FAILED']),
  CLEANED_UP: new Set<AssetState>([]), // Terminal state
  FAILED: new Set<AssetState>([]), // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: AssetState, to: AssetState): boolean {
  return validTransitions[from].has(to);
}

export class AssetStateMachine {
  private currentState: AssetState = 'DISCOVERED';
  private history: AssetStateTransition[] = [];
  private readonly assetPath: string;

  constructor(assetPath: string) {
    this.assetPath = assetPath;
  }

  getState(): AssetState {
    return this.currentState;
  }

  getHistory(): ReadonlyArray<AssetStateTransition> {
    return [...this.history];
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: AssetState, reason?: string): AssetStateTransition {
    if (!isValidTransition(this.currentState, targetState)) {
      throw new StateTransitionError(this.assetPath, this.currentState, targetState);
    }

    const transition: AssetStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  isTerminal(): boolean {
    return this.currentState === 'CLEANED_UP' || this.currentState === 'FAILED';
  }

  hasFailed(): boolean {
    return this.currentState === 'FAILED';
  }

  fail(reason: string): AssetStateTransition {
    return this.transitionTo('FAILED', reason);
  }
}
