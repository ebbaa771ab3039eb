/**
 * Split Job State Machine
 *
 * State Flow:
 * PENDING → PROBING → PLANNING → ENCODING → AGGREGATING → DONE
 *        ↘ ERROR (from any non-terminal state)
 *
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - DONE and ERROR are terminal
 */

import { StateTransitionError } from './errors/index.js';

export type SplitJobState =
  | 'PENDING'
  | 'PROBING'
  | 'PLANNING'
  | 'ENCODING'
  | 'AGGREGATING'
  | 'DONE'
  | 'ERROR';

/**
 * Represents a state transition with metadata
 */
export interface SplitJobStateTransition {
  from: SplitJobState;
  to: SplitJobState;
  timestamp: Date;
  reason?: string;
  metadata?: Record<string, unknown>;
}

const validTransitions: Record<SplitJobState, ReadonlySet<SplitJobState>> = {
  PENDING: new Set<SplitJobState>(['PROBING', 'ERROR']),
  PROBING: new Set<SplitJobState>(['PLANNING', 'ERROR']),
  PLANNING: new Set<SplitJobState>(['ENCODING', 'ERROR']),
  ENCODING: new Set<SplitJobState>(['AGGREGATING', 'ERROR']),
  AGGREGATING: new Set<SplitJobState>(['DONE', 'ERROR']),
  DONE: new Set<SplitJobState>(),
  ERROR: new Set<SplitJobState>(),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: SplitJobState, to: SplitJobState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: SplitJobState): SplitJobState[] {
  return Array.from(validTransitions[current]);
}

export class SplitJobStateMachine {
  private currentState: SplitJobState;
  private readonly history: SplitJobStateTransition[] = [];
  private readonly jobId: string;

  constructor(jobId: string, initialState: SplitJobState = 'PENDING') {
    this.jobId = jobId;
    this.currentState = initialState;
  }

  getState(): SplitJobState {
    return this.currentState;
  }

  getHistory(): ReadonlyArray<SplitJobStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: SplitJobState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(
    targetState: SplitJobState,
    reason?: string,
    metadata?: Record<string, unknown>
  ): SplitJobStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.jobId, this.currentState, targetState);
    }

    const transition: SplitJobStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
      metadata,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  isTerminal(): boolean {
    return this.currentState === 'DONE' || this.currentState === 'ERROR';
  }

  /**
   * Fail the job with a reason
   */
  fail(reason: string, metadata?: Record<string, unknown>): SplitJobStateTransition {
    return this.transitionTo('ERROR', reason, metadata);
  }
}
