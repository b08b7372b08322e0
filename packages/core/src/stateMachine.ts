/**
 * Run State Machine
 *
 * Strict state machine for one checking pass over a pack.
 *
 * State Flow:
 * START → PRECONDITION_CHECK → BACKUP → CONFIRM_AUTO_FIX → METADATA_CHECK → TREE_WALK → REPORT → DONE
 *                        ↘ ABORTED      ↘ ABORTED                                   ↘ FAILED
 *
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - A pass never revisits a state; restarting means a new machine
 */

import { StateTransitionError } from './errors/index.js';

export const RUN_STATES = [
  'START',
  'PRECONDITION_CHECK',
  'BACKUP',
  'CONFIRM_AUTO_FIX',
  'METADATA_CHECK',
  'TREE_WALK',
  'REPORT',
  'DONE',
  'ABORTED',
  'FAILED',
] as const;

export type RunState = typeof RUN_STATES[number];

/**
 * Represents a state transition with metadata
 */
export interface RunStateTransition {
  from: RunState;
  to: RunState;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<RunState, Set<RunState>> = {
  START: new Set<RunState>([
    'PRECONDITION_CHECK',
  ]),
  PRECONDITION_CHECK: new Set<RunState>([
    'BACKUP',
    'CONFIRM_AUTO_FIX', // Backup disabled or already taken
    'ABORTED',
  ]),
  BACKUP: new Set<RunState>([
    'CONFIRM_AUTO_FIX',
    'ABORTED',
  ]),
  CONFIRM_AUTO_FIX: new Set<RunState>([
    'METADATA_CHECK',
  ]),
  METADATA_CHECK: new Set<RunState>([
    'TREE_WALK',
  ]),
  TREE_WALK: new Set<RunState>([
    'REPORT',
    'FAILED',
  ]),
  REPORT: new Set<RunState>([
    'DONE',
    'FAILED',
  ]),
  DONE: new Set<RunState>([]), // Terminal states
  ABORTED: new Set<RunState>([]),
  FAILED: new Set<RunState>([]),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: RunState, to: RunState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: RunState): RunState[] {
  return Array.from(validTransitions[current]);
}

export class RunStateMachine {
  private currentState: RunState;
  private history: RunStateTransition[];

  constructor(initialState: RunState = 'START') {
    this.currentState = initialState;
    this.history = [];
  }

  /**
   * Get the current state
   */
  getState(): RunState {
    return this.currentState;
  }

  /**
   * Get the full transition history
   */
  getHistory(): ReadonlyArray<RunStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: RunState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: RunState, reason?: string): RunStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.currentState, targetState);
    }

    const transition: RunStateTransition = {
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
    return validTransitions[this.currentState].size === 0;
  }
}
