/**
 * Assembly State Machine
 * 
 * Strict state machine for one archive assembly run.
 * 
 * State Flow:
 * INIT → MANIFEST_BUILT → ARCHIVE_OPEN → MAIN_WRITTEN → DEPENDENCIES_WRITTEN
 *      → NATIVE_WRITTEN → TEMPLATE_MERGED → CLOSED
 *                    ↘ FAILED (from any state)
 * 
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - Every transition is recorded in the history
 */

import { StateTransitionError } from './errors/index.js';

export const ASSEMBLY_STATES = [
  'INIT',
  'MANIFEST_BUILT',
  'ARCHIVE_OPEN',
  'MAIN_WRITTEN',
  'DEPENDENCIES_WRITTEN',
  'NATIVE_WRITTEN',
  'TEMPLATE_MERGED',
  'CLOSED',
  'FAILED',
] as const;

export type AssemblyState = typeof ASSEMBLY_STATES[number];

/**
 * Represents a state transition with metadata
 */
export interface AssemblyStateTransition {
  from: AssemblyState;
  to: AssemblyState;
  timestamp: Date;
  reason?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<AssemblyState, Set<AssemblyState>> = {
  INIT: new Set<AssemblyState>(['MANIFEST_BUILT', 'FAILED']),
  MANIFEST_BUILT: new Set<AssemblyState>(['ARCHIVE_OPEN', 'FAILED']),
  ARCHIVE_OPEN: new Set<AssemblyState>(['MAIN_WRITTEN', 'FAILED']),
  MAIN_WRITTEN: new Set<AssemblyState>(['DEPENDENCIES_WRITTEN', 'FAILED']),
  DEPENDENCIES_WRITTEN: new Set<AssemblyState>(['NATIVE_WRITTEN', 'FAILED']),
  NATIVE_WRITTEN: new Set<AssemblyState>(['TEMPLATE_MERGED', 'FAILED']),
  TEMPLATE_MERGED: new Set<AssemblyState>(['CLOSED', 'FAILED']),
  CLOSED: new Set<AssemblyState>([
    'FAILED', // Attachment failed after the archive was closed
  ]),
  FAILED: new Set<AssemblyState>([]), // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: AssemblyState, to: AssemblyState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: AssemblyState): AssemblyState[] {
  return Array.from(validTransitions[current]);
}

/**
 * Assembly State Machine class
 * Manages state transitions with validation
 */
export class AssemblyStateMachine {
  private currentState: AssemblyState;
  private history: AssemblyStateTransition[];
  private readonly runId: string;

  constructor(runId: string, initialState: AssemblyState = 'INIT') {
    this.runId = runId;
    this.currentState = initialState;
    this.history = [];
  }

  /**
   * Get the current state
   */
  getState(): AssemblyState {
    return this.currentState;
  }

  /**
   * Get the full transition history
   */
  getHistory(): ReadonlyArray<AssemblyStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: AssemblyState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(
    targetState: AssemblyState,
    reason?: string,
    metadata?: Record<string, unknown>
  ): AssemblyStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.runId, this.currentState, targetState);
    }

    const transition: AssemblyStateTransition = {
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

  /**
   * Fail the run with a reason
   */
  fail(reason: string, metadata?: Record<string, unknown>): AssemblyStateTransition {
    return this.transitionTo('FAILED', reason, metadata);
  }
}
