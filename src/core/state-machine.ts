/**
 * Explicit state machine for the orchestration loop
 *
 * Plan → execute → review → refine, modelled as typed transitions with a
 * single place for all transition logic. Bound checks live in
 * iteration-policy; this module only applies events.
 */

/**
 * All loop states
 */
export type LoopState =
  | 'PLANNING'
  | 'EXECUTING'
  | 'REVIEWING'
  | 'REFINING'
  | 'RETRYING'
  | 'DONE_SUCCESS'
  | 'DONE_FAILURE'
  | 'ABORTED';

/**
 * Why the loop reached a terminal state
 */
export type LoopStopReason =
  | 'APPROVED'
  | 'GOAL_INFEASIBLE'
  | 'ITERATIONS_EXHAUSTED'
  | 'CANCELLED'
  | 'ERROR';

/**
 * Events that trigger state transitions
 */
export type LoopEvent =
  | { type: 'PLAN_ACCEPTED'; stepCount: number }
  | { type: 'PLAN_INVALID'; message: string }
  | { type: 'GOAL_INFEASIBLE'; strategy: string }
  | { type: 'PASS_COMPLETE'; overallSuccess: boolean }
  | { type: 'REVIEW_APPROVED'; confidence: number }
  | { type: 'REVIEW_NEEDS_REFINEMENT'; issueCount: number }
  | { type: 'REVIEW_FAILED'; summary: string }
  | { type: 'ITERATIONS_EXHAUSTED'; maxRetries: number }
  | { type: 'REPLAN' }
  | { type: 'REEXECUTE' }
  | { type: 'CANCEL' }
  | { type: 'ERROR'; error: Error };

/**
 * Context data maintained across state transitions
 */
export interface LoopContext {
  currentState: LoopState;
  /** Starts at 1; incremented on every refinement or retry */
  iterationCount: number;
  /** Incremented on every retry after a failed review or a rejected plan */
  errorsRecovered: number;
  /** Message of the last planning failure, failed review or error */
  lastError?: string;
  stopReason?: LoopStopReason;
  startedAt: string;
  lastTransitionAt: string;
}

export interface TransitionResult {
  newState: LoopState;
  context: LoopContext;
  valid: boolean;
  /** Human-readable description of what happened */
  description: string;
}

/**
 * Valid state transitions map
 */
const VALID_TRANSITIONS: Record<LoopState, LoopState[]> = {
  PLANNING: ['EXECUTING', 'REFINING', 'DONE_FAILURE', 'ABORTED'],
  EXECUTING: ['REVIEWING', 'DONE_FAILURE', 'ABORTED'],
  REVIEWING: ['DONE_SUCCESS', 'REFINING', 'RETRYING', 'DONE_FAILURE', 'ABORTED'],
  REFINING: ['PLANNING', 'DONE_FAILURE', 'ABORTED'],
  RETRYING: ['EXECUTING', 'DONE_FAILURE', 'ABORTED'],
  DONE_SUCCESS: [],
  DONE_FAILURE: [],
  ABORTED: [],
};

export function createInitialContext(now: string = new Date().toISOString()): LoopContext {
  return {
    currentState: 'PLANNING',
    iterationCount: 1,
    errorsRecovered: 0,
    startedAt: now,
    lastTransitionAt: now,
  };
}

export function isValidTransition(from: LoopState, to: LoopState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Process an event and return the resulting state transition.
 * An event that does not apply in the current state is reported invalid and
 * leaves the context untouched.
 */
export function transition(
  context: LoopContext,
  event: LoopEvent,
  now: string = new Date().toISOString()
): TransitionResult {
  const { currentState } = context;
  let newState: LoopState = currentState;
  let newContext: LoopContext = { ...context, lastTransitionAt: now };
  let description = '';

  switch (event.type) {
    case 'PLAN_ACCEPTED':
      if (currentState === 'PLANNING') {
        newState = 'EXECUTING';
        description = `Plan accepted with ${event.stepCount} step(s), executing`;
      }
      break;

    case 'PLAN_INVALID':
      if (currentState === 'PLANNING') {
        newState = 'REFINING';
        newContext = {
          ...newContext,
          iterationCount: context.iterationCount + 1,
          errorsRecovered: context.errorsRecovered + 1,
          lastError: event.message,
        };
        description = `Plan rejected (${event.message}), refining`;
      }
      break;

    case 'GOAL_INFEASIBLE':
      if (currentState === 'PLANNING') {
        newState = 'DONE_FAILURE';
        newContext = {
          ...newContext,
          stopReason: 'GOAL_INFEASIBLE',
          lastError: `Goal not feasible: ${event.strategy}`,
        };
        description = `Goal not feasible: ${event.strategy}`;
      }
      break;

    case 'PASS_COMPLETE':
      if (currentState === 'EXECUTING') {
        newState = 'REVIEWING';
        description = event.overallSuccess
          ? 'Execution pass succeeded, reviewing'
          : 'Execution pass had failures, reviewing';
      }
      break;

    case 'REVIEW_APPROVED':
      if (currentState === 'REVIEWING') {
        newState = 'DONE_SUCCESS';
        newContext = { ...newContext, stopReason: 'APPROVED' };
        description = `Review approved with ${Math.round(event.confidence * 100)}% confidence`;
      }
      break;

    case 'REVIEW_NEEDS_REFINEMENT':
      if (currentState === 'REVIEWING') {
        newState = 'REFINING';
        newContext = { ...newContext, iterationCount: context.iterationCount + 1 };
        description = `Review found ${event.issueCount} issue(s), refining plan (iteration ${newContext.iterationCount})`;
      }
      break;

    case 'REVIEW_FAILED':
      if (currentState === 'REVIEWING') {
        newState = 'RETRYING';
        newContext = {
          ...newContext,
          iterationCount: context.iterationCount + 1,
          errorsRecovered: context.errorsRecovered + 1,
          lastError: event.summary,
        };
        description = `Review failed, retrying execution (iteration ${newContext.iterationCount})`;
      }
      break;

    case 'ITERATIONS_EXHAUSTED':
      if (currentState === 'PLANNING' || currentState === 'REVIEWING') {
        newState = 'DONE_FAILURE';
        newContext = { ...newContext, stopReason: 'ITERATIONS_EXHAUSTED' };
        description = `Reached maximum retries (${event.maxRetries})`;
      }
      break;

    case 'REPLAN':
      if (currentState === 'REFINING') {
        newState = 'PLANNING';
        description = `Requesting a new plan (iteration ${context.iterationCount})`;
      }
      break;

    case 'REEXECUTE':
      if (currentState === 'RETRYING') {
        newState = 'EXECUTING';
        description = `Re-executing the current plan (iteration ${context.iterationCount})`;
      }
      break;

    case 'CANCEL':
      if (!isTerminalState(currentState)) {
        newState = 'ABORTED';
        newContext = { ...newContext, stopReason: 'CANCELLED' };
        description = 'Run cancelled';
      }
      break;

    case 'ERROR':
      if (!isTerminalState(currentState)) {
        newState = 'DONE_FAILURE';
        newContext = { ...newContext, stopReason: 'ERROR', lastError: event.error.message };
        description = `Error: ${event.error.message}`;
      }
      break;
  }

  const valid = newState !== currentState && isValidTransition(currentState, newState);

  return {
    newState: valid ? newState : currentState,
    context: valid ? { ...newContext, currentState: newState } : context,
    valid,
    description: valid ? description : `Invalid transition from ${currentState} via ${event.type}`,
  };
}

export function isTerminalState(state: LoopState): boolean {
  return state === 'DONE_SUCCESS' || state === 'DONE_FAILURE' || state === 'ABORTED';
}
