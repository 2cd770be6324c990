/**
 * Tests for the loop state machine
 */

import { describe, it, expect } from 'vitest';
import {
  createInitialContext,
  isValidTransition,
  transition,
  isTerminalState,
  LoopContext,
  LoopEvent,
} from './state-machine';

const T0 = '2025-01-01T00:00:00.000Z';
const T1 = '2025-01-01T00:00:01.000Z';

function contextIn(state: LoopContext['currentState'], overrides: Partial<LoopContext> = {}): LoopContext {
  return { ...createInitialContext(T0), currentState: state, ...overrides };
}

describe('State Machine', () => {
  describe('createInitialContext', () => {
    it('should start planning at iteration 1', () => {
      const context = createInitialContext(T0);
      expect(context).toEqual({
        currentState: 'PLANNING',
        iterationCount: 1,
        errorsRecovered: 0,
        startedAt: T0,
        lastTransitionAt: T0,
      });
    });
  });

  describe('isValidTransition', () => {
    it('should allow the main cycle', () => {
      expect(isValidTransition('PLANNING', 'EXECUTING')).toBe(true);
      expect(isValidTransition('EXECUTING', 'REVIEWING')).toBe(true);
      expect(isValidTransition('REVIEWING', 'REFINING')).toBe(true);
      expect(isValidTransition('REFINING', 'PLANNING')).toBe(true);
      expect(isValidTransition('RETRYING', 'EXECUTING')).toBe(true);
    });

    it('should allow aborting from every non-terminal state', () => {
      for (const state of ['PLANNING', 'EXECUTING', 'REVIEWING', 'REFINING', 'RETRYING'] as const) {
        expect(isValidTransition(state, 'ABORTED')).toBe(true);
      }
    });

    it('should not allow leaving a terminal state', () => {
      expect(isValidTransition('DONE_SUCCESS', 'PLANNING')).toBe(false);
      expect(isValidTransition('ABORTED', 'EXECUTING')).toBe(false);
    });

    it('should not allow skipping review', () => {
      expect(isValidTransition('EXECUTING', 'DONE_SUCCESS')).toBe(false);
    });
  });

  describe('transition', () => {
    it('should move from planning to executing on an accepted plan', () => {
      const result = transition(createInitialContext(T0), { type: 'PLAN_ACCEPTED', stepCount: 3 }, T1);

      expect(result.valid).toBe(true);
      expect(result.newState).toBe('EXECUTING');
      expect(result.context.currentState).toBe('EXECUTING');
      expect(result.context.lastTransitionAt).toBe(T1);
      expect(result.description).toBe('Plan accepted with 3 step(s), executing');
    });

    it('should count a rejected plan as an iteration and a recovered error', () => {
      const result = transition(createInitialContext(T0), { type: 'PLAN_INVALID', message: 'cycle' }, T1);

      expect(result.newState).toBe('REFINING');
      expect(result.context.iterationCount).toBe(2);
      expect(result.context.errorsRecovered).toBe(1);
      expect(result.context.lastError).toBe('cycle');
    });

    it('should fail an infeasible goal', () => {
      const result = transition(
        createInitialContext(T0),
        { type: 'GOAL_INFEASIBLE', strategy: 'needs hardware access' },
        T1
      );

      expect(result.newState).toBe('DONE_FAILURE');
      expect(result.context.stopReason).toBe('GOAL_INFEASIBLE');
      expect(result.context.lastError).toBe('Goal not feasible: needs hardware access');
    });

    it('should increment only the iteration count on refinement', () => {
      const result = transition(contextIn('REVIEWING'), { type: 'REVIEW_NEEDS_REFINEMENT', issueCount: 2 }, T1);

      expect(result.newState).toBe('REFINING');
      expect(result.context.iterationCount).toBe(2);
      expect(result.context.errorsRecovered).toBe(0);
    });

    it('should increment both counters on a failed review', () => {
      const result = transition(contextIn('REVIEWING'), { type: 'REVIEW_FAILED', summary: 'broken' }, T1);

      expect(result.newState).toBe('RETRYING');
      expect(result.context.iterationCount).toBe(2);
      expect(result.context.errorsRecovered).toBe(1);
    });

    it('should finish successfully on approval', () => {
      const result = transition(contextIn('REVIEWING'), { type: 'REVIEW_APPROVED', confidence: 0.9 }, T1);

      expect(result.newState).toBe('DONE_SUCCESS');
      expect(result.context.stopReason).toBe('APPROVED');
      expect(result.description).toBe('Review approved with 90% confidence');
    });

    it('should stop when iterations are exhausted', () => {
      const result = transition(contextIn('REVIEWING'), { type: 'ITERATIONS_EXHAUSTED', maxRetries: 2 }, T1);

      expect(result.newState).toBe('DONE_FAILURE');
      expect(result.context.stopReason).toBe('ITERATIONS_EXHAUSTED');
      expect(result.description).toBe('Reached maximum retries (2)');
    });

    it('should abort from any running state', () => {
      const events: Array<[LoopContext['currentState'], LoopEvent]> = [
        ['PLANNING', { type: 'CANCEL' }],
        ['EXECUTING', { type: 'CANCEL' }],
        ['RETRYING', { type: 'CANCEL' }],
      ];
      for (const [state, event] of events) {
        const result = transition(contextIn(state), event, T1);
        expect(result.newState).toBe('ABORTED');
        expect(result.context.stopReason).toBe('CANCELLED');
      }
    });

    it('should turn an error into a failure', () => {
      const result = transition(contextIn('EXECUTING'), { type: 'ERROR', error: new Error('disk full') }, T1);

      expect(result.newState).toBe('DONE_FAILURE');
      expect(result.context.lastError).toBe('disk full');
      expect(result.description).toBe('Error: disk full');
    });

    it('should reject events that do not apply', () => {
      const context = createInitialContext(T0);
      const result = transition(context, { type: 'REVIEW_APPROVED', confidence: 1 }, T1);

      expect(result.valid).toBe(false);
      expect(result.newState).toBe('PLANNING');
      expect(result.context).toBe(context);
      expect(result.description).toBe('Invalid transition from PLANNING via REVIEW_APPROVED');
    });

    it('should ignore cancellation after completion', () => {
      const result = transition(contextIn('DONE_SUCCESS'), { type: 'CANCEL' }, T1);
      expect(result.valid).toBe(false);
      expect(result.newState).toBe('DONE_SUCCESS');
    });
  });

  describe('isTerminalState', () => {
    it('should recognise terminal states', () => {
      expect(isTerminalState('DONE_SUCCESS')).toBe(true);
      expect(isTerminalState('DONE_FAILURE')).toBe(true);
      expect(isTerminalState('ABORTED')).toBe(true);
      expect(isTerminalState('REVIEWING')).toBe(false);
    });
  });
});
