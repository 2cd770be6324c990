/**
 * Iteration policies
 *
 * Centralizes the loop bound: at most `maxRetries` refinement or retry
 * iterations after the first attempt, whether they follow a review or a
 * rejected plan. Every decision comes with a clear message.
 */

import type { LoopConfig } from '../types/effective-config';
import type { ReviewDecision } from '../types/review';

export type StopReason = 'LIMIT_REACHED' | 'CONDITION_MET' | 'ERROR' | 'USER_CANCELLED';

/**
 * Result of checking a stop condition
 */
export interface StopConditionResult {
  shouldStop: boolean;
  /** Set when shouldStop is true */
  reason?: StopReason;
  message: string;
  /** Suggested next steps for the user */
  nextSteps?: string[];
}

export type NextStep = 'DONE_SUCCESS' | 'REFINING' | 'RETRYING' | 'DONE_FAILURE';

export interface LoopDecision {
  next: NextStep;
  stop: StopConditionResult;
}

function limitReached(message: string, nextSteps: string[]): StopConditionResult {
  return {
    shouldStop: true,
    reason: 'LIMIT_REACHED',
    message,
    nextSteps: [...nextSteps, 'Increase --max-retries to allow more iterations'],
  };
}

/**
 * Pick the loop transition that follows a review.
 * `iterationsUsed` counts refinements and retries so far.
 */
export function decideNextStep(
  config: LoopConfig,
  decision: ReviewDecision,
  iterationsUsed: number
): LoopDecision {
  const { maxRetries } = config;

  if (decision.verdict === 'Approved') {
    return {
      next: 'DONE_SUCCESS',
      stop: { shouldStop: true, reason: 'CONDITION_MET', message: 'Review approved: goal achieved' },
    };
  }

  if (iterationsUsed >= maxRetries) {
    const nextSteps = ['Review the result record for failed steps'];
    if (decision.verdict === 'NeedsRefinement' && decision.issues.length > 0) {
      nextSteps.push('Address the review issues in the plan');
    }
    return {
      next: 'DONE_FAILURE',
      stop: limitReached(`Reached maximum retries (${maxRetries})`, nextSteps),
    };
  }

  const progress = `${iterationsUsed + 1}/${maxRetries}`;
  if (decision.verdict === 'NeedsRefinement') {
    return {
      next: 'REFINING',
      stop: { shouldStop: false, message: `Review requested refinement, replanning (${progress})` },
    };
  }
  return {
    next: 'RETRYING',
    stop: { shouldStop: false, message: `Review failed, retrying execution (${progress})` },
  };
}

/**
 * Check whether a rejected plan may be replaced with a new one
 */
export function checkPlanningRetry(config: LoopConfig, iterationsUsed: number): StopConditionResult {
  const { maxRetries } = config;
  if (iterationsUsed >= maxRetries) {
    return limitReached(`Plan rejected and maximum retries reached (${maxRetries})`, [
      'Check the plan document against the schema',
    ]);
  }
  return {
    shouldStop: false,
    message: `Plan rejected, requesting a new plan (${iterationsUsed + 1}/${maxRetries})`,
  };
}

export interface IterationProgress {
  /** Current iteration (1-based) */
  current: number;
  /** Maximum iterations including the first */
  max: number;
  /** e.g. "2/3" */
  display: string;
}

export function getIterationProgress(config: LoopConfig, iterationCount: number): IterationProgress {
  const max = config.maxRetries + 1;
  return { current: iterationCount, max, display: `${iterationCount}/${max}` };
}
