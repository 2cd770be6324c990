/**
 * Error taxonomy
 *
 * PlanInvalid is returned as a Result error (expected, pre-execution).
 * Transient and validation step failures are ErrorKind values on StepFailure.
 * DependencyFailure is a SkipReason. IterationExhausted is a loop stop reason.
 * IllegalTransitionError is a programming fault and is thrown.
 */

import type { StepStatus } from './plan';

export type PlanInvalidCode =
  | 'DUPLICATE_STEP'
  | 'MISSING_DEPENDENCY'
  | 'CYCLE'
  | 'UNKNOWN_CAPABILITY'
  | 'INVALID_DOCUMENT'
  | 'PLANNER_ERROR';

export interface PlanInvalidIssue {
  code: PlanInvalidCode;
  message: string;
  stepId?: string;
  /** Step ids forming a cycle, first id repeated at the end */
  cyclePath?: string[];
}

export interface PlanInvalid {
  type: 'PlanInvalid';
  message: string;
  issues: PlanInvalidIssue[];
}

export function createPlanInvalid(issues: PlanInvalidIssue[]): PlanInvalid {
  const first = issues[0]?.message ?? 'Plan is invalid';
  const message =
    issues.length > 1 ? `${first} (and ${issues.length - 1} more issue(s))` : first;
  return { type: 'PlanInvalid', message, issues };
}

/**
 * Thrown when code attempts a step status change the lifecycle does not allow
 */
export class IllegalTransitionError extends Error {
  readonly stepId: string;
  readonly from: StepStatus;
  readonly to: StepStatus;

  constructor(stepId: string, from: StepStatus, to: StepStatus) {
    super(`Illegal status transition for step "${stepId}": ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
    this.stepId = stepId;
    this.from = from;
    this.to = to;
  }
}

/**
 * Error returned when an outcome is recorded twice
 */
export interface DuplicateOutcomeError {
  type: 'DUPLICATE_OUTCOME';
  stepId: string;
  message: string;
}
