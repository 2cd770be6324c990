/**
 * Execution pass types: per-step records, outcomes and the final report
 */

import type { CapabilityOutput, ErrorKind } from './capability';
import type { StepSpec, StepStatus } from './plan';

/**
 * Terminal error of a failed step
 */
export interface StepFailure {
  kind: ErrorKind;
  message: string;
  /** Attempts made before giving up */
  attempts: number;
}

/**
 * Why a step was skipped without running
 */
export interface SkipReason {
  kind: 'DEPENDENCY_FAILURE';
  /** The failed or skipped dependency that caused the skip */
  dependencyId: string;
  message: string;
}

/**
 * Mutable view of a step inside an ExecutionState
 */
export interface StepRecord {
  readonly spec: StepSpec;
  status: StepStatus;
  attempts: number;
  output?: CapabilityOutput;
  error?: StepFailure;
  skipReason?: SkipReason;
  startedAt?: string;
  finishedAt?: string;
}

export type AbortReason = 'cancelled' | 'required_failure';

interface OutcomeBase {
  stepId: string;
  description: string;
  capability: string;
  action: string;
  required: boolean;
  attempts: number;
  startedAt?: string;
  finishedAt?: string;
}

export interface SucceededOutcome extends OutcomeBase {
  status: 'Succeeded';
  output: CapabilityOutput;
}

export interface FailedOutcome extends OutcomeBase {
  status: 'Failed';
  error: StepFailure;
}

export interface SkippedOutcome extends OutcomeBase {
  status: 'Skipped';
  skipReason: SkipReason;
}

/**
 * A step that never reached a terminal state (pass aborted before dispatch)
 */
export interface NotRunOutcome extends OutcomeBase {
  status: 'Pending' | 'Ready' | 'Running';
}

export type StepOutcome = SucceededOutcome | FailedOutcome | SkippedOutcome | NotRunOutcome;

/**
 * Immutable snapshot of one execution pass
 */
export interface ExecutionReport {
  /** True iff no required step failed and every step is terminal */
  overallSuccess: boolean;
  /** One outcome per step, in plan order */
  outcomes: readonly StepOutcome[];
  /** Step ids in the order they reached a terminal state */
  completionOrder: readonly string[];
  /** First required failure in dependency order */
  stoppedAtStep: string | null;
  aborted: boolean;
  abortReason: AbortReason | null;
  /** Narrative, one line per step */
  summary: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}
