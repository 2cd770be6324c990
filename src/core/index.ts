/**
 * Core module - orchestration logic and state machine
 * This module contains the central orchestration logic
 * and must not import from ui/ or spawn processes directly.
 */

// PlanGraph builder
export type { PlanGraph, PlanGraphNode, CapabilityLookup } from './plan-graph';
export { buildPlanGraph, detectCycle } from './plan-graph';

// Per-pass step state
export { ExecutionState, isAllowedTransition } from './execution-state';

// Step execution
export { BackoffSchedule, createImmediateBackoff } from './backoff';
export type { ClassifiedError } from './classify-error';
export { classifyError } from './classify-error';
export type {
  StepRunOutcome,
  ProviderResolver,
  AttemptTracker,
  StepRunnerOptions,
} from './step-runner';
export { StepRunner } from './step-runner';

// Scheduling and aggregation
export type { SchedulerHooks, SchedulerOptions, RunOptions } from './scheduler';
export { Scheduler, WorkSignal } from './scheduler';
export type { PassTiming } from './result-aggregator';
export { ResultAggregator, formatSummary } from './result-aggregator';

// State machine
export type {
  LoopState,
  LoopStopReason,
  LoopEvent,
  LoopContext,
  TransitionResult,
} from './state-machine';
export {
  createInitialContext,
  isValidTransition,
  transition,
  isTerminalState,
} from './state-machine';

// Iteration policies
export type {
  StopReason,
  StopConditionResult,
  NextStep,
  LoopDecision,
  IterationProgress,
} from './iteration-policy';
export {
  decideNextStep,
  checkPlanningRetry,
  getIterationProgress,
} from './iteration-policy';

// Orchestrator
export type {
  OrchestratorDependencies,
  OrchestratorHooks,
  OrchestrationResult,
} from './orchestrator';
export { Orchestrator, createOrchestrator } from './orchestrator';

export { deepFreeze } from './deep-freeze';
