/**
 * ResultAggregator
 *
 * Collects terminal step outcomes as they arrive and folds a finished pass
 * into an immutable ExecutionReport.
 */

import type { DuplicateOutcomeError } from '../types/errors';
import type { ExecutionReport, StepOutcome, StepRecord } from '../types/execution';
import type { Result } from '../types/result';
import { ok, err } from '../types/result';
import { deepFreeze } from './deep-freeze';
import type { ExecutionState } from './execution-state';
import type { PlanGraph } from './plan-graph';

export interface PassTiming {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export class ResultAggregator {
  private readonly completionOrder: string[] = [];

  /**
   * Append a terminal step to the completion log.
   * Returns the step's position in the log.
   */
  record(record: StepRecord): Result<number, DuplicateOutcomeError> {
    const stepId = record.spec.id;
    if (this.completionOrder.includes(stepId)) {
      return err({
        type: 'DUPLICATE_OUTCOME',
        stepId,
        message: `Outcome for step "${stepId}" was already recorded`,
      });
    }
    this.completionOrder.push(stepId);
    return ok(this.completionOrder.length - 1);
  }

  getCompletionOrder(): readonly string[] {
    return [...this.completionOrder];
  }

  buildReport(graph: PlanGraph, state: ExecutionState, timing: PassTiming): ExecutionReport {
    const outcomes = state.snapshot().map(toOutcome);
    const byId = new Map(outcomes.map((outcome): [string, StepOutcome] => [outcome.stepId, outcome]));

    const requiredFailure = (id: string): boolean => {
      const outcome = byId.get(id);
      return outcome !== undefined && outcome.status === 'Failed' && outcome.required;
    };

    const anyRequiredFailed = outcomes.some((outcome) => requiredFailure(outcome.stepId));
    const allTerminal = outcomes.every(
      (outcome) =>
        outcome.status === 'Succeeded' || outcome.status === 'Failed' || outcome.status === 'Skipped'
    );

    return deepFreeze({
      overallSuccess: !anyRequiredFailed && allTerminal,
      outcomes,
      completionOrder: [...this.completionOrder],
      stoppedAtStep: graph.topologicalOrder.find(requiredFailure) ?? null,
      aborted: state.aborted,
      abortReason: state.abortReason,
      summary: formatSummary(outcomes),
      startedAt: timing.startedAt,
      finishedAt: timing.finishedAt,
      durationMs: timing.durationMs,
    });
  }
}

function toOutcome(record: StepRecord): StepOutcome {
  const base = {
    stepId: record.spec.id,
    description: record.spec.description,
    capability: record.spec.capability,
    action: record.spec.action,
    required: record.spec.required,
    attempts: record.attempts,
    startedAt: record.startedAt,
    finishedAt: record.finishedAt,
  };

  switch (record.status) {
    case 'Succeeded':
      return { ...base, status: 'Succeeded', output: record.output ?? {} };
    case 'Failed':
      return {
        ...base,
        status: 'Failed',
        error: record.error ?? { kind: 'REJECTED', message: 'Unknown failure', attempts: record.attempts },
      };
    case 'Skipped':
      return {
        ...base,
        status: 'Skipped',
        skipReason: record.skipReason ?? {
          kind: 'DEPENDENCY_FAILURE',
          dependencyId: '',
          message: 'dependency failed',
        },
      };
    default:
      return { ...base, status: record.status };
  }
}

/**
 * One line per step, in plan order
 */
export function formatSummary(outcomes: readonly StepOutcome[]): string {
  return outcomes
    .map((outcome) => {
      switch (outcome.status) {
        case 'Succeeded':
          return `✓ Step ${outcome.stepId}: ${outcome.description}`;
        case 'Failed':
          return `✗ Step ${outcome.stepId}: ${outcome.error.message}`;
        case 'Skipped':
          return `↷ Step ${outcome.stepId}: skipped (${outcome.skipReason.message})`;
        default:
          return `… Step ${outcome.stepId}: not run`;
      }
    })
    .join('\n');
}
