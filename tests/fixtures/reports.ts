/**
 * Execution report fixtures
 */

import type { ExecutionReport, StepOutcome } from '../../src/types/execution';

const BASE = {
  description: 'step',
  capability: 'scripted',
  action: 'echo',
  required: true,
  attempts: 1,
};

export function succeeded(stepId: string): StepOutcome {
  return { ...BASE, stepId, status: 'Succeeded', output: { value: stepId } };
}

export function failed(stepId: string, message: string, required = true): StepOutcome {
  return {
    ...BASE,
    stepId,
    required,
    status: 'Failed',
    error: { kind: 'REJECTED', message, attempts: 1 },
  };
}

export function skipped(stepId: string, dependencyId: string): StepOutcome {
  return {
    ...BASE,
    stepId,
    attempts: 0,
    status: 'Skipped',
    skipReason: {
      kind: 'DEPENDENCY_FAILURE',
      dependencyId,
      message: `Dependency "${dependencyId}" failed`,
    },
  };
}

export function notRun(stepId: string): StepOutcome {
  return { ...BASE, stepId, attempts: 0, status: 'Pending' };
}

export function createReport(
  outcomes: StepOutcome[],
  overrides: Partial<ExecutionReport> = {}
): ExecutionReport {
  return {
    overallSuccess: false,
    outcomes,
    completionOrder: outcomes.map((o) => o.stepId),
    stoppedAtStep: null,
    aborted: false,
    abortReason: null,
    summary: '',
    startedAt: '2025-01-01T00:00:00.000Z',
    finishedAt: '2025-01-01T00:00:01.000Z',
    durationMs: 1000,
    ...overrides,
  };
}
