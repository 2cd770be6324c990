/**
 * Document Conversion
 *
 * Converts between the snake_case documents exchanged with collaborators
 * and the Plan / ReviewDecision types used by the orchestration core.
 */

import { deepFreeze } from '../core/deep-freeze';
import type { Plan, StepSpec } from '../types/plan';
import type { ReviewDecision, ReviewIssue, ReviewVerdict } from '../types/review';
import type { PlanDocument, PlanDocumentStep } from './plan-document.schema';
import type { ReviewDocument, ReviewDocumentIssue } from './review-document.schema';

/**
 * Convert a validated plan document into a frozen Plan.
 * Step numbers and dependency references become string ids.
 */
export function documentToPlan(document: PlanDocument): Plan {
  const steps = document.steps.map((step): StepSpec => {
    const spec: StepSpec = {
      id: String(step.step_number),
      description: step.description,
      capability: step.tool,
      action: step.action,
      args: { ...step.args },
      dependencies: step.dependencies.map((dependency) => String(dependency)),
      required: step.required,
      ...(step.expected_output ? { expectedOutput: step.expected_output } : {}),
      ...(step.timeout_ms !== undefined ? { timeoutMs: step.timeout_ms } : {}),
    };
    return spec;
  });

  return deepFreeze({
    goal: document.goal,
    feasible: document.feasible,
    strategy: document.overall_strategy,
    steps,
    risks: document.risks.map((risk) => ({ ...risk })),
    assumptions: [...document.assumptions],
    estimatedDurationMinutes: document.estimated_duration_minutes,
  });
}

/**
 * Convert a Plan back into its document form, for persistence and for
 * seeding a planner with the previous plan
 */
export function planToDocument(plan: Plan): PlanDocument {
  return {
    goal: plan.goal,
    feasible: plan.feasible,
    overall_strategy: plan.strategy,
    steps: plan.steps.map(
      (step): PlanDocumentStep => ({
        step_number: step.id,
        description: step.description,
        tool: step.capability,
        action: step.action,
        args: { ...step.args },
        expected_output: step.expectedOutput ?? '',
        dependencies: [...step.dependencies],
        required: step.required,
        ...(step.timeoutMs !== undefined ? { timeout_ms: step.timeoutMs } : {}),
      })
    ),
    risks: plan.risks.map((risk) => ({ ...risk })),
    assumptions: [...plan.assumptions],
    estimated_duration_minutes: plan.estimatedDurationMinutes,
  };
}

const STATUS_VERDICTS = new Map<string, ReviewVerdict>([
  ['approved', 'Approved'],
  ['needs_refinement', 'NeedsRefinement'],
  ['needs_revision', 'NeedsRefinement'],
  ['failed', 'Failed'],
]);

/**
 * Map a review status string to a verdict. Unrecognised statuses fail.
 */
export function statusToVerdict(status: string): ReviewVerdict {
  return STATUS_VERDICTS.get(status.trim().toLowerCase()) ?? 'Failed';
}

function toIssue(issue: string | ReviewDocumentIssue): ReviewIssue {
  if (typeof issue === 'string') {
    return { issue, severity: 'medium' };
  }
  return {
    issue: issue.issue,
    severity: issue.severity,
    ...(issue.suggestion !== undefined ? { suggestion: issue.suggestion } : {}),
  };
}

export function documentToDecision(document: ReviewDocument): ReviewDecision {
  return {
    verdict: statusToVerdict(document.status),
    goalAchieved: document.goal_achieved,
    confidence: document.confidence,
    summary: document.summary,
    issues: document.issues.map(toIssue),
    recommendation: document.recommendation,
  };
}

/**
 * Convert a decision back into its document form for the result record
 */
export function decisionToDocument(decision: ReviewDecision): ReviewDocument {
  const statuses: Record<ReviewVerdict, string> = {
    Approved: 'approved',
    NeedsRefinement: 'needs_refinement',
    Failed: 'failed',
  };
  return {
    goal_achieved: decision.goalAchieved,
    status: statuses[decision.verdict],
    summary: decision.summary,
    issues: decision.issues.map((issue) => ({ ...issue })),
    confidence: decision.confidence,
    recommendation: decision.recommendation,
  };
}
