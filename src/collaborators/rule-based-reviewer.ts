/**
 * Default reviewer: judges a pass from its report alone
 *
 * - approved: overallSuccess
 * - needs_refinement: no required step failed, but the pass did not finish
 * - failed: a required step failed
 *
 * Confidence is the fraction of steps that succeeded (1 for an empty plan).
 */

import type { Reviewer, ReviewRequest } from '../types/collaborators';
import type { ExecutionReport, StepOutcome } from '../types/execution';
import type { ReviewDocument, ReviewDocumentIssue } from '../schemas/review-document.schema';

export class RuleBasedReviewer implements Reviewer {
  readonly name = 'rules';

  async review(request: ReviewRequest): Promise<ReviewDocument> {
    return reviewReport(request.report);
  }
}

export function reviewReport(report: ExecutionReport): ReviewDocument {
  const { outcomes } = report;
  const total = outcomes.length;
  const succeeded = outcomes.filter((o) => o.status === 'Succeeded').length;
  const confidence = total === 0 ? 1 : succeeded / total;
  const issues = outcomes.flatMap(describeIssue);
  const summary = `${succeeded}/${total} step(s) succeeded`;

  if (report.overallSuccess) {
    return {
      goal_achieved: true,
      status: 'approved',
      summary,
      issues,
      confidence,
      recommendation: 'No further action needed',
    };
  }

  const requiredFailure = outcomes.some((o) => o.status === 'Failed' && o.required);
  if (!requiredFailure) {
    return {
      goal_achieved: false,
      status: 'needs_refinement',
      summary: report.aborted ? `${summary}; pass aborted` : summary,
      issues,
      confidence,
      recommendation: 'Plan the remaining steps again',
    };
  }

  return {
    goal_achieved: false,
    status: 'failed',
    summary: report.stoppedAtStep ? `${summary}; stopped at step ${report.stoppedAtStep}` : summary,
    issues,
    confidence,
    recommendation: 'Retry the failed steps',
  };
}

function describeIssue(outcome: StepOutcome): ReviewDocumentIssue[] {
  switch (outcome.status) {
    case 'Failed':
      return [
        {
          issue: `${outcome.required ? 'Required' : 'Optional'} step "${outcome.stepId}" failed: ${outcome.error.message}`,
          severity: outcome.required ? 'high' : 'low',
        },
      ];
    case 'Skipped':
      return [
        {
          issue: `Step "${outcome.stepId}" was skipped: ${outcome.skipReason.message}`,
          severity: 'medium',
        },
      ];
    case 'Pending':
    case 'Ready':
    case 'Running':
      return [{ issue: `Step "${outcome.stepId}" did not run`, severity: 'medium' }];
    case 'Succeeded':
      return [];
  }
}
