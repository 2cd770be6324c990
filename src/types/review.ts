/**
 * Review decision types
 */

export type ReviewVerdict = 'Approved' | 'NeedsRefinement' | 'Failed';

export type IssueSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface ReviewIssue {
  issue: string;
  severity: IssueSeverity;
  suggestion?: string;
}

/**
 * The reviewer's verdict on one execution pass.
 * Consumed once to pick the next loop transition.
 */
export interface ReviewDecision {
  verdict: ReviewVerdict;
  goalAchieved: boolean;
  /** 0..1 */
  confidence: number;
  summary: string;
  issues: ReviewIssue[];
  recommendation: string;
}
