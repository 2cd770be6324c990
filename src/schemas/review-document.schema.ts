/**
 * Schema for the review document a reviewer returns
 */

export type ReviewDocumentStatus = 'approved' | 'needs_refinement' | 'needs_revision' | 'failed';

export interface ReviewDocumentIssue {
  issue: string;
  severity: 'low' | 'medium' | 'high' | 'critical';
  suggestion?: string;
}

export interface ReviewDocument {
  goal_achieved: boolean;

  /**
   * One of ReviewDocumentStatus; any other value counts as failed
   */
  status: string;

  summary: string;

  /**
   * Plain strings are accepted and read as medium-severity issues
   */
  issues: Array<string | ReviewDocumentIssue>;

  /**
   * 0..1
   */
  confidence: number;

  recommendation: string;
}

export const reviewDocumentJsonSchema = {
  type: 'object',
  required: ['status'],
  properties: {
    goal_achieved: { type: 'boolean', default: false },
    status: {
      type: 'string',
      enum: ['approved', 'needs_refinement', 'needs_revision', 'failed'],
      description: 'needs_revision is an alias of needs_refinement',
    },
    summary: { type: 'string', default: '' },
    issues: {
      type: 'array',
      default: [],
      items: {
        oneOf: [
          { type: 'string' },
          {
            type: 'object',
            required: ['issue'],
            properties: {
              issue: { type: 'string' },
              severity: {
                type: 'string',
                enum: ['low', 'medium', 'high', 'critical'],
                default: 'medium',
              },
              suggestion: { type: 'string' },
            },
          },
        ],
      },
    },
    confidence: { type: 'number', minimum: 0, maximum: 1, default: 0 },
    recommendation: { type: 'string', default: '' },
  },
};

export const exampleReviewDocument: ReviewDocument = {
  goal_achieved: false,
  status: 'needs_refinement',
  summary: 'The entry was written but the commit step failed.',
  issues: [
    {
      issue: 'Commit failed: nothing staged',
      severity: 'medium',
      suggestion: 'Stage CHANGELOG.md before committing',
    },
  ],
  confidence: 0.67,
  recommendation: 'Add a staging step before the commit.',
};
