import { describe, it, expect } from 'vitest';
import { RuleBasedReviewer, reviewReport } from './rule-based-reviewer';
import {
  createReport,
  failed,
  notRun,
  skipped,
  succeeded,
} from '../../tests/fixtures/reports';

describe('reviewReport', () => {
  it('should approve a successful pass', () => {
    const review = reviewReport(createReport([succeeded('1'), succeeded('2')], { overallSuccess: true }));

    expect(review).toEqual({
      goal_achieved: true,
      status: 'approved',
      summary: '2/2 step(s) succeeded',
      issues: [],
      confidence: 1,
      recommendation: 'No further action needed',
    });
  });

  it('should approve an empty plan with full confidence', () => {
    const review = reviewReport(createReport([], { overallSuccess: true }));
    expect(review.status).toBe('approved');
    expect(review.confidence).toBe(1);
  });

  it('should keep optional failures as low severity issues on approval', () => {
    const review = reviewReport(
      createReport([succeeded('1'), failed('2', 'lint warnings', false)], { overallSuccess: true })
    );

    expect(review.status).toBe('approved');
    expect(review.confidence).toBe(0.5);
    expect(review.issues).toEqual([{ issue: 'Optional step "2" failed: lint warnings', severity: 'low' }]);
  });

  it('should ask for refinement when steps never ran', () => {
    const review = reviewReport(
      createReport([succeeded('1'), notRun('2')], { aborted: true, abortReason: 'cancelled' })
    );

    expect(review.status).toBe('needs_refinement');
    expect(review.summary).toBe('1/2 step(s) succeeded; pass aborted');
    expect(review.issues).toEqual([{ issue: 'Step "2" did not run', severity: 'medium' }]);
  });

  it('should fail when a required step failed', () => {
    const review = reviewReport(
      createReport([succeeded('1'), failed('2', 'exit 1'), skipped('3', '2')], { stoppedAtStep: '2' })
    );

    expect(review.status).toBe('failed');
    expect(review.goal_achieved).toBe(false);
    expect(review.confidence).toBeCloseTo(1 / 3);
    expect(review.summary).toBe('1/3 step(s) succeeded; stopped at step 2');
    expect(review.issues).toEqual([
      { issue: 'Required step "2" failed: exit 1', severity: 'high' },
      { issue: 'Step "3" was skipped: Dependency "2" failed', severity: 'medium' },
    ]);
  });
});

describe('RuleBasedReviewer', () => {
  it('should review the report of the request', async () => {
    const reviewer = new RuleBasedReviewer();
    const review = await reviewer.review({
      goal: 'g',
      strategy: 's',
      report: createReport([failed('1', 'boom')]),
    });
    expect(review.status).toBe('failed');
  });
});
