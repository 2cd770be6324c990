/**
 * Run Summary
 * Human-readable summary of a persisted result record
 */

import type { ResultRecord } from '../io/result-store';

/**
 * Format run summary as markdown
 */
export function formatRunSummaryMarkdown(record: ResultRecord): string {
  const durationMs = new Date(record.finished_at).getTime() - new Date(record.started_at).getTime();
  const lines: string[] = [
    '# Run Summary',
    '',
    `**Run ID:** ${record.run_id}`,
    `**Status:** ${record.success ? '✅ Success' : '❌ Failed'}`,
    `**Final State:** ${record.final_state}`,
    `**Duration:** ${formatDuration(durationMs)}`,
    '',
    '## Goal',
    '',
    record.goal,
    '',
    '## Iterations',
    '',
    `- Iterations: ${record.context.iteration_count}`,
    `- Execution Passes: ${record.context.execution_history.length}`,
    `- Errors Recovered: ${record.context.errors_recovered}`,
  ];

  if (record.context.retrieved_memories.length > 0) {
    lines.push(`- Memories Used: ${record.context.retrieved_memories.length}`);
  }

  if (record.result) {
    lines.push('');
    lines.push('## Last Pass');
    lines.push('');
    lines.push(record.result.summary || '(no steps)');
  }

  if (record.review) {
    const { review } = record;
    lines.push('');
    lines.push('## Review');
    lines.push('');
    lines.push(`- Status: ${review.status} (${Math.round(review.confidence * 100)}% confidence)`);
    if (review.summary) {
      lines.push(`- Summary: ${review.summary}`);
    }
    for (const issue of review.issues) {
      lines.push(
        typeof issue === 'string' ? `- Issue: ${issue}` : `- Issue [${issue.severity}]: ${issue.issue}`
      );
    }
  }

  if (record.error) {
    lines.push('');
    lines.push('## Error');
    lines.push('');
    lines.push('```');
    lines.push(record.error);
    lines.push('```');
  }

  lines.push('');

  return lines.join('\n');
}

/**
 * Format duration in human-readable form
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes < 60) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return `${hours}h ${remainingMinutes}m`;
}
