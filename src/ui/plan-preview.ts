/**
 * Plan preview
 * Renders a plan for the terminal and asks whether to execute it
 */

import type { Plan } from '../types/plan';
import type { Prompter } from '../types/prompter';

export function formatPlanPreview(plan: Plan): string {
  const lines: string[] = [];

  lines.push('--- Plan Preview ---');
  lines.push('');
  lines.push(`Goal:     ${plan.goal}`);
  lines.push(`Strategy: ${plan.strategy}`);
  lines.push(`Estimate: ${plan.estimatedDurationMinutes} minute(s)`);
  lines.push('');
  lines.push(`Steps (${plan.steps.length}):`);
  for (const step of plan.steps) {
    const optional = step.required ? '' : ' [optional]';
    lines.push(`  ${step.id}. ${step.description}${optional}`);
    lines.push(`     ${step.capability}.${step.action}`);
    if (step.dependencies.length > 0) {
      lines.push(`     after: ${step.dependencies.join(', ')}`);
    }
  }

  if (plan.risks.length > 0) {
    lines.push('');
    lines.push('Risks:');
    for (const risk of plan.risks) {
      const mitigation = risk.mitigation ? ` (mitigation: ${risk.mitigation})` : '';
      lines.push(`  - [${risk.severity}] ${risk.risk}${mitigation}`);
    }
  }

  if (plan.assumptions.length > 0) {
    lines.push('');
    lines.push('Assumptions:');
    for (const assumption of plan.assumptions) {
      lines.push(`  - ${assumption}`);
    }
  }

  lines.push('');
  lines.push('--- End of Plan ---');
  return lines.join('\n');
}

/**
 * Build the `approvePlan` hook: print the plan, then confirm.
 * A cancelled or failed prompt rejects the plan.
 */
export function createPlanApproval(
  prompter: Prompter,
  write: (text: string) => void = (text) => console.log(text)
): (plan: Plan) => Promise<boolean> {
  return async (plan) => {
    write(formatPlanPreview(plan));
    const answer = await prompter.confirm({ message: 'Execute this plan?', default: true });
    return answer.ok ? answer.value : false;
  };
}
