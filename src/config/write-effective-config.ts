/**
 * Write Effective Config Artifact
 * Writes the resolved configuration beside the run's result record
 * Collaborator commands are redacted
 */

import { EffectiveConfig } from '../types/effective-config';
import { FileSystem, FileSystemError } from '../types/file-system';
import { redactSecrets } from '../types/logger';
import { Result, ok, err } from '../types/result';

export const EFFECTIVE_CONFIG_FILE_NAME = 'effective-config.json';

/**
 * Copy of the config with secret-looking text removed from commands
 */
export function redactConfig(config: EffectiveConfig): EffectiveConfig {
  const { plannerCommand, reviewerCommand } = config.collaborators;
  return {
    ...config,
    collaborators: {
      ...config.collaborators,
      ...(plannerCommand ? { plannerCommand: redactSecrets(plannerCommand) } : {}),
      ...(reviewerCommand ? { reviewerCommand: redactSecrets(reviewerCommand) } : {}),
    },
  };
}

/**
 * Write the effective config artifact to `<artifactBaseDir>/runs/<runId>/`
 */
export async function writeEffectiveConfigArtifact(
  config: EffectiveConfig,
  fs: FileSystem,
  now: Date = new Date()
): Promise<Result<string, FileSystemError>> {
  const artifact = {
    schemaVersion: '1.0.0',
    artifactType: 'effective-config',
    generatedAt: now.toISOString(),
    runId: config.runId,
    config: redactConfig(config),
  };

  const artifactPath = fs.join(config.paths.artifactBaseDir, 'runs', config.runId, EFFECTIVE_CONFIG_FILE_NAME);
  const written = await fs.writeFile(artifactPath, JSON.stringify(artifact, null, 2) + '\n', {
    createParents: true,
  });
  if (!written.ok) {
    return err(written.error);
  }
  return ok(artifactPath);
}

function yesNo(value: boolean): string {
  return value ? 'yes' : 'no';
}

/**
 * Format effective config for human-readable display
 */
export function formatEffectiveConfigForDisplay(config: EffectiveConfig): string {
  const lines: string[] = [];
  const source = (key: string): string => {
    const from = config.sources?.[key];
    return from && from !== 'default' ? ` (${from})` : '';
  };

  lines.push('═══════════════════════════════════════════════════════════════');
  lines.push('                    EFFECTIVE CONFIGURATION');
  lines.push('═══════════════════════════════════════════════════════════════');
  lines.push('');

  lines.push(`Run ID:              ${config.runId}`);
  lines.push(`Working Directory:   ${config.paths.workingDirectory}`);
  lines.push(`Project Root:        ${config.paths.projectRoot}${source('paths.projectRoot')}`);
  lines.push(`Resolved At:         ${config.resolvedAt}`);
  lines.push('');

  lines.push('┌─ Limits ────────────────────────────────────────────────────┐');
  lines.push(`│ Max Retries:        ${config.loop.maxRetries}${source('loop.maxRetries')}`);
  lines.push(`│ Workers:            ${config.execution.maxWorkers}${source('execution.maxWorkers')}`);
  lines.push(`│ Step Timeout:       ${config.execution.stepTimeoutMs}ms${source('execution.stepTimeoutMs')}`);
  lines.push(`│ Step Retries:       ${config.execution.stepMaxRetries}${source('execution.stepMaxRetries')}`);
  lines.push(`│ Backoff:            ${config.backoff.delaysMs.join(', ')}ms (cap ${config.backoff.maxDelayMs}ms)`);
  lines.push('└──────────────────────────────────────────────────────────────┘');
  lines.push('');

  const redacted = redactConfig(config).collaborators;
  lines.push('┌─ Collaborators ─────────────────────────────────────────────┐');
  if (redacted.planFile) {
    lines.push(`│ Plan File:  ${redacted.planFile}`);
  }
  if (redacted.plannerCommand) {
    lines.push(`│ Planner:    ${redacted.plannerCommand}`);
  }
  lines.push(`│ Reviewer:   ${redacted.reviewerCommand ?? 'built-in rules'}`);
  lines.push('└──────────────────────────────────────────────────────────────┘');
  lines.push('');

  lines.push('┌─ Run Mode ──────────────────────────────────────────────────┐');
  lines.push(`│ Interactive:     ${yesNo(config.interactivity.interactive)}`);
  lines.push(`│ Preview Plan:    ${yesNo(config.interactivity.previewPlan)}`);
  lines.push(`│ Mock Mode:       ${yesNo(config.runMode.mockMode)}`);
  lines.push(`│ Auto-commit:     ${yesNo(config.runMode.autoCommit)}`);
  lines.push(`│ Memory:          ${config.memory.enabled ? `yes (top ${config.memory.topK})` : 'no'}`);
  lines.push('└──────────────────────────────────────────────────────────────┘');
  lines.push('');

  if (config.verbosity.verbose || config.verbosity.debug) {
    lines.push('┌─ Verbosity ─────────────────────────────────────────────────┐');
    lines.push(`│ Verbose: ${yesNo(config.verbosity.verbose)}`);
    lines.push(`│ Debug:   ${yesNo(config.verbosity.debug)}`);
    lines.push(`│ JSON:    ${yesNo(config.verbosity.jsonOutput)}`);
    lines.push('└──────────────────────────────────────────────────────────────┘');
    lines.push('');
  }

  lines.push('═══════════════════════════════════════════════════════════════');

  return lines.join('\n');
}
