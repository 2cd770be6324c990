import { describe, it, expect } from 'vitest';
import {
  writeEffectiveConfigArtifact,
  formatEffectiveConfigForDisplay,
  redactConfig,
} from './write-effective-config';
import { createDefaultConfig } from '../types/effective-config';
import { createMemoryFileSystem } from '../io/memory-file-system';

const PATHS = {
  workingDirectory: '/project',
  projectRoot: '/project',
  artifactBaseDir: '/project/.taskweave',
};

function createConfig() {
  return createDefaultConfig('Ship it', PATHS, {
    runId: 'run-1',
    collaborators: { plannerCommand: 'planner --token=test-secret-value' },
  });
}

describe('redactConfig', () => {
  it('should redact secrets in collaborator commands', () => {
    const redacted = redactConfig(createConfig());

    expect(redacted.collaborators.plannerCommand).toBe('planner --toke[REDACTED]');
    expect(redacted.collaborators.reviewerCommand).toBeUndefined();
  });
});

describe('writeEffectiveConfigArtifact', () => {
  it('should write the redacted config into the run directory', async () => {
    const fs = createMemoryFileSystem('/project');
    const now = new Date('2025-01-01T00:00:00.000Z');

    const result = await writeEffectiveConfigArtifact(createConfig(), fs, now);

    expect(result).toEqual({ ok: true, value: '/project/.taskweave/runs/run-1/effective-config.json' });
    const content = await fs.readFile('/project/.taskweave/runs/run-1/effective-config.json');
    if (!content.ok) {
      throw new Error('artifact missing');
    }
    const artifact: unknown = JSON.parse(content.value);
    expect(artifact).toMatchObject({
      artifactType: 'effective-config',
      generatedAt: '2025-01-01T00:00:00.000Z',
      runId: 'run-1',
      config: {
        goal: 'Ship it',
        collaborators: { plannerCommand: 'planner --toke[REDACTED]' },
      },
    });
  });
});

describe('formatEffectiveConfigForDisplay', () => {
  it('should include limits and the value sources that are not defaults', () => {
    const config = {
      ...createConfig(),
      sources: { 'loop.maxRetries': 'cli' as const, 'execution.maxWorkers': 'default' as const },
    };

    const lines = formatEffectiveConfigForDisplay(config).split('\n');

    expect(lines).toContain('│ Max Retries:        2 (cli)');
    expect(lines).toContain('│ Workers:            4');
    expect(lines).toContain('│ Planner:    planner --toke[REDACTED]');
    expect(lines).toContain('│ Reviewer:   built-in rules');
    expect(lines).toContain('│ Memory:          yes (top 5)');
  });
});
