import { describe, it, expect, beforeEach } from 'vitest';
import { VcsProvider } from './vcs-provider';
import { MockProcessRunner } from '../io/mock-process-runner';
import { createRequest } from '../../tests/fixtures/requests';

describe('VcsProvider', () => {
  let runner: MockProcessRunner;
  let provider: VcsProvider;

  beforeEach(() => {
    runner = new MockProcessRunner();
    provider = new VcsProvider({ runner, projectRoot: '/repo' });
  });

  it('should report a clean tree', async () => {
    expect(await provider.invoke(createRequest('status'))).toEqual({ clean: true, changes: [] });
    expect(runner.getCallHistory()[0]?.options.cwd).toBe('/repo');
  });

  it('should list changed files', async () => {
    runner.setCommandConfig('git status --porcelain', { stdoutLines: [' M src/a.ts', '?? notes.md'] });

    expect(await provider.invoke(createRequest('status'))).toEqual({
      clean: false,
      changes: [' M src/a.ts', '?? notes.md'],
    });
  });

  it('should diff staged changes on request', async () => {
    runner.setCommandConfig('git diff --staged', { stdoutLines: ['+added'] });

    const output = await provider.invoke(createRequest('diff', { staged: true }));

    expect(output).toEqual({ staged: true, diff: '+added\n', empty: false });
  });

  it('should stage and commit changes', async () => {
    runner.setCommandConfig('git status --porcelain', { stdoutLines: [' M README.md'] });
    runner.setCommandConfig('git rev-parse HEAD', { stdoutLines: ['abc123'] });

    const output = await provider.invoke(createRequest('commit', { message: 'Update readme' }));

    expect(output).toEqual({ commit: 'abc123', message: 'Update readme', files: 1 });
    expect(runner.getCommandLines()).toEqual([
      'git status --porcelain',
      'git add -A',
      'git commit -m Update readme',
      'git rev-parse HEAD',
    ]);
  });

  it('should commit with the configured identity', async () => {
    provider = new VcsProvider({
      runner,
      projectRoot: '/repo',
      commitAuthor: { name: 'taskweave', email: 'taskweave@localhost' },
    });
    runner.setCommandConfig('git status --porcelain', { stdoutLines: [' M README.md'] });

    await provider.invoke(createRequest('commit', { message: 'Update readme' }));

    const calls = runner.getCallHistory();
    expect(calls[2]?.options.env).toEqual({
      GIT_AUTHOR_NAME: 'taskweave',
      GIT_AUTHOR_EMAIL: 'taskweave@localhost',
      GIT_COMMITTER_NAME: 'taskweave',
      GIT_COMMITTER_EMAIL: 'taskweave@localhost',
    });
    expect(calls[1]?.options.env).toBeUndefined();
  });

  it('should refuse to commit a clean tree', async () => {
    await expect(provider.invoke(createRequest('commit', { message: 'Nothing' }))).rejects.toMatchObject({
      kind: 'REJECTED',
      message: 'Nothing to commit: working tree clean',
    });
    expect(runner.getCommandLines()).toEqual(['git status --porcelain']);
  });

  it('should parse the log', async () => {
    runner.setPatternConfig(/^git log/, {
      stdoutLines: ['h1\tAda\t2025-01-01T00:00:00+00:00\tFirst commit', 'h2\tLin\t2025-01-02T00:00:00+00:00\tSecond'],
    });

    const output = await provider.invoke(createRequest('log', { maxCount: 2 }));

    expect(output).toEqual({
      entries: [
        { hash: 'h1', author: 'Ada', date: '2025-01-01T00:00:00+00:00', subject: 'First commit' },
        { hash: 'h2', author: 'Lin', date: '2025-01-02T00:00:00+00:00', subject: 'Second' },
      ],
    });
    expect(runner.getCommandLines()[0]).toBe(
      'git log --max-count=2 --pretty=format:%H%x09%an%x09%aI%x09%s'
    );
  });

  it('should reject when git fails', async () => {
    runner.setCommandConfig('git status --porcelain', {
      exitCode: 128,
      stderrLines: ['fatal: not a git repository'],
    });

    await expect(provider.invoke(createRequest('status'))).rejects.toMatchObject({
      kind: 'REJECTED',
      message: 'git status failed: fatal: not a git repository',
    });
  });

  it('should report a missing git binary as unavailable', async () => {
    runner.setPatternConfig(/^git/, { throwError: new Error('spawn git ENOENT') });

    await expect(provider.invoke(createRequest('status'))).rejects.toMatchObject({
      kind: 'UNAVAILABLE',
      message: 'git is not available',
    });
  });
});
