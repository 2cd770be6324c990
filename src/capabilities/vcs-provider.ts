/**
 * Version control capability backed by the git CLI
 *
 * Actions: status, diff {staged?}, commit {message}, log {maxCount?}
 */

import type { CapabilityOutput, CapabilityProvider, InvokeRequest } from '../types/capability';
import { CapabilityError } from '../types/capability';
import type { ProcessRunner } from '../types/process-runner';
import { optionalBoolean, optionalPositiveInt, requireText, unknownAction } from './args';

export interface VcsProviderOptions {
  runner: ProcessRunner;
  /** Repository working tree */
  projectRoot: string;
  /** Identity for commits, so they work without a configured git user */
  commitAuthor?: { name: string; email: string };
}

interface GitOutput {
  stdout: string;
  stderr: string;
}

export class VcsProvider implements CapabilityProvider {
  readonly name = 'vcs';

  constructor(private readonly options: VcsProviderOptions) {}

  async invoke(request: InvokeRequest): Promise<CapabilityOutput> {
    switch (request.action) {
      case 'status':
        return this.status(request);
      case 'diff':
        return this.diff(request);
      case 'commit':
        return this.commit(request);
      case 'log':
        return this.log(request);
      default:
        throw unknownAction(this.name, request.action);
    }
  }

  private async git(
    args: string[],
    request: InvokeRequest,
    env?: Record<string, string>
  ): Promise<GitOutput> {
    let stdout = '';
    let stderr = '';
    let exitCode: number;
    let timedOut: boolean;
    try {
      const result = await this.options.runner.spawn('git', {
        args,
        cwd: this.options.projectRoot,
        ...(env ? { env } : {}),
        timeoutMs: request.timeoutMs,
        signal: request.signal,
        onStdout: (data) => {
          stdout += data;
        },
        onStderr: (data) => {
          stderr += data;
        },
      });
      exitCode = result.exitCode;
      timedOut = result.timedOut;
    } catch (error) {
      throw new CapabilityError('UNAVAILABLE', 'git is not available', { cause: error });
    }

    if (timedOut) {
      throw new CapabilityError('TIMEOUT', `git ${args[0]} timed out after ${request.timeoutMs}ms`);
    }
    if (exitCode !== 0) {
      const detail = stderr.trim() || stdout.trim() || `exit code ${exitCode}`;
      throw new CapabilityError('REJECTED', `git ${args[0]} failed: ${detail}`);
    }
    return { stdout, stderr };
  }

  private async changedFiles(request: InvokeRequest): Promise<string[]> {
    const { stdout } = await this.git(['status', '--porcelain'], request);
    return stdout.split('\n').filter((line) => line.trim() !== '');
  }

  private async status(request: InvokeRequest): Promise<CapabilityOutput> {
    const changes = await this.changedFiles(request);
    return { clean: changes.length === 0, changes };
  }

  private async diff(request: InvokeRequest): Promise<CapabilityOutput> {
    const staged = optionalBoolean(request.args, 'staged', false);
    const { stdout } = await this.git(staged ? ['diff', '--staged'] : ['diff'], request);
    return { staged, diff: stdout, empty: stdout.trim() === '' };
  }

  private async commit(request: InvokeRequest): Promise<CapabilityOutput> {
    const message = requireText(request.args, 'message');
    const changes = await this.changedFiles(request);
    if (changes.length === 0) {
      throw new CapabilityError('REJECTED', 'Nothing to commit: working tree clean');
    }

    await this.git(['add', '-A'], request);
    await this.git(['commit', '-m', message], request, this.authorEnv());
    const { stdout } = await this.git(['rev-parse', 'HEAD'], request);
    return { commit: stdout.trim(), message, files: changes.length };
  }

  private authorEnv(): Record<string, string> | undefined {
    const author = this.options.commitAuthor;
    if (!author) {
      return undefined;
    }
    return {
      GIT_AUTHOR_NAME: author.name,
      GIT_AUTHOR_EMAIL: author.email,
      GIT_COMMITTER_NAME: author.name,
      GIT_COMMITTER_EMAIL: author.email,
    };
  }

  private async log(request: InvokeRequest): Promise<CapabilityOutput> {
    const maxCount = optionalPositiveInt(request.args, 'maxCount', 5);
    const { stdout } = await this.git(
      ['log', `--max-count=${maxCount}`, '--pretty=format:%H%x09%an%x09%aI%x09%s'],
      request
    );
    const entries = stdout
      .split('\n')
      .filter((line) => line.trim() !== '')
      .map((line) => {
        const [hash = '', author = '', date = '', ...subject] = line.split('\t');
        return { hash, author, date, subject: subject.join('\t') };
      });
    return { entries };
  }
}
