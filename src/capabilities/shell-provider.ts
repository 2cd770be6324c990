/**
 * Shell capability
 *
 * Action: run_command {command, cwd?}. The command runs through the platform
 * shell inside the project root; forbidden commands are refused.
 */

import type { CapabilityOutput, CapabilityProvider, InvokeRequest } from '../types/capability';
import { CapabilityError } from '../types/capability';
import type { ProcessRunner, SpawnResult } from '../types/process-runner';
import { optionalString, requireText, unknownAction } from './args';
import { findForbiddenCommand, resolveInsideRoot } from './sandbox';

/** Output kept per stream */
const MAX_OUTPUT_CHARS = 100_000;

export interface ShellProviderOptions {
  runner: ProcessRunner;
  projectRoot: string;
  forbiddenCommands: readonly string[];
  excludedPaths: readonly string[];
}

function appendCapped(buffer: string, chunk: string): string {
  const next = buffer + chunk;
  return next.length > MAX_OUTPUT_CHARS ? next.slice(next.length - MAX_OUTPUT_CHARS) : next;
}

export class ShellProvider implements CapabilityProvider {
  readonly name = 'shell';

  constructor(private readonly options: ShellProviderOptions) {}

  async invoke(request: InvokeRequest): Promise<CapabilityOutput> {
    if (request.action !== 'run_command') {
      throw unknownAction(this.name, request.action);
    }

    const command = requireText(request.args, 'command');
    const forbidden = findForbiddenCommand(command, this.options.forbiddenCommands);
    if (forbidden !== undefined) {
      throw new CapabilityError('PERMISSION_DENIED', `Forbidden command "${forbidden}" in: ${command}`);
    }

    const cwd = resolveInsideRoot(
      this.options.projectRoot,
      optionalString(request.args, 'cwd') ?? '.',
      this.options.excludedPaths
    );

    let stdout = '';
    let stderr = '';
    let result: SpawnResult;
    try {
      result = await this.options.runner.spawn(command, {
        args: [],
        cwd: cwd.absolute,
        shell: true,
        timeoutMs: request.timeoutMs,
        signal: request.signal,
        onStdout: (data) => {
          stdout = appendCapped(stdout, data);
        },
        onStderr: (data) => {
          stderr = appendCapped(stderr, data);
        },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CapabilityError('UNAVAILABLE', `Could not start command: ${message}`, { cause: error });
    }

    if (result.timedOut) {
      throw new CapabilityError('TIMEOUT', `Command timed out after ${request.timeoutMs}ms: ${command}`);
    }
    if (request.signal.aborted) {
      throw new CapabilityError('TIMEOUT', `Command aborted: ${command}`);
    }
    if (result.exitCode !== 0) {
      const detail = stderr.trim().split('\n').pop() ?? '';
      throw new CapabilityError(
        'REJECTED',
        `Command exited with code ${result.exitCode}${detail ? `: ${detail}` : ''}`
      );
    }

    return {
      command,
      exitCode: result.exitCode,
      stdout: stdout.trimEnd(),
      stderr: stderr.trimEnd(),
      durationMs: result.durationMs,
    };
  }
}
