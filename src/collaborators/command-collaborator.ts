/**
 * Planner and reviewer backed by an external command
 *
 * The command runs through the platform shell with a JSON request on stdin
 * (including the JSON schema of the expected document) and must print a JSON
 * object on stdout, optionally inside a ```json fence.
 */

import type { ProcessRunner } from '../types/process-runner';
import type {
  Planner,
  PlanRequest,
  Reviewer,
  ReviewRequest,
} from '../types/collaborators';
import type { Logger } from '../types/logger';
import { planDocumentJsonSchema } from '../schemas/plan-document.schema';
import { reviewDocumentJsonSchema } from '../schemas/review-document.schema';
import { planToDocument } from '../schemas/document-conversion';
import { extractJsonObject } from './extract-json';

export interface CommandCollaboratorOptions {
  runner: ProcessRunner;
  /** Shell command line */
  command: string;
  cwd: string;
  logger: Logger;
  /** 0 or unset = no timeout */
  timeoutMs?: number;
}

abstract class CommandCollaborator {
  protected readonly options: CommandCollaboratorOptions;

  constructor(options: CommandCollaboratorOptions) {
    this.options = options;
  }

  protected async request(
    role: string,
    payload: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<unknown> {
    const { runner, command, cwd, logger, timeoutMs } = this.options;
    const chunks: string[] = [];

    logger.debug(`Running ${role} command: ${command}`);
    const result = await runner.spawn(command, {
      args: [],
      cwd,
      shell: true,
      input: JSON.stringify(payload),
      ...(timeoutMs !== undefined ? { timeoutMs } : {}),
      ...(signal ? { signal } : {}),
      onStdout: (data) => chunks.push(data),
    });

    if (result.timedOut) {
      throw new Error(`${role} command timed out after ${timeoutMs ?? 0}ms: ${command}`);
    }
    if (result.exitCode !== 0) {
      const detail = result.stderrTail[result.stderrTail.length - 1] ?? 'no output';
      throw new Error(`${role} command exited with code ${result.exitCode}: ${detail}`);
    }

    const extracted = extractJsonObject(chunks.join(''));
    if (!extracted.ok) {
      throw new Error(`${role} command output: ${extracted.error}`);
    }
    return extracted.value;
  }
}

export class CommandPlanner extends CommandCollaborator implements Planner {
  readonly name = 'command';

  plan(request: PlanRequest): Promise<unknown> {
    return this.request(
      'Planner',
      {
        kind: 'plan',
        goal: request.goal,
        iteration: request.iteration,
        feedback: request.feedback,
        memory_context: request.memoryContext,
        previous_plan: request.previousPlan ? planToDocument(request.previousPlan) : null,
        schema: planDocumentJsonSchema,
      },
      request.signal
    );
  }
}

export class CommandReviewer extends CommandCollaborator implements Reviewer {
  readonly name = 'command';

  review(request: ReviewRequest): Promise<unknown> {
    return this.request(
      'Reviewer',
      {
        kind: 'review',
        goal: request.goal,
        strategy: request.strategy,
        report: request.report,
        schema: reviewDocumentJsonSchema,
      },
      request.signal
    );
  }
}
