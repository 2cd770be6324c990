/**
 * StepRunner
 *
 * Executes one step against its capability provider: a deadline per attempt,
 * transient failures retried on the backoff schedule, everything else
 * failing the step at once.
 */

import type { CapabilityOutput, CapabilityProvider } from '../types/capability';
import { CapabilityError, isTransientKind } from '../types/capability';
import type { Clock } from '../types/clock';
import { DelayAbortedError } from '../types/clock';
import type { StepFailure } from '../types/execution';
import type { Logger } from '../types/logger';
import type { StepSpec } from '../types/plan';
import type { BackoffSchedule } from './backoff';
import { classifyError } from './classify-error';

export type StepRunOutcome =
  | { status: 'Succeeded'; output: CapabilityOutput; attempts: number }
  | { status: 'Failed'; error: StepFailure };

/**
 * Provider lookup by capability name
 */
export interface ProviderResolver {
  get(name: string): CapabilityProvider | undefined;
}

/**
 * Where attempts are counted (the pass's ExecutionState)
 */
export interface AttemptTracker {
  recordAttempt(stepId: string): number;
}

export interface StepRunnerOptions {
  providers: ProviderResolver;
  backoff: BackoffSchedule;
  clock: Clock;
  logger: Logger;
  /** Per-attempt timeout unless the step sets its own */
  stepTimeoutMs: number;
  /** Retries after the first attempt for transient failures */
  maxRetries: number;
}

export class StepRunner {
  private readonly options: StepRunnerOptions;

  constructor(options: StepRunnerOptions) {
    this.options = options;
  }

  async run(step: StepSpec, signal: AbortSignal, tracker: AttemptTracker): Promise<StepRunOutcome> {
    const { providers, backoff, clock, logger, maxRetries } = this.options;
    const provider = providers.get(step.capability);
    if (!provider) {
      return {
        status: 'Failed',
        error: {
          kind: 'VALIDATION',
          message: `No provider registered for capability "${step.capability}"`,
          attempts: 0,
        },
      };
    }

    const timeoutMs = step.timeoutMs ?? this.options.stepTimeoutMs;

    for (let retry = 0; ; retry++) {
      const attempts = tracker.recordAttempt(step.id);
      try {
        const output = await this.attempt(provider, step, timeoutMs, signal);
        return { status: 'Succeeded', output, attempts };
      } catch (error) {
        const { kind, message } = classifyError(error);
        const failure: StepFailure = { kind, message, attempts };

        if (!isTransientKind(kind) || retry >= maxRetries || signal.aborted) {
          return { status: 'Failed', error: failure };
        }

        const delayMs = backoff.delayFor(retry + 1);
        logger.event('step_retry', `Step ${step.id} failed (${kind}): retrying in ${delayMs}ms`, {
          stepId: step.id,
          attempt: attempts,
          errorKind: kind,
          delayMs,
        });

        try {
          await clock.delay(delayMs, signal);
        } catch (delayError) {
          if (delayError instanceof DelayAbortedError) {
            return { status: 'Failed', error: failure };
          }
          throw delayError;
        }
      }
    }
  }

  /**
   * One invocation bounded by its own deadline. The run signal is forwarded
   * so providers can stop early on cancellation. A timed-out attempt still
   * waits for the provider to settle, so no retry or dependent overlaps it.
   */
  private async attempt(
    provider: CapabilityProvider,
    step: StepSpec,
    timeoutMs: number,
    runSignal: AbortSignal
  ): Promise<CapabilityOutput> {
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(runSignal.reason);
    if (runSignal.aborted) {
      forwardAbort();
    } else {
      runSignal.addEventListener('abort', forwardAbort, { once: true });
    }

    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        reject(new CapabilityError('TIMEOUT', `Step "${step.id}" timed out after ${timeoutMs}ms`));
        controller.abort();
      }, timeoutMs);
    });

    let invocation: Promise<CapabilityOutput> | undefined;
    try {
      invocation = provider.invoke({
        stepId: step.id,
        action: step.action,
        args: step.args,
        timeoutMs,
        signal: controller.signal,
      });
      return await Promise.race([invocation, deadline]);
    } catch (error) {
      // A provider may ignore the abort; the step is not over until it settles
      if (timedOut && invocation) {
        await Promise.allSettled([invocation]);
      }
      throw error;
    } finally {
      clearTimeout(timer);
      runSignal.removeEventListener('abort', forwardAbort);
    }
  }
}
