/**
 * Scripted capability provider
 *
 * Replays canned responses per step id, in order; the last response repeats.
 * Steps without a script echo their request back. Used for tests and for
 * `--mock` dry runs.
 */

import type {
  CapabilityOutput,
  CapabilityProvider,
  ErrorKind,
  InvokeRequest,
} from '../types/capability';
import { CapabilityError } from '../types/capability';
import type { Clock } from '../types/clock';
import { SystemClock } from '../types/clock';

export type ScriptedResponse =
  | { output: CapabilityOutput; delayMs?: number }
  | { error: ErrorKind; message?: string; delayMs?: number }
  /** Never settles on its own; rejects when the request signal aborts */
  | { hang: true };

export interface ScriptedProviderOptions {
  /** Provider name; defaults to "scripted" */
  name?: string;
  /** Responses keyed by step id */
  script?: Record<string, ScriptedResponse[]>;
  /** Used for response delays */
  clock?: Clock;
  /** Mark echoed output as a dry run */
  dryRun?: boolean;
}

export class ScriptedProvider implements CapabilityProvider {
  readonly name: string;
  /** Every request received, in order */
  readonly calls: InvokeRequest[] = [];

  private readonly script: Map<string, ScriptedResponse[]>;
  private readonly clock: Clock;
  private readonly dryRun: boolean;
  private inFlight = 0;
  private peak = 0;

  constructor(options: ScriptedProviderOptions = {}) {
    this.name = options.name ?? 'scripted';
    this.script = new Map(
      Object.entries(options.script ?? {}).map(([id, responses]): [string, ScriptedResponse[]] => [
        id,
        [...responses],
      ])
    );
    this.clock = options.clock ?? new SystemClock();
    this.dryRun = options.dryRun ?? false;
  }

  async invoke(request: InvokeRequest): Promise<CapabilityOutput> {
    this.calls.push(request);
    this.inFlight += 1;
    this.peak = Math.max(this.peak, this.inFlight);
    try {
      return await this.respond(request, this.next(request.stepId));
    } finally {
      this.inFlight -= 1;
    }
  }

  /**
   * Number of invocations for one step
   */
  callCount(stepId: string): number {
    return this.calls.filter((call) => call.stepId === stepId).length;
  }

  /**
   * Highest number of overlapping invocations seen
   */
  get maxConcurrency(): number {
    return this.peak;
  }

  private next(stepId: string): ScriptedResponse | undefined {
    const responses = this.script.get(stepId);
    if (!responses || responses.length === 0) {
      return undefined;
    }
    return responses.length > 1 ? responses.shift() : responses[0];
  }

  private async respond(
    request: InvokeRequest,
    response: ScriptedResponse | undefined
  ): Promise<CapabilityOutput> {
    if (response === undefined) {
      await this.pause(0);
      return {
        ...(this.dryRun ? { dryRun: true, capability: this.name } : {}),
        stepId: request.stepId,
        action: request.action,
        args: request.args,
      };
    }

    if ('hang' in response) {
      return new Promise<CapabilityOutput>((_resolve, reject) => {
        const abort = (): void => {
          const error = new Error(`Step "${request.stepId}" aborted`);
          error.name = 'AbortError';
          reject(error);
        };
        if (request.signal.aborted) {
          abort();
          return;
        }
        request.signal.addEventListener('abort', abort, { once: true });
      });
    }

    await this.pause(response.delayMs ?? 0);

    if ('error' in response) {
      throw new CapabilityError(
        response.error,
        response.message ?? `Scripted ${response.error} for step "${request.stepId}"`
      );
    }
    return response.output;
  }

  private async pause(ms: number): Promise<void> {
    if (ms > 0) {
      await this.clock.delay(ms);
      return;
    }
    await Promise.resolve();
  }
}
