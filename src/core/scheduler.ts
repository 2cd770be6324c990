/**
 * Scheduler
 *
 * Runs one execution pass over a PlanGraph with a bounded pool of async
 * workers. Ready steps wait in a FIFO queue; each terminal transition
 * decrements its dependents' outstanding-dependency counters and releases
 * those that reach zero. Idle workers sleep on a WorkSignal instead of
 * polling.
 *
 * On abort (cancellation, or a required failure when haltOnRequiredFailure is
 * set) running steps drain and nothing new is dispatched.
 */

import type { Clock } from '../types/clock';
import type { ExecutionReport, SkipReason, StepRecord } from '../types/execution';
import type { Logger } from '../types/logger';
import type { StepSpec } from '../types/plan';
import { ExecutionState } from './execution-state';
import type { PlanGraph, PlanGraphNode } from './plan-graph';
import { ResultAggregator } from './result-aggregator';
import type { StepRunner, StepRunOutcome } from './step-runner';

/**
 * Promise-based wakeup for idle workers
 */
export class WorkSignal {
  private waiters: Array<() => void> = [];

  wait(): Promise<void> {
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  notifyAll(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }

  get waiting(): number {
    return this.waiters.length;
  }
}

export interface SchedulerHooks {
  onStepStarted?(step: StepSpec): void;
  onStepFinished?(record: StepRecord): void;
}

export interface SchedulerOptions {
  runner: StepRunner;
  clock: Clock;
  logger: Logger;
  /** Worker pool size; values below 1 are raised to 1 */
  workerCount: number;
  /** Abort the pass on the first required-step failure */
  haltOnRequiredFailure: boolean;
}

export interface RunOptions {
  /** External cancellation */
  signal?: AbortSignal;
  /** Receives every terminal step in completion order */
  aggregator?: ResultAggregator;
  hooks?: SchedulerHooks;
}

export class Scheduler {
  private readonly options: SchedulerOptions;

  constructor(options: SchedulerOptions) {
    this.options = options;
  }

  get workerCount(): number {
    return Math.max(1, Math.floor(this.options.workerCount));
  }

  /**
   * Execute every reachable step of the graph and return the final state
   */
  async run(graph: PlanGraph, runOptions: RunOptions = {}): Promise<ExecutionState> {
    const { clock, logger } = this.options;
    const state = new ExecutionState(graph, clock);
    const pass = new Pass(graph, state, this.options, runOptions);
    await pass.execute(this.workerCount);
    logger.event('pass_completed', `Execution pass finished: ${describeCounts(state)}`, {
      aborted: state.aborted,
      abortReason: state.abortReason,
    });
    return state;
  }

  /**
   * Run a pass and fold it into a report
   */
  async runPass(
    graph: PlanGraph,
    runOptions: Omit<RunOptions, 'aggregator'> = {}
  ): Promise<ExecutionReport> {
    const { clock } = this.options;
    const aggregator = new ResultAggregator();
    const startedAt = clock.iso();
    const startTime = clock.timestamp();

    const state = await this.run(graph, { ...runOptions, aggregator });

    return aggregator.buildReport(graph, state, {
      startedAt,
      finishedAt: clock.iso(),
      durationMs: clock.timestamp() - startTime,
    });
  }
}

function describeCounts(state: ExecutionState): string {
  const counts = state.countByStatus();
  const notRun = counts.Pending + counts.Ready + counts.Running;
  return `${counts.Succeeded} succeeded, ${counts.Failed} failed, ${counts.Skipped} skipped, ${notRun} not run`;
}

/**
 * Bookkeeping for a single pass
 */
class Pass {
  private readonly queue: string[] = [];
  private readonly outstanding = new Map<string, number>();
  private readonly workSignal = new WorkSignal();
  private readonly controller = new AbortController();
  private running = 0;

  constructor(
    private readonly graph: PlanGraph,
    private readonly state: ExecutionState,
    private readonly options: SchedulerOptions,
    private readonly runOptions: RunOptions
  ) {
    for (const [id, node] of graph.nodes) {
      this.outstanding.set(id, node.dependencies.length);
    }
  }

  async execute(workerCount: number): Promise<void> {
    const external = this.runOptions.signal;
    const onCancel = (): void => this.abort('cancelled');
    if (external?.aborted) {
      this.abort('cancelled');
    } else {
      external?.addEventListener('abort', onCancel, { once: true });
    }

    for (const id of this.graph.planOrder) {
      if (this.state.statusOf(id) === 'Ready') {
        this.enqueue(id);
      }
    }

    try {
      const workers: Promise<void>[] = [];
      for (let i = 0; i < workerCount; i++) {
        workers.push(this.worker());
      }
      await Promise.all(workers);
    } finally {
      external?.removeEventListener('abort', onCancel);
    }
  }

  private abort(reason: 'cancelled' | 'required_failure'): void {
    if (this.state.abort(reason)) {
      this.options.logger.warn(
        reason === 'cancelled'
          ? 'Execution cancelled: draining running steps'
          : 'Required step failed: draining running steps',
        { abortReason: reason }
      );
      if (reason === 'cancelled') {
        this.controller.abort();
      }
    }
    this.workSignal.notifyAll();
  }

  private async worker(): Promise<void> {
    for (;;) {
      const next = this.state.aborted ? undefined : this.queue.shift();
      if (next !== undefined) {
        this.running += 1;
        try {
          await this.executeStep(next);
        } finally {
          this.running -= 1;
          this.workSignal.notifyAll();
        }
        continue;
      }
      if (this.running === 0) {
        this.workSignal.notifyAll();
        return;
      }
      await this.workSignal.wait();
    }
  }

  private enqueue(id: string): void {
    this.queue.push(id);
    this.options.logger.event('step_ready', `Step ${id} is ready`, { stepId: id });
    this.workSignal.notifyAll();
  }

  private async executeStep(id: string): Promise<void> {
    const { runner, logger } = this.options;
    const spec = this.require(id).spec;

    this.state.markRunning(id);
    logger.event('step_started', `Step ${id}: ${spec.description}`, {
      stepId: id,
      capability: spec.capability,
      action: spec.action,
    });
    this.runOptions.hooks?.onStepStarted?.(spec);

    let outcome: StepRunOutcome;
    try {
      outcome = await runner.run(spec, this.controller.signal, this.state);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Step runner crashed on ${id}: ${message}`, { stepId: id });
      outcome = {
        status: 'Failed',
        error: { kind: 'REJECTED', message, attempts: this.state.get(id).attempts },
      };
    }

    if (outcome.status === 'Succeeded') {
      this.state.markSucceeded(id, outcome.output);
      logger.event('step_succeeded', `Step ${id} succeeded`, {
        stepId: id,
        attempts: outcome.attempts,
      });
    } else {
      this.state.markFailed(id, outcome.error);
      logger.event('step_failed', `Step ${id} failed: ${outcome.error.message}`, {
        stepId: id,
        errorKind: outcome.error.kind,
        attempts: outcome.error.attempts,
        required: spec.required,
      });
    }
    this.finish(id);

    if (outcome.status === 'Failed' && spec.required) {
      this.skipDependents(id);
      if (this.options.haltOnRequiredFailure) {
        this.abort('required_failure');
      }
    }

    this.release(id);
  }

  /**
   * Record a terminal step with the aggregator and the hooks
   */
  private finish(id: string): void {
    const record = this.state.get(id);
    const recorded = this.runOptions.aggregator?.record(record);
    if (recorded && !recorded.ok) {
      this.options.logger.warn(recorded.error.message, { stepId: id });
    }
    this.runOptions.hooks?.onStepFinished?.(record);
  }

  /**
   * Mark every transitive dependent of a failed or skipped step as Skipped
   */
  private skipDependents(id: string): void {
    const pending = [id];
    while (pending.length > 0) {
      const current = pending.shift();
      if (current === undefined) {
        break;
      }
      const failed = this.state.statusOf(current) === 'Failed';
      for (const dependent of this.require(current).dependents) {
        if (this.state.statusOf(dependent) !== 'Pending') {
          continue;
        }
        this.skip(dependent, {
          kind: 'DEPENDENCY_FAILURE',
          dependencyId: current,
          message: failed ? `Dependency "${current}" failed` : `Dependency "${current}" was skipped`,
        });
        pending.push(dependent);
      }
    }
  }

  private skip(id: string, reason: SkipReason): void {
    this.state.markSkipped(id, reason);
    this.options.logger.event('step_skipped', `Step ${id} skipped: ${reason.message}`, {
      stepId: id,
      dependencyId: reason.dependencyId,
    });
    this.finish(id);
  }

  /**
   * Decrement dependents' counters and evaluate those with none left
   */
  private release(id: string): void {
    for (const dependent of this.require(id).dependents) {
      const remaining = (this.outstanding.get(dependent) ?? 0) - 1;
      this.outstanding.set(dependent, remaining);
      if (remaining === 0 && this.state.statusOf(dependent) === 'Pending') {
        this.evaluate(dependent);
      }
    }
  }

  private evaluate(id: string): void {
    for (const dependency of this.require(id).dependencies) {
      const record = this.state.get(dependency);
      if (record.status === 'Skipped' || (record.status === 'Failed' && record.spec.required)) {
        this.skip(id, {
          kind: 'DEPENDENCY_FAILURE',
          dependencyId: dependency,
          message:
            record.status === 'Failed'
              ? `Dependency "${dependency}" failed`
              : `Dependency "${dependency}" was skipped`,
        });
        this.skipDependents(id);
        return;
      }
    }
    this.state.markReady(id);
    this.enqueue(id);
  }

  private require(id: string): PlanGraphNode {
    const node = this.graph.nodes.get(id);
    if (!node) {
      throw new Error(`Unknown step "${id}"`);
    }
    return node;
  }
}
