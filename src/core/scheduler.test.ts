/**
 * Tests for the Scheduler
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Scheduler, WorkSignal } from './scheduler';
import { StepRunner } from './step-runner';
import { BackoffSchedule } from './backoff';
import { buildPlanGraph, PlanGraph } from './plan-graph';
import { CapabilityRegistry } from '../capabilities/capability-registry';
import { ScriptedProvider, ScriptedResponse } from '../capabilities/scripted-provider';
import { BufferLogger } from '../logging/buffer-logger';
import { MockClock } from '../types/clock';
import type { StepSpec } from '../types/plan';
import type { CapabilityProvider } from '../types/capability';
import { createPlan, createStep } from '../../tests/fixtures/plans';

function graphOf(steps: StepSpec[]): PlanGraph {
  const result = buildPlanGraph(createPlan(steps));
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return result.value;
}

describe('WorkSignal', () => {
  it('should wake every waiter once', async () => {
    const signal = new WorkSignal();
    const woken: number[] = [];
    const first = signal.wait().then(() => woken.push(1));
    const second = signal.wait().then(() => woken.push(2));

    expect(signal.waiting).toBe(2);
    signal.notifyAll();
    await Promise.all([first, second]);

    expect(woken).toEqual([1, 2]);
    expect(signal.waiting).toBe(0);
  });
});

describe('Scheduler', () => {
  let clock: MockClock;
  let logger: BufferLogger;

  beforeEach(() => {
    clock = new MockClock();
    logger = new BufferLogger();
  });

  function createScheduler(
    script: Record<string, ScriptedResponse[]> = {},
    options: { workerCount?: number; haltOnRequiredFailure?: boolean } = {}
  ): { scheduler: Scheduler; provider: ScriptedProvider } {
    const provider = new ScriptedProvider({ script, clock });
    const runner = new StepRunner({
      providers: new CapabilityRegistry([provider]),
      backoff: new BackoffSchedule({ delaysMs: [2000, 4000, 8000], maxDelayMs: 10_000, jitterRatio: 0 }),
      clock,
      logger,
      stepTimeoutMs: 1000,
      maxRetries: 3,
    });
    const scheduler = new Scheduler({
      runner,
      clock,
      logger,
      workerCount: options.workerCount ?? 4,
      haltOnRequiredFailure: options.haltOnRequiredFailure ?? false,
    });
    return { scheduler, provider };
  }

  it('should hold dependents until a timed-out step that ignores its signal has stopped', async () => {
    const log: string[] = [];
    const stubborn: CapabilityProvider = {
      name: 'scripted',
      invoke: async (request) => {
        log.push(`start ${request.stepId}`);
        if (request.stepId === 'a') {
          await new Promise((resolve) => setTimeout(resolve, 120));
        }
        log.push(`end ${request.stepId}`);
        return {};
      },
    };
    const runner = new StepRunner({
      providers: new CapabilityRegistry([stubborn]),
      backoff: new BackoffSchedule({ delaysMs: [10], maxDelayMs: 10, jitterRatio: 0 }),
      clock,
      logger,
      stepTimeoutMs: 1000,
      maxRetries: 1,
    });
    const scheduler = new Scheduler({ runner, clock, logger, workerCount: 4, haltOnRequiredFailure: false });

    const report = await scheduler.runPass(
      graphOf([createStep('a', [], { required: false, timeoutMs: 30 }), createStep('b', ['a'])])
    );

    expect(log).toEqual(['start a', 'end a', 'start a', 'end a', 'start b', 'end b']);
    expect(report.outcomes.map((o) => `${o.stepId}:${o.status}`)).toEqual(['a:Failed', 'b:Succeeded']);
  });

  it('should run dependents only after their dependencies finish', async () => {
    const { scheduler } = createScheduler();
    const events: string[] = [];

    await scheduler.run(graphOf([createStep('a'), createStep('b', ['a']), createStep('c', ['b'])]), {
      hooks: {
        onStepStarted: (step) => events.push(`start:${step.id}`),
        onStepFinished: (record) => events.push(`end:${record.spec.id}`),
      },
    });

    expect(events).toEqual(['start:a', 'end:a', 'start:b', 'end:b', 'start:c', 'end:c']);
  });

  it('should retry a transient failure and then run its dependent', async () => {
    const { scheduler } = createScheduler({
      A: [{ error: 'TRANSPORT' }, { error: 'TRANSPORT' }, { output: { value: 'A' } }],
    });

    const report = await scheduler.runPass(graphOf([createStep('A'), createStep('B', ['A'])]));

    expect(report.overallSuccess).toBe(true);
    expect(report.outcomes.map((o) => [o.stepId, o.status, o.attempts])).toEqual([
      ['A', 'Succeeded', 3],
      ['B', 'Succeeded', 1],
    ]);
    expect(report.completionOrder).toEqual(['A', 'B']);
    expect(report.durationMs).toBe(6000);
  });

  it('should produce the same outcomes with one worker or three', async () => {
    const steps = [
      createStep('a'),
      createStep('b'),
      createStep('c'),
      createStep('d', ['a', 'b']),
      createStep('e', ['c']),
    ];
    const script: Record<string, ScriptedResponse[]> = {
      c: [{ error: 'REJECTED', message: 'exit code 1' }],
    };

    const single = createScheduler(script, { workerCount: 1 });
    const triple = createScheduler(script, { workerCount: 3 });
    const singleReport = await single.scheduler.runPass(graphOf(steps));
    const tripleReport = await triple.scheduler.runPass(graphOf(steps));

    const statuses = (report: typeof singleReport): string[] =>
      report.outcomes.map((o) => `${o.stepId}:${o.status}`);
    expect(statuses(singleReport)).toEqual(['a:Succeeded', 'b:Succeeded', 'c:Failed', 'd:Succeeded', 'e:Skipped']);
    expect(statuses(tripleReport)).toEqual(statuses(singleReport));
    expect(singleReport.overallSuccess).toBe(false);
    expect(tripleReport.overallSuccess).toBe(false);
    expect(single.provider.maxConcurrency).toBe(1);
    expect(triple.provider.maxConcurrency).toBe(3);
  });

  it('should skip transitive dependents of a failed required step', async () => {
    const { scheduler, provider } = createScheduler({ a: [{ error: 'VALIDATION', message: 'bad input' }] });

    const report = await scheduler.runPass(
      graphOf([createStep('a'), createStep('b', ['a']), createStep('c', ['b'])])
    );

    expect(report.stoppedAtStep).toBe('a');
    expect(report.summary).toBe(
      [
        '✗ Step a: bad input',
        '↷ Step b: skipped (Dependency "a" failed)',
        '↷ Step c: skipped (Dependency "b" was skipped)',
      ].join('\n')
    );
    expect(provider.callCount('b')).toBe(0);
    expect(provider.callCount('c')).toBe(0);
    expect(logger.messagesOf('step_skipped')).toEqual([
      'Step b skipped: Dependency "a" failed',
      'Step c skipped: Dependency "b" was skipped',
    ]);
  });

  it('should let dependents of a failed optional step proceed', async () => {
    const { scheduler } = createScheduler({ a: [{ error: 'REJECTED' }] });

    const report = await scheduler.runPass(
      graphOf([createStep('a', [], { required: false }), createStep('b', ['a'])])
    );

    expect(report.outcomes.map((o) => o.status)).toEqual(['Failed', 'Succeeded']);
    expect(report.overallSuccess).toBe(true);
    expect(report.stoppedAtStep).toBeNull();
  });

  it('should stop dispatching after a required failure when halting', async () => {
    const { scheduler, provider } = createScheduler(
      { a: [{ error: 'REJECTED', message: 'nope' }] },
      { workerCount: 1, haltOnRequiredFailure: true }
    );

    const report = await scheduler.runPass(graphOf([createStep('a'), createStep('b'), createStep('c')]));

    expect(report.aborted).toBe(true);
    expect(report.abortReason).toBe('required_failure');
    expect(report.outcomes.map((o) => o.status)).toEqual(['Failed', 'Ready', 'Ready']);
    expect(report.summary).toBe('✗ Step a: nope\n… Step b: not run\n… Step c: not run');
    expect(provider.calls.map((call) => call.stepId)).toEqual(['a']);
  });

  it('should keep draining other branches by default', async () => {
    const { scheduler } = createScheduler({ a: [{ error: 'REJECTED' }] }, { workerCount: 1 });

    const report = await scheduler.runPass(graphOf([createStep('a'), createStep('b'), createStep('c')]));

    expect(report.aborted).toBe(false);
    expect(report.outcomes.map((o) => o.status)).toEqual(['Failed', 'Succeeded', 'Succeeded']);
  });

  it('should dispatch nothing when cancelled before starting', async () => {
    const { scheduler, provider } = createScheduler();
    const controller = new AbortController();
    controller.abort();

    const report = await scheduler.runPass(graphOf([createStep('a'), createStep('b', ['a'])]), {
      signal: controller.signal,
    });

    expect(report.aborted).toBe(true);
    expect(report.abortReason).toBe('cancelled');
    expect(report.outcomes.map((o) => o.status)).toEqual(['Ready', 'Pending']);
    expect(report.overallSuccess).toBe(false);
    expect(provider.calls).toHaveLength(0);
  });

  it('should drain the running step and leave the rest undispatched on cancellation', async () => {
    const { scheduler, provider } = createScheduler({ a: [{ hang: true }] }, { workerCount: 1 });
    const controller = new AbortController();

    const pending = scheduler.runPass(graphOf([createStep('a'), createStep('b')]), {
      signal: controller.signal,
    });
    await vi.waitFor(() => expect(provider.calls).toHaveLength(1));
    controller.abort();
    const report = await pending;

    expect(report.abortReason).toBe('cancelled');
    expect(report.outcomes[0]).toMatchObject({
      status: 'Failed',
      error: { kind: 'TIMEOUT', message: 'Step "a" aborted', attempts: 1 },
    });
    expect(report.outcomes[1].status).toBe('Ready');
    expect(provider.callCount('b')).toBe(0);
  });

  it('should report success for an empty plan', async () => {
    const { scheduler } = createScheduler();

    const report = await scheduler.runPass(graphOf([]));

    expect(report.overallSuccess).toBe(true);
    expect(report.outcomes).toEqual([]);
    expect(report.summary).toBe('');
  });

  it('should treat a worker count below one as one', () => {
    const { scheduler } = createScheduler({}, { workerCount: 0 });
    expect(scheduler.workerCount).toBe(1);
  });

  it('should log the pass totals', async () => {
    const { scheduler } = createScheduler({ b: [{ error: 'REJECTED' }] });

    await scheduler.run(graphOf([createStep('a'), createStep('b'), createStep('c', ['b'])]));

    expect(logger.messagesOf('pass_completed')).toEqual([
      'Execution pass finished: 1 succeeded, 1 failed, 1 skipped, 0 not run',
    ]);
  });
});
