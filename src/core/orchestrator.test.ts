/**
 * Tests for the Orchestrator
 * Real scheduler and step runner over scripted providers and collaborators
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Orchestrator, OrchestratorHooks } from './orchestrator';
import { Scheduler } from './scheduler';
import { StepRunner } from './step-runner';
import { BackoffSchedule } from './backoff';
import { CapabilityRegistry } from '../capabilities/capability-registry';
import { ScriptedProvider, ScriptedResponse } from '../capabilities/scripted-provider';
import { BufferLogger } from '../logging/buffer-logger';
import { MemoryFileSystem } from '../io/memory-file-system';
import { ResultStore } from '../io/result-store';
import { JsonMemoryStore } from '../memory/memory-store';
import { MockClock } from '../types/clock';
import { createDefaultConfig, EffectiveConfig, PathConfig } from '../types/effective-config';
import type { CapabilityProvider } from '../types/capability';
import type { MemoryRetriever, NewMemoryEntry } from '../types/collaborators';
import { createPlanDocument } from '../../tests/fixtures/plans';
import {
  APPROVED,
  ScriptedPlanner,
  ScriptedReviewer,
  failedReview,
  needsRefinement,
} from '../../tests/fixtures/collaborators';

const PATHS: PathConfig = {
  workingDirectory: '/project',
  projectRoot: '/project',
  artifactBaseDir: '/project/.taskweave',
};

const RECORD_PATH = '/project/.taskweave/runs/run/result.json';

const TWO_STEPS = createPlanDocument([{ step_number: 1 }, { step_number: 2, dependencies: [1] }]);

interface SetupOptions {
  plans: unknown[];
  reviews?: unknown[];
  script?: Record<string, ScriptedResponse[]>;
  config?: Partial<Omit<EffectiveConfig, 'goal' | 'paths'>>;
  paths?: Partial<PathConfig>;
  memory?: MemoryRetriever;
  providers?: CapabilityProvider[];
  hooks?: OrchestratorHooks;
}

describe('Orchestrator', () => {
  let clock: MockClock;
  let logger: BufferLogger;
  let fs: MemoryFileSystem;

  beforeEach(() => {
    clock = new MockClock();
    logger = new BufferLogger();
    fs = new MemoryFileSystem('/project');
  });

  function setup(options: SetupOptions): {
    orchestrator: Orchestrator;
    planner: ScriptedPlanner;
    reviewer: ScriptedReviewer;
    provider: ScriptedProvider;
  } {
    const provider = new ScriptedProvider({ script: options.script ?? {}, clock });
    const capabilities = new CapabilityRegistry([provider, ...(options.providers ?? [])]);
    const runner = new StepRunner({
      providers: capabilities,
      backoff: new BackoffSchedule({ delaysMs: [100], maxDelayMs: 100, jitterRatio: 0 }),
      clock,
      logger,
      stepTimeoutMs: 1000,
      maxRetries: 1,
    });
    const scheduler = new Scheduler({
      runner,
      clock,
      logger,
      workerCount: 2,
      haltOnRequiredFailure: false,
    });
    const planner = new ScriptedPlanner(options.plans);
    const reviewer = new ScriptedReviewer(options.reviews ?? [APPROVED]);
    const config = createDefaultConfig('Test goal', { ...PATHS, ...options.paths }, options.config);

    const orchestrator = new Orchestrator(
      config,
      {
        logger,
        clock,
        planner,
        reviewer,
        capabilities,
        scheduler,
        resultStore: new ResultStore(fs, PATHS.artifactBaseDir, logger),
        ...(options.memory ? { memory: options.memory } : {}),
      },
      options.hooks
    );
    return { orchestrator, planner, reviewer, provider };
  }

  function states(orchestrator: Orchestrator): string[] {
    return orchestrator.getTransitionHistory().map((t) => t.newState);
  }

  describe('approved run', () => {
    it('should plan, execute, review and succeed', async () => {
      const { orchestrator, reviewer, provider } = setup({ plans: [TWO_STEPS] });

      const result = await orchestrator.run();

      expect(result.state).toBe('DONE_SUCCESS');
      expect(result.success).toBe(true);
      expect(states(orchestrator)).toEqual(['EXECUTING', 'REVIEWING', 'DONE_SUCCESS']);
      expect(provider.calls.map((c) => c.stepId)).toEqual(['1', '2']);
      expect(reviewer.requests[0]?.strategy).toBe('Run the steps');
      expect(reviewer.requests[0]?.report.completionOrder).toEqual(['1', '2']);
    });

    it('should persist the result record', async () => {
      const { orchestrator } = setup({ plans: [TWO_STEPS] });

      const { record, recordPaths } = await orchestrator.run();

      expect(recordPaths).toEqual([RECORD_PATH]);
      expect(record).toMatchObject({
        success: true,
        goal: 'Test goal',
        final_state: 'DONE_SUCCESS',
        stop_reason: 'APPROVED',
        run_id: 'run',
        review: { status: 'approved', confidence: 0.9 },
        context: { iteration_count: 1, errors_recovered: 0 },
      });
      expect(record.error).toBeUndefined();
      expect(record.result?.overallSuccess).toBe(true);
      expect(record.context.execution_history).toHaveLength(1);
      expect(record.context.plan?.steps.map((s) => s.step_number)).toEqual(['1', '2']);

      const stored = await fs.readFile(RECORD_PATH);
      expect(stored.ok && JSON.parse(stored.value).final_state).toBe('DONE_SUCCESS');
      expect(logger.hasEventType('run_completed')).toBe(true);
    });

    it('should also write the record to the output file', async () => {
      const { orchestrator } = setup({
        plans: [TWO_STEPS],
        paths: { outputFile: '/project/out/result.json' },
      });

      const { recordPaths } = await orchestrator.run();

      expect(recordPaths).toEqual([RECORD_PATH, '/project/out/result.json']);
      expect(await fs.exists('/project/out/result.json')).toBe(true);
    });
  });

  describe('refinement and retry', () => {
    it('should stop with failure after two refinements under maxRetries 2', async () => {
      const { orchestrator, planner } = setup({
        plans: [TWO_STEPS],
        reviews: [needsRefinement(['Missing tests'], 'Tests missing')],
      });

      const { record, state } = await orchestrator.run();

      expect(state).toBe('DONE_FAILURE');
      expect(states(orchestrator)).toEqual([
        'EXECUTING',
        'REVIEWING',
        'REFINING',
        'PLANNING',
        'EXECUTING',
        'REVIEWING',
        'REFINING',
        'PLANNING',
        'EXECUTING',
        'REVIEWING',
        'DONE_FAILURE',
      ]);
      expect(planner.requests.map((r) => r.iteration)).toEqual([1, 2, 3]);
      expect(record.stop_reason).toBe('ITERATIONS_EXHAUSTED');
      expect(record.error).toBe('Reached maximum retries (2): Tests missing');
      expect(record.context.iteration_count).toBe(3);
      expect(record.context.execution_history).toHaveLength(3);
      expect(logger.messagesOf('limit_exceeded')).toEqual(['Reached maximum retries (2)']);
    });

    it('should seed the next plan with review issues and the previous plan', async () => {
      const { orchestrator, planner } = setup({
        plans: [TWO_STEPS],
        reviews: [needsRefinement(['Missing tests']), APPROVED],
      });

      await orchestrator.run();

      expect(planner.requests[0]?.feedback).toEqual([]);
      expect(planner.requests[0]?.previousPlan).toBeUndefined();
      expect(planner.requests[1]?.feedback).toEqual(['Missing tests']);
      expect(planner.requests[1]?.previousPlan?.steps).toHaveLength(2);
    });

    it('should re-execute the same plan after a failed review', async () => {
      const { orchestrator, planner, provider } = setup({
        plans: [TWO_STEPS],
        reviews: [failedReview('Flaky network'), APPROVED],
      });

      const { record, state } = await orchestrator.run();

      expect(state).toBe('DONE_SUCCESS');
      expect(states(orchestrator)).toEqual([
        'EXECUTING',
        'REVIEWING',
        'RETRYING',
        'EXECUTING',
        'REVIEWING',
        'DONE_SUCCESS',
      ]);
      expect(planner.requests).toHaveLength(1);
      expect(provider.callCount('1')).toBe(2);
      expect(record.context).toMatchObject({ iteration_count: 2, errors_recovered: 1 });
    });
  });

  describe('planning failures', () => {
    it('should replan after an invalid plan document', async () => {
      const { orchestrator, planner } = setup({
        plans: [createPlanDocument([{ step_number: 1 }], { goal: '' }), TWO_STEPS],
      });

      const { record, state } = await orchestrator.run();

      expect(state).toBe('DONE_SUCCESS');
      expect(states(orchestrator)).toEqual(['REFINING', 'PLANNING', 'EXECUTING', 'REVIEWING', 'DONE_SUCCESS']);
      expect(logger.messagesOf('plan_rejected')).toEqual(['Invalid plan document: goal: Goal cannot be empty']);
      expect(planner.requests[1]?.feedback).toEqual(['Invalid plan document: goal: Goal cannot be empty']);
      expect(record.context).toMatchObject({ iteration_count: 2, errors_recovered: 1 });
    });

    it('should fail once planning retries are exhausted', async () => {
      const { orchestrator, provider } = setup({
        plans: [createPlanDocument([{ step_number: 1, tool: 'teleport' }])],
        config: { loop: { maxRetries: 0 } },
      });

      const { record, state } = await orchestrator.run();

      expect(state).toBe('DONE_FAILURE');
      expect(record.error).toBe(
        'Plan rejected and maximum retries reached (0): Step "1" uses unknown capability "teleport"'
      );
      expect(record.stop_reason).toBe('ITERATIONS_EXHAUSTED');
      expect(record.context.plan).toBeNull();
      expect(record.result).toBeNull();
      expect(record.review).toBeNull();
      expect(provider.calls).toHaveLength(0);
    });

    it('should treat a planner error as a planning failure', async () => {
      const { orchestrator, planner } = setup({
        plans: [new Error('boom'), TWO_STEPS],
        config: { loop: { maxRetries: 1 } },
      });

      const { state } = await orchestrator.run();

      expect(state).toBe('DONE_SUCCESS');
      expect(planner.requests[1]?.feedback).toEqual(['Planner scripted failed: boom']);
    });

    it('should stop when the goal is not feasible', async () => {
      const { orchestrator, reviewer } = setup({
        plans: [createPlanDocument([], { feasible: false, overall_strategy: 'Needs network access' })],
      });

      const { record, state } = await orchestrator.run();

      expect(state).toBe('DONE_FAILURE');
      expect(record.stop_reason).toBe('GOAL_INFEASIBLE');
      expect(record.error).toBe('Goal not feasible: Needs network access');
      expect(record.context.plan?.feasible).toBe(false);
      expect(reviewer.requests).toHaveLength(0);
    });
  });

  describe('review failures', () => {
    it('should synthesize a failed review when the reviewer throws', async () => {
      const { orchestrator } = setup({
        plans: [TWO_STEPS],
        reviews: [new Error('nope')],
        config: { loop: { maxRetries: 0 } },
      });

      const { record } = await orchestrator.run();

      expect(record.review).toEqual({
        goal_achieved: false,
        status: 'failed',
        summary: 'Reviewer scripted failed: nope',
        issues: [{ issue: 'Reviewer scripted failed: nope', severity: 'high' }],
        confidence: 0,
        recommendation: '',
      });
      expect(record.error).toBe('Reached maximum retries (0): Reviewer scripted failed: nope');
    });

    it('should treat an invalid review document as failed', async () => {
      const { orchestrator } = setup({
        plans: [TWO_STEPS],
        reviews: [{ status: 'approved', confidence: 7 }],
        config: { loop: { maxRetries: 0 } },
      });

      const { record, state } = await orchestrator.run();

      expect(state).toBe('DONE_FAILURE');
      expect(record.review?.status).toBe('failed');
      expect(record.review?.summary.startsWith('Invalid review document: confidence: ')).toBe(true);
    });
  });

  describe('cancellation', () => {
    it('should abort before planning when already cancelled', async () => {
      const { orchestrator, planner } = setup({ plans: [TWO_STEPS] });
      const controller = new AbortController();
      controller.abort();

      const { record, state } = await orchestrator.run(controller.signal);

      expect(state).toBe('ABORTED');
      expect(planner.requests).toHaveLength(0);
      expect(record).toMatchObject({
        success: false,
        final_state: 'ABORTED',
        stop_reason: 'CANCELLED',
        error: 'Run cancelled',
      });
      expect(await fs.exists(RECORD_PATH)).toBe(true);
    });

    it('should keep the partial report of a cancelled pass', async () => {
      const { orchestrator, provider, reviewer } = setup({
        plans: [TWO_STEPS],
        script: { '1': [{ hang: true }] },
      });
      const controller = new AbortController();

      const pending = orchestrator.run(controller.signal);
      await vi.waitFor(() => expect(provider.calls).toHaveLength(1));
      controller.abort();
      const { record, state } = await pending;

      expect(state).toBe('ABORTED');
      expect(record.result?.aborted).toBe(true);
      expect(record.result?.abortReason).toBe('cancelled');
      expect(record.context.execution_history).toHaveLength(1);
      expect(reviewer.requests).toHaveLength(0);
      expect(logger.hasEventType('run_aborted')).toBe(true);
    });

    it('should cancel when the plan is not approved', async () => {
      const { orchestrator, provider } = setup({
        plans: [TWO_STEPS],
        hooks: { approvePlan: async () => false },
      });

      const { record, state } = await orchestrator.run();

      expect(state).toBe('ABORTED');
      expect(record.error).toBe('Plan rejected at preview');
      expect(record.context.plan).not.toBeNull();
      expect(provider.calls).toHaveLength(0);
    });
  });

  describe('hooks', () => {
    it('should report state changes and step progress', async () => {
      const changes: string[] = [];
      const started: string[] = [];
      const { orchestrator } = setup({
        plans: [TWO_STEPS],
        hooks: {
          onStateChanged: (from, to) => changes.push(`${from}->${to}`),
          onStepStarted: (step) => started.push(step.id),
        },
      });

      await orchestrator.run();

      expect(changes).toEqual(['PLANNING->EXECUTING', 'EXECUTING->REVIEWING', 'REVIEWING->DONE_SUCCESS']);
      expect(started).toEqual(['1', '2']);
    });
  });

  describe('memory', () => {
    it('should pass retrieved context to the planner and save the successful run', async () => {
      const memory = new JsonMemoryStore({
        fs,
        filePath: '/project/.taskweave/memory.json',
        clock,
        logger,
        maxDocuments: 10,
      });
      await memory.save({ content: 'Test goal needs scripted steps' });
      const { orchestrator, planner } = setup({ plans: [TWO_STEPS], memory });

      const { record } = await orchestrator.run();

      // {test, goal} against {test, goal, needs, scripted, steps}: 2 / 5
      expect(planner.requests[0]?.memoryContext).toBe(
        'Relevant context from memory:\n- Test goal needs scripted steps (similarity: 0.40)'
      );
      expect(record.context.retrieved_memories).toHaveLength(1);
      // seeded entry, two steps, run summary
      expect(await memory.size()).toBe(4);
    });

    it('should save each successful step and refresh context on every planning pass', async () => {
      const saved: NewMemoryEntry[] = [];
      const memory: MemoryRetriever = {
        search: vi.fn(async () => []),
        getContext: vi.fn(async () => `${saved.length} saved`),
        save: vi.fn(async (entry: NewMemoryEntry) => {
          saved.push(entry);
          return {
            id: String(saved.length),
            content: entry.content,
            source: entry.source ?? '',
            metadata: { ...entry.metadata },
            createdAt: clock.iso(),
          };
        }),
      };
      const { orchestrator, planner } = setup({
        plans: [TWO_STEPS, TWO_STEPS],
        reviews: [needsRefinement(['Missing tests']), APPROVED],
        memory,
      });

      await orchestrator.run();

      expect(memory.search).toHaveBeenCalledTimes(2);
      expect(planner.requests.map((request) => request.memoryContext)).toEqual(['0 saved', '2 saved']);
      expect(saved[0]).toEqual({
        content: 'Step 1: {"stepId":"1","action":"echo","args":{"value":"1"}}',
        source: 'step:run',
        metadata: { step: '1', capability: 'scripted', action: 'echo' },
      });
      expect(saved.map((entry) => entry.source)).toEqual([
        'step:run',
        'step:run',
        'step:run',
        'step:run',
        'run:run',
      ]);
    });

    it('should skip memory when disabled', async () => {
      const memory: MemoryRetriever = {
        search: vi.fn(async () => []),
        getContext: vi.fn(async () => ''),
        save: vi.fn(async () => {
          throw new Error('should not save');
        }),
      };
      const { orchestrator } = setup({
        plans: [TWO_STEPS],
        memory,
        config: { memory: { enabled: false, topK: 5, maxDocuments: 10 } },
      });

      await orchestrator.run();

      expect(memory.search).not.toHaveBeenCalled();
      expect(memory.save).not.toHaveBeenCalled();
    });

    it('should keep going when retrieval fails', async () => {
      const memory: MemoryRetriever = {
        search: vi.fn(async () => {
          throw new Error('index offline');
        }),
        getContext: vi.fn(async () => ''),
        save: vi.fn(async () => {
          throw new Error('index offline');
        }),
      };
      const { orchestrator } = setup({ plans: [TWO_STEPS], memory });

      const { state } = await orchestrator.run();

      expect(state).toBe('DONE_SUCCESS');
      expect(logger.messagesOf('warn')).toEqual([
        'Memory retrieval failed, planning without context: index offline',
        'Could not save step 1 to memory: index offline',
        'Could not save step 2 to memory: index offline',
        'Could not save run to memory: index offline',
      ]);
    });
  });

  describe('auto-commit', () => {
    function autoCommitConfig(): Partial<Omit<EffectiveConfig, 'goal' | 'paths'>> {
      return { runMode: { mockMode: false, autoCommit: true } };
    }

    it('should commit a dirty tree after success', async () => {
      const vcs = new ScriptedProvider({
        name: 'vcs',
        clock,
        script: {
          'auto-commit': [{ output: { clean: false, changes: [] } }, { output: { commit: 'abc123' } }],
        },
      });
      const { orchestrator } = setup({ plans: [TWO_STEPS], providers: [vcs], config: autoCommitConfig() });

      await orchestrator.run();

      expect(vcs.calls.map((c) => c.action)).toEqual(['status', 'commit']);
      expect(vcs.calls[1]?.args).toEqual({ message: 'taskweave: Test goal' });
      expect(logger.messagesOf('info')).toContain('Auto-commit created abc123');
    });

    it('should skip the commit on a clean tree', async () => {
      const vcs = new ScriptedProvider({
        name: 'vcs',
        clock,
        script: { 'auto-commit': [{ output: { clean: true, changes: [] } }] },
      });
      const { orchestrator } = setup({ plans: [TWO_STEPS], providers: [vcs], config: autoCommitConfig() });

      await orchestrator.run();

      expect(vcs.calls.map((c) => c.action)).toEqual(['status']);
      expect(logger.messagesOf('info')).toContain('Auto-commit skipped: working tree clean');
    });

    it('should only warn when the commit fails', async () => {
      const vcs = new ScriptedProvider({
        name: 'vcs',
        clock,
        script: {
          'auto-commit': [{ output: { clean: false } }, { error: 'REJECTED', message: 'hook failed' }],
        },
      });
      const { orchestrator } = setup({ plans: [TWO_STEPS], providers: [vcs], config: autoCommitConfig() });

      const { state } = await orchestrator.run();

      expect(state).toBe('DONE_SUCCESS');
      expect(logger.messagesOf('warn')).toEqual(['Auto-commit failed: hook failed']);
    });

    it('should not commit after a failed run', async () => {
      const vcs = new ScriptedProvider({ name: 'vcs', clock });
      const { orchestrator } = setup({
        plans: [TWO_STEPS],
        reviews: [failedReview('broken')],
        providers: [vcs],
        config: { ...autoCommitConfig(), loop: { maxRetries: 0 } },
      });

      await orchestrator.run();

      expect(vcs.calls).toHaveLength(0);
    });
  });
});
