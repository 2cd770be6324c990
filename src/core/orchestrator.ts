/**
 * Orchestrator
 *
 * Drives the plan → execute → review → refine loop for one goal on top of the
 * state machine. Every external interaction (planner, reviewer, capability
 * providers, memory, persistence, time) is injected.
 *
 * Memory is searched on every planning entry and each successful step is
 * saved as it finishes. Every terminal state persists a result record; a
 * successful run also saves a summary entry and, with autoCommit, commits
 * through the vcs capability.
 */

import type { EffectiveConfig } from '../types/effective-config';
import type { Clock } from '../types/clock';
import type { Logger } from '../types/logger';
import type { CapabilityOutput } from '../types/capability';
import type { ExecutionReport, StepRecord } from '../types/execution';
import type { PlanInvalid } from '../types/errors';
import { createPlanInvalid } from '../types/errors';
import type { Plan } from '../types/plan';
import type { ReviewDecision } from '../types/review';
import type { MemoryMatch, MemoryRetriever, Planner, Reviewer } from '../types/collaborators';
import type { ResultRecord, ResultStore } from '../io/result-store';
import type { ReviewDocument } from '../schemas/review-document.schema';
import { validatePlanDocument, validateReviewDocument } from '../schemas/validators';
import {
  decisionToDocument,
  documentToDecision,
  documentToPlan,
  planToDocument,
} from '../schemas/document-conversion';
import type { LoopContext, LoopEvent, LoopState, TransitionResult } from './state-machine';
import { createInitialContext, isTerminalState, transition } from './state-machine';
import { checkPlanningRetry, decideNextStep, getIterationProgress } from './iteration-policy';
import type { CapabilityLookup, PlanGraph } from './plan-graph';
import { buildPlanGraph } from './plan-graph';
import type { Scheduler, SchedulerHooks } from './scheduler';
import type { ProviderResolver } from './step-runner';

/**
 * Dependencies required by the Orchestrator
 */
export interface OrchestratorDependencies {
  logger: Logger;
  clock: Clock;
  planner: Planner;
  reviewer: Reviewer;
  /** Validates step capabilities and serves the vcs provider for auto-commit */
  capabilities: CapabilityLookup & ProviderResolver;
  scheduler: Scheduler;
  resultStore: ResultStore;
  /** Memory is skipped when absent or disabled in config */
  memory?: MemoryRetriever;
}

export interface OrchestratorHooks extends SchedulerHooks {
  onStateChanged?(from: LoopState, to: LoopState, description: string): void;
  /**
   * Called with each accepted plan before it runs; false cancels the run
   */
  approvePlan?(plan: Plan): Promise<boolean>;
}

export interface OrchestrationResult {
  state: LoopState;
  success: boolean;
  record: ResultRecord;
  /** Files the record was written to; empty when persistence failed */
  recordPaths: string[];
}

const AUTO_COMMIT_STEP = 'auto-commit';

export class Orchestrator {
  private context: LoopContext;
  private readonly transitions: TransitionResult[] = [];
  private readonly config: EffectiveConfig;
  private readonly deps: OrchestratorDependencies;
  private readonly hooks: OrchestratorHooks;

  private plan: Plan | null = null;
  private graph: PlanGraph | null = null;
  private readonly history: ExecutionReport[] = [];
  private memories: MemoryMatch[] = [];
  private memoryContext = '';
  private feedback: string[] = [];
  private review: ReviewDocument | null = null;
  private failure: string | undefined;
  private loggedIteration = 0;

  constructor(config: EffectiveConfig, deps: OrchestratorDependencies, hooks: OrchestratorHooks = {}) {
    this.config = config;
    this.deps = deps;
    this.hooks = hooks;
    this.context = createInitialContext(deps.clock.iso());
  }

  getCurrentState(): LoopState {
    return this.context.currentState;
  }

  getContext(): LoopContext {
    return { ...this.context };
  }

  getTransitionHistory(): readonly TransitionResult[] {
    return this.transitions;
  }

  /**
   * Run the loop to a terminal state. Aborting `signal` cancels the run; the
   * current pass drains and its partial report is kept.
   */
  async run(signal: AbortSignal = new AbortController().signal): Promise<OrchestrationResult> {
    const { logger } = this.deps;
    logger.event('run_started', `Starting run for goal: ${this.config.goal}`, {
      runId: this.config.runId,
    });

    try {
      while (!isTerminalState(this.context.currentState)) {
        if (signal.aborted) {
          this.apply({ type: 'CANCEL' });
          break;
        }
        this.logIteration();
        await this.step(signal);
      }
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      logger.error(`Unexpected error: ${cause.message}`, { state: this.context.currentState });
      if (!isTerminalState(this.context.currentState)) {
        this.apply({ type: 'ERROR', error: cause });
      }
    }

    return this.finish(signal);
  }

  private async step(signal: AbortSignal): Promise<void> {
    switch (this.context.currentState) {
      case 'PLANNING':
        return this.planStep(signal);
      case 'EXECUTING':
        return this.executeStep(signal);
      case 'REVIEWING':
        return this.reviewStep(signal);
      case 'REFINING':
        this.apply({ type: 'REPLAN' });
        return;
      case 'RETRYING':
        this.apply({ type: 'REEXECUTE' });
        return;
      case 'DONE_SUCCESS':
      case 'DONE_FAILURE':
      case 'ABORTED':
        return;
    }
  }

  private async retrieveMemories(): Promise<void> {
    const { memory, logger } = this.deps;
    if (!memory || !this.config.memory.enabled) {
      return;
    }
    const { goal, memory: settings } = this.config;
    try {
      this.memories = await memory.search(goal, settings.topK);
      this.memoryContext = await memory.getContext(goal, settings.topK);
      logger.event('memory_retrieved', `Retrieved ${this.memories.length} memory match(es)`, {
        count: this.memories.length,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Memory retrieval failed, planning without context: ${message}`);
    }
  }

  private async planStep(signal: AbortSignal): Promise<void> {
    const { planner, capabilities, logger } = this.deps;
    await this.retrieveMemories();

    let document: unknown;
    try {
      document = await planner.plan({
        goal: this.config.goal,
        iteration: this.context.iterationCount,
        feedback: [...this.feedback],
        memoryContext: this.memoryContext,
        ...(this.plan ? { previousPlan: this.plan } : {}),
        signal,
      });
    } catch (error) {
      if (signal.aborted) {
        return;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.planningFailed(
        createPlanInvalid([{ code: 'PLANNER_ERROR', message: `Planner ${planner.name} failed: ${message}` }])
      );
      return;
    }
    if (signal.aborted) {
      return;
    }

    const validation = validatePlanDocument(document);
    if (!validation.success || !validation.data) {
      this.planningFailed(
        createPlanInvalid(
          (validation.errors ?? ['Plan document is invalid']).map((message) => ({
            code: 'INVALID_DOCUMENT' as const,
            message: `Invalid plan document: ${message}`,
          }))
        )
      );
      return;
    }

    const plan = documentToPlan(validation.data);
    if (!plan.feasible) {
      this.plan = plan;
      this.apply({ type: 'GOAL_INFEASIBLE', strategy: plan.strategy });
      return;
    }

    const built = buildPlanGraph(plan, capabilities);
    if (!built.ok) {
      this.planningFailed(built.error);
      return;
    }

    logger.event('plan_received', `Plan received with ${plan.steps.length} step(s)`, {
      steps: plan.steps.length,
      strategy: plan.strategy,
    });
    this.plan = plan;
    this.graph = built.value;

    if (this.hooks.approvePlan && !(await this.hooks.approvePlan(plan))) {
      this.failure = 'Plan rejected at preview';
      this.apply({ type: 'CANCEL' });
      return;
    }
    this.apply({ type: 'PLAN_ACCEPTED', stepCount: plan.steps.length });
  }

  private planningFailed(invalid: PlanInvalid): void {
    const { logger } = this.deps;
    logger.event('plan_rejected', invalid.message, {
      issues: invalid.issues.map((issue) => issue.message),
    });
    this.feedback = invalid.issues.map((issue) => issue.message);

    const check = checkPlanningRetry(this.config.loop, this.context.iterationCount - 1);
    if (check.shouldStop) {
      logger.event('limit_exceeded', check.message, { nextSteps: check.nextSteps });
      this.failure = `${check.message}: ${invalid.message}`;
      this.apply({ type: 'ITERATIONS_EXHAUSTED', maxRetries: this.config.loop.maxRetries });
      return;
    }
    logger.info(check.message);
    this.apply({ type: 'PLAN_INVALID', message: invalid.message });
  }

  private async executeStep(signal: AbortSignal): Promise<void> {
    if (!this.graph) {
      throw new Error('No plan graph to execute');
    }
    const { onStepStarted, onStepFinished } = this.hooks;
    let saving = Promise.resolve();
    const report = await this.deps.scheduler.runPass(this.graph, {
      signal,
      hooks: {
        ...(onStepStarted ? { onStepStarted } : {}),
        onStepFinished: (record) => {
          onStepFinished?.(record);
          if (record.status === 'Succeeded') {
            saving = saving.then(() => this.saveStep(record));
          }
        },
      },
    });
    await saving;
    this.history.push(report);

    if (report.aborted && report.abortReason === 'cancelled') {
      this.apply({ type: 'CANCEL' });
      return;
    }
    this.apply({ type: 'PASS_COMPLETE', overallSuccess: report.overallSuccess });
  }

  private async reviewStep(signal: AbortSignal): Promise<void> {
    const { reviewer, logger } = this.deps;
    const report = this.history[this.history.length - 1];
    if (!report || !this.plan) {
      throw new Error('No execution report to review');
    }

    let document: ReviewDocument;
    try {
      const raw = await reviewer.review({
        goal: this.config.goal,
        strategy: this.plan.strategy,
        report,
        signal,
      });
      const validation = validateReviewDocument(raw);
      document =
        validation.success && validation.data
          ? validation.data
          : failedReview(`Invalid review document: ${(validation.errors ?? []).join('; ')}`);
    } catch (error) {
      if (signal.aborted) {
        return;
      }
      const message = error instanceof Error ? error.message : String(error);
      document = failedReview(`Reviewer ${reviewer.name} failed: ${message}`);
    }

    const decision = documentToDecision(document);
    this.review = decisionToDocument(decision);
    logger.event(
      'review_received',
      `Review: ${decision.verdict} (${Math.round(decision.confidence * 100)}% confidence)`,
      { verdict: decision.verdict, issues: decision.issues.length }
    );

    this.decide(decision);
  }

  private decide(decision: ReviewDecision): void {
    const { logger } = this.deps;
    const { next, stop } = decideNextStep(this.config.loop, decision, this.context.iterationCount - 1);

    switch (next) {
      case 'DONE_SUCCESS':
        logger.event('stop_condition_met', stop.message);
        this.apply({ type: 'REVIEW_APPROVED', confidence: decision.confidence });
        return;
      case 'REFINING':
        logger.info(stop.message);
        this.feedback = reviewFeedback(decision);
        this.apply({ type: 'REVIEW_NEEDS_REFINEMENT', issueCount: decision.issues.length });
        return;
      case 'RETRYING':
        logger.info(stop.message);
        this.apply({ type: 'REVIEW_FAILED', summary: decision.summary || 'Review failed' });
        return;
      case 'DONE_FAILURE':
        logger.event('limit_exceeded', stop.message, { nextSteps: stop.nextSteps });
        this.failure = decision.summary ? `${stop.message}: ${decision.summary}` : stop.message;
        this.apply({ type: 'ITERATIONS_EXHAUSTED', maxRetries: this.config.loop.maxRetries });
        return;
    }
  }

  private apply(event: LoopEvent): void {
    const from = this.context.currentState;
    const result = transition(this.context, event, this.deps.clock.iso());
    if (!result.valid) {
      throw new Error(result.description);
    }
    this.context = result.context;
    this.transitions.push(result);
    this.deps.logger.event('state_changed', result.description, {
      state: result.newState,
      from,
      iteration: this.context.iterationCount,
    });
    this.hooks.onStateChanged?.(from, result.newState, result.description);
  }

  private logIteration(): void {
    const { iterationCount } = this.context;
    if (iterationCount === this.loggedIteration) {
      return;
    }
    this.loggedIteration = iterationCount;
    const progress = getIterationProgress(this.config.loop, iterationCount);
    this.deps.logger.event('iteration_started', `Iteration ${progress.display}`, {
      iteration: iterationCount,
    });
  }

  private async finish(signal: AbortSignal): Promise<OrchestrationResult> {
    const { logger, resultStore } = this.deps;
    const state = this.context.currentState;
    const success = state === 'DONE_SUCCESS';

    if (success) {
      await this.saveMemory();
      if (this.config.runMode.autoCommit) {
        await this.autoCommit(signal);
      }
    }

    const record = this.buildRecord(success);
    const written = await resultStore.write(record, this.config.paths.outputFile);

    if (state === 'ABORTED') {
      logger.event('run_aborted', record.error ?? 'Run cancelled');
    } else if (success) {
      logger.event('run_completed', 'Goal achieved', { iterations: this.context.iterationCount });
    } else {
      logger.event('run_failed', record.error ?? 'Goal not achieved', {
        stopReason: this.context.stopReason,
      });
    }

    return { state, success, record, recordPaths: written.ok ? written.value : [] };
  }

  private buildRecord(success: boolean): ResultRecord {
    const { context } = this;
    const error = success ? undefined : (this.failure ?? context.lastError ?? 'Run cancelled');
    return {
      success,
      goal: this.config.goal,
      result: this.history[this.history.length - 1] ?? null,
      review: this.review,
      context: {
        plan: this.plan ? planToDocument(this.plan) : null,
        execution_history: [...this.history],
        retrieved_memories: [...this.memories],
        iteration_count: context.iterationCount,
        errors_recovered: context.errorsRecovered,
      },
      ...(error !== undefined ? { error } : {}),
      final_state: context.currentState,
      ...(context.stopReason ? { stop_reason: context.stopReason } : {}),
      run_id: this.config.runId,
      started_at: context.startedAt,
      finished_at: this.deps.clock.iso(),
    };
  }

  /**
   * Remember one successful step so later plans can draw on it
   */
  private async saveStep(record: StepRecord): Promise<void> {
    const { memory, logger } = this.deps;
    if (!memory || !this.config.memory.enabled) {
      return;
    }
    const { spec } = record;
    try {
      await memory.save({
        content: `Step ${spec.id}: ${JSON.stringify(record.output ?? {})}`,
        source: `step:${this.config.runId}`,
        metadata: { step: spec.id, capability: spec.capability, action: spec.action },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Could not save step ${spec.id} to memory: ${message}`);
    }
  }

  private async saveMemory(): Promise<void> {
    const { memory, logger } = this.deps;
    if (!memory || !this.config.memory.enabled) {
      return;
    }
    const report = this.history[this.history.length - 1];
    try {
      await memory.save({
        content: [
          `Goal: ${this.config.goal}`,
          `Strategy: ${this.plan?.strategy ?? ''}`,
          `Result: ${report?.summary ?? ''}`,
        ].join('\n'),
        source: `run:${this.config.runId}`,
        metadata: { status: 'success', iterations: String(this.context.iterationCount) },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Could not save run to memory: ${message}`);
    }
  }

  /**
   * Commit working tree changes; failures are warnings only
   */
  private async autoCommit(signal: AbortSignal): Promise<void> {
    const { capabilities, logger } = this.deps;
    const vcs = capabilities.get('vcs');
    if (!vcs) {
      logger.warn('Auto-commit skipped: no vcs capability registered');
      return;
    }

    const invoke = (action: string, args: Record<string, unknown>): Promise<CapabilityOutput> =>
      vcs.invoke({
        stepId: AUTO_COMMIT_STEP,
        action,
        args,
        timeoutMs: this.config.execution.stepTimeoutMs,
        signal,
      });

    try {
      const status = await invoke('status', {});
      if (status.clean === true) {
        logger.info('Auto-commit skipped: working tree clean');
        return;
      }
      const commit = await invoke('commit', { message: commitMessage(this.config.goal) });
      logger.info(`Auto-commit created ${String(commit.commit ?? '')}`.trim());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Auto-commit failed: ${message}`);
    }
  }
}

function failedReview(summary: string): ReviewDocument {
  return {
    goal_achieved: false,
    status: 'failed',
    summary,
    issues: [{ issue: summary, severity: 'high' }],
    confidence: 0,
    recommendation: '',
  };
}

/**
 * Issues become planner feedback; a review without issues contributes its summary
 */
function reviewFeedback(decision: ReviewDecision): string[] {
  const issues = decision.issues.map((issue) =>
    issue.suggestion ? `${issue.issue} (suggestion: ${issue.suggestion})` : issue.issue
  );
  if (issues.length === 0 && decision.summary) {
    return [decision.summary];
  }
  return issues;
}

function commitMessage(goal: string): string {
  const firstLine = goal.split('\n')[0]?.trim() ?? '';
  const subject = firstLine.length > 60 ? `${firstLine.slice(0, 57)}...` : firstLine;
  return `taskweave: ${subject}`;
}

export function createOrchestrator(
  config: EffectiveConfig,
  deps: OrchestratorDependencies,
  hooks?: OrchestratorHooks
): Orchestrator {
  return new Orchestrator(config, deps, hooks);
}
