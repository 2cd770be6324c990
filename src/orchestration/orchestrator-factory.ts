/**
 * Orchestrator Factory
 * Builds an Orchestrator and its dependencies from an EffectiveConfig
 */

import { resolve } from 'path';
import {
  Orchestrator,
  OrchestratorDependencies,
  OrchestratorHooks,
  createOrchestrator,
} from '../core/orchestrator';
import { BackoffSchedule } from '../core/backoff';
import { Scheduler } from '../core/scheduler';
import { StepRunner } from '../core/step-runner';
import type { EffectiveConfig } from '../types/effective-config';
import { Clock, SystemClock } from '../types/clock';
import type { FileSystem } from '../types/file-system';
import type { Logger } from '../types/logger';
import type { ProcessRunner } from '../types/process-runner';
import type { MemoryRetriever, Planner, Reviewer } from '../types/collaborators';
import { Result, ok, err } from '../types/result';
import { createConsoleLogger } from '../logging/console-logger';
import { createRealFileSystem } from '../io/real-file-system';
import { createRealProcessRunner } from '../io/real-process-runner';
import { ResultStore } from '../io/result-store';
import { JsonMemoryStore } from '../memory/memory-store';
import { CapabilityRegistry } from '../capabilities/capability-registry';
import { createCapabilityRegistry } from '../capabilities/create-registry';
import type { FetchFunction } from '../capabilities/web-provider';
import { FilePlanner } from '../collaborators/file-planner';
import { CommandPlanner, CommandReviewer } from '../collaborators/command-collaborator';
import { RuleBasedReviewer } from '../collaborators/rule-based-reviewer';

export const MEMORY_FILE_NAME = 'memory.json';

export const NO_PLANNER_MESSAGE = 'No planner configured: pass --plan <file> or --planner-command <cmd>';

/**
 * Runtime services; anything omitted gets the real implementation
 */
export interface RuntimeServices {
  logger?: Logger;
  fs?: FileSystem;
  runner?: ProcessRunner;
  clock?: Clock;
  fetch?: FetchFunction;
  /** Source of backoff jitter */
  random?: () => number;
}

/**
 * Dependencies plus the pieces callers may want to inspect
 */
export interface RuntimeDependencies extends OrchestratorDependencies {
  capabilities: CapabilityRegistry;
  fs: FileSystem;
  runner: ProcessRunner;
}

/**
 * Console logger matching the verbosity settings
 */
export function createLoggerForConfig(config: EffectiveConfig): Logger {
  const { verbose, debug, jsonOutput } = config.verbosity;
  return createConsoleLogger({
    minLevel: debug ? 'debug' : verbose ? 'info' : 'warn',
    jsonOutput,
  });
}

/**
 * Plan file wins over a planner command; one of them is required
 */
export function createPlanner(
  config: EffectiveConfig,
  fs: FileSystem,
  runner: ProcessRunner,
  logger: Logger
): Result<Planner, string> {
  const { planFile, plannerCommand } = config.collaborators;
  if (planFile) {
    return ok(new FilePlanner(fs, resolve(config.paths.workingDirectory, planFile)));
  }
  if (plannerCommand) {
    return ok(
      new CommandPlanner({
        runner,
        command: plannerCommand,
        cwd: config.paths.workingDirectory,
        logger: logger.child({ phase: 'planning' }),
        timeoutMs: config.execution.stepTimeoutMs,
      })
    );
  }
  return err(NO_PLANNER_MESSAGE);
}

/**
 * Reviewer command when configured, otherwise the rule-based reviewer
 */
export function createReviewer(config: EffectiveConfig, runner: ProcessRunner, logger: Logger): Reviewer {
  const { reviewerCommand } = config.collaborators;
  if (!reviewerCommand) {
    return new RuleBasedReviewer();
  }
  return new CommandReviewer({
    runner,
    command: reviewerCommand,
    cwd: config.paths.workingDirectory,
    logger: logger.child({ phase: 'review' }),
    timeoutMs: config.execution.stepTimeoutMs,
  });
}

/**
 * Wire every dependency the Orchestrator needs
 */
export function createRuntimeDependencies(
  config: EffectiveConfig,
  services: RuntimeServices = {}
): Result<RuntimeDependencies, string> {
  const logger = services.logger ?? createLoggerForConfig(config);
  const fs = services.fs ?? createRealFileSystem(config.paths.workingDirectory);
  const runner = services.runner ?? createRealProcessRunner();
  const clock = services.clock ?? new SystemClock();

  const planner = createPlanner(config, fs, runner, logger);
  if (!planner.ok) {
    return err(planner.error);
  }

  const memory: MemoryRetriever | undefined = config.memory.enabled
    ? new JsonMemoryStore({
        fs,
        filePath: fs.join(config.paths.artifactBaseDir, MEMORY_FILE_NAME),
        clock,
        logger: logger.child({ phase: 'memory' }),
        maxDocuments: config.memory.maxDocuments,
      })
    : undefined;

  const capabilities = createCapabilityRegistry({
    config,
    fs,
    runner,
    clock,
    ...(memory ? { memory } : {}),
    ...(services.fetch ? { fetch: services.fetch } : {}),
  });

  const executionLogger = logger.child({ phase: 'execution' });
  const stepRunner = new StepRunner({
    providers: capabilities,
    backoff: new BackoffSchedule(config.backoff, services.random),
    clock,
    logger: executionLogger,
    stepTimeoutMs: config.execution.stepTimeoutMs,
    maxRetries: config.execution.stepMaxRetries,
  });
  const scheduler = new Scheduler({
    runner: stepRunner,
    clock,
    logger: executionLogger,
    workerCount: config.execution.maxWorkers,
    haltOnRequiredFailure: config.execution.haltOnRequiredFailure,
  });

  return ok({
    logger,
    clock,
    planner: planner.value,
    reviewer: createReviewer(config, runner, logger),
    capabilities,
    scheduler,
    resultStore: new ResultStore(fs, config.paths.artifactBaseDir, logger),
    ...(memory ? { memory } : {}),
    fs,
    runner,
  });
}

/**
 * Create an Orchestrator with real dependencies for production use
 */
export function createProductionOrchestrator(
  config: EffectiveConfig,
  services: RuntimeServices = {},
  hooks: OrchestratorHooks = {}
): Result<{ orchestrator: Orchestrator; deps: RuntimeDependencies }, string> {
  const deps = createRuntimeDependencies(config, services);
  if (!deps.ok) {
    return err(deps.error);
  }
  return ok({ orchestrator: createOrchestrator(config, deps.value, hooks), deps: deps.value });
}
