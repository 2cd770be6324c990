#!/usr/bin/env node

import { runGoal } from './commands/run-goal';
import { ExitCode } from './types/exit-codes';

// Run command
export type { RunGoalOptions } from './commands/run-goal';
export { runGoal, exitCodeForResult } from './commands/run-goal';

// Orchestration loop and its building blocks
export type {
  PlanGraph,
  OrchestratorDependencies,
  OrchestratorHooks,
  OrchestrationResult,
  LoopState,
} from './core';
export {
  buildPlanGraph,
  Scheduler,
  StepRunner,
  ResultAggregator,
  Orchestrator,
  createOrchestrator,
} from './core';

// Wiring from configuration
export type { RuntimeServices, RuntimeDependencies } from './orchestration';
export { createProductionOrchestrator, createRuntimeDependencies } from './orchestration';
export { resolveConfig } from './config';
export { parseArgs, toCliFlags, getUsageText } from './cli';

// IO, persistence and documents
export type { ResultRecord } from './io';
export { createRealFileSystem, createMemoryFileSystem, createRealProcessRunner, ResultStore } from './io';
export type { PlanDocument, ReviewDocument } from './schemas';
export { validatePlanDocument, validateReviewDocument } from './schemas';

// Logging and terminal UI
export { createConsoleLogger, createBufferLogger, formatRunSummaryMarkdown } from './logging';
export { createSpinnerService, RunProgress, createInquirerPrompter, formatPlanPreview } from './ui';

// Capability providers and collaborators
export { CapabilityRegistry, createCapabilityRegistry } from './capabilities';
export { FilePlanner, CommandPlanner, CommandReviewer, RuleBasedReviewer } from './collaborators';
export { JsonMemoryStore } from './memory';

// Shared types
export type {
  Plan,
  StepSpec,
  CapabilityProvider,
  ExecutionReport,
  ReviewDecision,
  Planner,
  Reviewer,
  EffectiveConfig,
} from './types';
export { ExitCode } from './types';

// Main CLI entry point
async function main(): Promise<void> {
  process.exitCode = await runGoal(process.argv);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    process.exitCode = ExitCode.UNEXPECTED_ERROR;
  });
}
