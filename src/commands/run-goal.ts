/**
 * Run command
 *
 * Parses arguments, resolves configuration, runs the orchestration loop for
 * one goal and maps the outcome to a process exit code.
 */

import { parseArgs, toCliFlags } from '../cli/arg-parser';
import { VERSION, getUsageText } from '../cli/help';
import type { ParsedArgs } from '../cli/types';
import { resolveConfig, ResolveConfigOptions } from '../config/resolve-config';
import {
  formatEffectiveConfigForDisplay,
  writeEffectiveConfigArtifact,
} from '../config/write-effective-config';
import type { OrchestrationResult } from '../core/orchestrator';
import { formatRunSummaryMarkdown } from '../logging/run-summary';
import {
  NO_PLANNER_MESSAGE,
  RuntimeServices,
  createProductionOrchestrator,
} from '../orchestration/orchestrator-factory';
import { ExitCode } from '../types/exit-codes';
import type { Plan } from '../types/plan';
import type { Prompter } from '../types/prompter';
import { createInquirerPrompter } from '../ui/inquirer-prompter';
import { createPlanApproval } from '../ui/plan-preview';
import { RunProgress, SpinnerFactory } from '../ui/run-progress';
import { createSpinnerService } from '../ui/spinner-service';

export interface RunGoalOptions {
  services?: RuntimeServices;
  resolveOptions?: ResolveConfigOptions;
  prompter?: Prompter;
  spinners?: SpinnerFactory;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  /**
   * Install the cancellation handler; returns a function that removes it.
   * Defaults to SIGINT.
   */
  onInterrupt?: (handler: () => void) => () => void;
}

function listenForSigint(handler: () => void): () => void {
  process.once('SIGINT', handler);
  return () => {
    process.removeListener('SIGINT', handler);
  };
}

/**
 * Ask for the goal when none was given on the command line
 */
async function promptForGoal(prompter: Prompter): Promise<string | null> {
  if (!prompter.isInteractive()) {
    return null;
  }
  const answer = await prompter.input({
    message: 'What should be done?',
    validate: (input) => (input.trim() ? true : 'Please describe the goal'),
  });
  return answer.ok && answer.value.trim() ? answer.value.trim() : null;
}

/**
 * Exit code for a finished run
 */
export function exitCodeForResult(result: OrchestrationResult): ExitCode {
  if (result.success) {
    return ExitCode.SUCCESS;
  }
  if (result.state === 'ABORTED') {
    return ExitCode.CANCELLED;
  }
  if (result.record.stop_reason === 'ITERATIONS_EXHAUSTED') {
    return ExitCode.LIMIT_EXCEEDED;
  }
  return ExitCode.GOAL_FAILED;
}

/**
 * Run one goal from command line arguments (process.argv layout)
 */
export async function runGoal(argv: string[], options: RunGoalOptions = {}): Promise<ExitCode> {
  const stdout = options.stdout ?? ((text: string) => console.log(text));
  const stderr = options.stderr ?? ((text: string) => console.error(text));

  const parsed = parseArgs(argv);
  if (!parsed.success || !parsed.args) {
    stderr(parsed.error ?? 'Error: Invalid arguments');
    stderr(getUsageText());
    return ExitCode.USAGE_ERROR;
  }

  let args: ParsedArgs = parsed.args;
  if (args.help) {
    stdout(getUsageText());
    return ExitCode.SUCCESS;
  }
  if (args.version) {
    stdout(VERSION);
    return ExitCode.SUCCESS;
  }

  const prompter = options.prompter ?? createInquirerPrompter({ interactive: !args.noInteractive });
  if (!args.goal) {
    const goal = await promptForGoal(prompter);
    if (!goal) {
      stderr('Error: A goal is required');
      stderr(getUsageText());
      return ExitCode.USAGE_ERROR;
    }
    args = { ...args, goal };
  }

  const { config, warnings } = resolveConfig(toCliFlags(args), options.resolveOptions);
  for (const warning of warnings) {
    stderr(`Warning: ${warning}`);
  }

  const progress = new RunProgress(
    options.spinners ?? createSpinnerService({ quiet: config.verbosity.jsonOutput })
  );
  const approval = config.interactivity.previewPlan
    ? createPlanApproval(prompter, stderr)
    : undefined;

  const created = createProductionOrchestrator(config, options.services, {
    ...progress.hooks(),
    ...(approval
      ? {
          approvePlan: (plan: Plan) => {
            progress.stop();
            return approval(plan);
          },
        }
      : {}),
  });
  if (!created.ok) {
    stderr(`Error: ${created.error}`);
    if (created.error === NO_PLANNER_MESSAGE) {
      stderr(getUsageText());
      return ExitCode.USAGE_ERROR;
    }
    return ExitCode.UNEXPECTED_ERROR;
  }

  const { orchestrator, deps } = created.value;
  if (config.verbosity.verbose) {
    stderr(formatEffectiveConfigForDisplay(config));
  }
  const written = await writeEffectiveConfigArtifact(config, deps.fs);
  if (!written.ok) {
    deps.logger.warn(`Could not write effective config: ${written.error.message}`);
  }

  const controller = new AbortController();
  const removeInterrupt = (options.onInterrupt ?? listenForSigint)(() => {
    deps.logger.warn('Interrupted; finishing the current steps');
    controller.abort();
  });

  try {
    progress.begin();
    const result = await orchestrator.run(controller.signal);
    progress.stop();

    if (config.verbosity.jsonOutput) {
      stdout(JSON.stringify(result.record, null, 2));
    } else {
      stdout(formatRunSummaryMarkdown(result.record));
      for (const path of result.recordPaths) {
        stdout(`Result record: ${path}`);
      }
    }
    return exitCodeForResult(result);
  } catch (error) {
    progress.stop();
    const message = error instanceof Error ? error.message : String(error);
    stderr(`Error: ${message}`);
    return ExitCode.UNEXPECTED_ERROR;
  } finally {
    removeInterrupt();
  }
}
