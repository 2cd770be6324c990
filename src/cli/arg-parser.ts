/**
 * CLI Argument Parser
 *
 * Parses command line arguments into structured ParsedArgs
 */

import { ParsedArgs, ParseResult, DEFAULT_ARGS } from './types';
import type { CliFlags } from '../config/resolve-config';
import { Result, ok, err } from '../types/result';

/**
 * Parse an integer of at least `min` from a string
 */
function parseInteger(value: string, name: string, min: number): Result<number, string> {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    return err(`${name} must be a ${min > 0 ? 'positive' : 'non-negative'} integer`);
  }
  return ok(parsed);
}

/**
 * Get the value for an argument, handling both --arg value and --arg=value formats
 */
function getArgValue(
  args: string[],
  index: number,
  argName: string
): Result<{ value: string; skip: number }, string> {
  const arg = args[index];

  // Check for --arg=value format
  const equals = arg.indexOf('=');
  if (equals !== -1) {
    const value = arg.slice(equals + 1);
    if (!value) {
      return err(`${argName}= requires a value`);
    }
    return ok({ value, skip: 0 });
  }

  // Check for --arg value format
  const nextArg = args[index + 1];
  if (nextArg === undefined || nextArg.startsWith('--')) {
    return err(`${argName} requires a value`);
  }
  return ok({ value: nextArg, skip: 1 });
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParseResult {
  const args = argv.slice(2); // Remove node and script path
  const result: ParsedArgs = { ...DEFAULT_ARGS };
  const fail = (error: string): ParseResult => ({ success: false, error: `Error: ${error}` });

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const argBase = arg.split('=')[0]; // Get the base argument name

    switch (argBase) {
      case '--help':
      case '-h': {
        result.help = true;
        break;
      }

      case '--version':
      case '-v': {
        result.version = true;
        break;
      }

      case '--plan':
      case '--planner-command':
      case '--reviewer-command':
      case '--output':
      case '--project-root': {
        const option = getArgValue(args, i, argBase);
        if (!option.ok) return fail(option.error);
        if (argBase === '--plan') result.planFile = option.value.value;
        if (argBase === '--planner-command') result.plannerCommand = option.value.value;
        if (argBase === '--reviewer-command') result.reviewerCommand = option.value.value;
        if (argBase === '--output') result.outputFile = option.value.value;
        if (argBase === '--project-root') result.projectRoot = option.value.value;
        i += option.value.skip;
        break;
      }

      case '--max-retries':
      case '--step-retries': {
        const option = getArgValue(args, i, argBase);
        if (!option.ok) return fail(option.error);
        const parsed = parseInteger(option.value.value, argBase, 0);
        if (!parsed.ok) return fail(parsed.error);
        if (argBase === '--max-retries') {
          result.maxRetries = parsed.value;
        } else {
          result.stepMaxRetries = parsed.value;
        }
        i += option.value.skip;
        break;
      }

      case '--workers':
      case '--step-timeout': {
        const option = getArgValue(args, i, argBase);
        if (!option.ok) return fail(option.error);
        const parsed = parseInteger(option.value.value, argBase, 1);
        if (!parsed.ok) return fail(parsed.error);
        if (argBase === '--workers') {
          result.maxWorkers = parsed.value;
        } else {
          result.stepTimeoutMs = parsed.value;
        }
        i += option.value.skip;
        break;
      }

      case '--halt-on-failure': {
        result.haltOnRequiredFailure = true;
        break;
      }

      case '--auto-commit': {
        result.autoCommit = true;
        break;
      }

      case '--no-memory': {
        result.noMemory = true;
        break;
      }

      case '--preview-plan': {
        result.previewPlan = true;
        break;
      }

      case '--mock': {
        result.mockMode = true;
        break;
      }

      case '--no-interactive': {
        result.noInteractive = true;
        break;
      }

      case '--verbose': {
        result.verbose = true;
        break;
      }

      case '--debug': {
        result.debug = true;
        break;
      }

      case '--json': {
        result.jsonOutput = true;
        break;
      }

      default: {
        // Check for unknown flags
        if (arg.startsWith('--')) {
          return fail(`Unknown option: ${argBase}`);
        }
        // It's part of the goal
        if (result.goal) {
          result.goal += ' ' + arg;
        } else {
          result.goal = arg;
        }
      }
    }
  }

  if (result.planFile && result.plannerCommand) {
    return fail('--plan and --planner-command cannot be used together');
  }

  return { success: true, args: result };
}

/**
 * Map parsed arguments to config flags; unset options are left to other sources
 */
export function toCliFlags(args: ParsedArgs): CliFlags {
  const flags: CliFlags = {
    goal: args.goal,
    previewPlan: args.previewPlan ? true : undefined,
    mockMode: args.mockMode,
    noInteractive: args.noInteractive,
    verbose: args.verbose,
    debug: args.debug,
    jsonOutput: args.jsonOutput,
  };
  if (args.planFile !== null) flags.planFile = args.planFile;
  if (args.plannerCommand !== null) flags.plannerCommand = args.plannerCommand;
  if (args.reviewerCommand !== null) flags.reviewerCommand = args.reviewerCommand;
  if (args.maxRetries !== null) flags.maxRetries = args.maxRetries;
  if (args.maxWorkers !== null) flags.maxWorkers = args.maxWorkers;
  if (args.stepTimeoutMs !== null) flags.stepTimeoutMs = args.stepTimeoutMs;
  if (args.stepMaxRetries !== null) flags.stepMaxRetries = args.stepMaxRetries;
  if (args.haltOnRequiredFailure) flags.haltOnRequiredFailure = true;
  if (args.autoCommit) flags.autoCommit = true;
  if (args.noMemory) flags.memory = false;
  if (args.outputFile !== null) flags.outputFile = args.outputFile;
  if (args.projectRoot !== null) flags.projectRoot = args.projectRoot;
  return flags;
}
