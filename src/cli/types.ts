/**
 * CLI Types
 *
 * Type definitions for CLI argument parsing
 */

/** Parsed CLI arguments */
export interface ParsedArgs {
  /** Goal text (positional words joined by spaces) */
  goal: string;

  /** Plan document file for the file planner */
  planFile: string | null;

  /** External command that prints a plan document */
  plannerCommand: string | null;

  /** External command that prints a review document */
  reviewerCommand: string | null;

  /** Refinement/retry bound after the first pass */
  maxRetries: number | null;

  /** Worker pool size */
  maxWorkers: number | null;

  /** Per-attempt step timeout in milliseconds */
  stepTimeoutMs: number | null;

  /** Retries of a transient step failure */
  stepMaxRetries: number | null;

  /** Stop dispatching after a required step fails */
  haltOnRequiredFailure: boolean;

  /** Commit working tree changes after an approved run */
  autoCommit: boolean;

  /** Skip memory retrieval and saving */
  noMemory: boolean;

  /** Extra copy of the result record */
  outputFile: string | null;

  /** Root the filesystem and shell providers are confined to */
  projectRoot: string | null;

  /** Show each plan and ask before executing it */
  previewPlan: boolean;

  /** Replace every capability provider with a dry-run echo */
  mockMode: boolean;

  /** Show help and exit */
  help: boolean;

  /** Show version and exit */
  version: boolean;

  /** Disable interactive prompts; use defaults or fail */
  noInteractive: boolean;

  /** Enable verbose output with more progress details */
  verbose: boolean;

  /** Enable debug mode with full diagnostics */
  debug: boolean;

  /** Output the result record as JSON on stdout */
  jsonOutput: boolean;
}

/** Default values for parsed arguments */
export const DEFAULT_ARGS: ParsedArgs = {
  goal: '',
  planFile: null,
  plannerCommand: null,
  reviewerCommand: null,
  maxRetries: null,
  maxWorkers: null,
  stepTimeoutMs: null,
  stepMaxRetries: null,
  haltOnRequiredFailure: false,
  autoCommit: false,
  noMemory: false,
  outputFile: null,
  projectRoot: null,
  previewPlan: false,
  mockMode: false,
  help: false,
  version: false,
  noInteractive: false,
  verbose: false,
  debug: false,
  jsonOutput: false,
};

/** Result of parsing arguments */
export interface ParseResult {
  success: boolean;
  args?: ParsedArgs;
  error?: string;
}
