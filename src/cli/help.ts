/**
 * CLI Help Text
 *
 * Help and usage text for the CLI
 */

/** Reported by --version */
export const VERSION = '0.1.0';

/** Get the usage text */
export function getUsageText(): string {
  return `Usage: taskweave <goal...> [options]

Collaborators:
  --plan <file>                 Read the plan document from a JSON file
  --planner-command <cmd>       Command that prints a plan document (request on stdin)
  --reviewer-command <cmd>      Command that prints a review document (default: built-in rules)

Limits:
  --max-retries <n>             Refinement/retry iterations after the first pass (default: 2)
  --workers <n>                 Steps executed in parallel (default: 4)
  --step-timeout <ms>           Per-attempt step timeout (default: 300000)
  --step-retries <n>            Retries of a transient step failure (default: 3)
  --halt-on-failure             Stop dispatching steps after a required step fails

Run:
  --project-root <dir>          Directory file and shell steps are confined to (default: cwd)
  --auto-commit                 Commit working tree changes after an approved run
  --no-memory                   Do not retrieve or save run memory
  --output <file>               Also write the result record to <file>
  --preview-plan                Show each plan and confirm before executing it
  --mock                        Echo every capability call instead of performing it
  --no-interactive              Disable interactive prompts; use defaults or fail
  --verbose                     Enable verbose output with more progress details
  --debug                       Enable debug mode with full diagnostics
  --json                        Print the result record as JSON
  -h, --help                    Show this help message
  -v, --version                 Show version number

Environment:
  TASKWEAVE_MAX_RETRIES, TASKWEAVE_MAX_WORKERS, TASKWEAVE_STEP_TIMEOUT_MS,
  TASKWEAVE_STEP_MAX_RETRIES, TASKWEAVE_PROJECT_ROOT, TASKWEAVE_AUTO_COMMIT

Examples:
  taskweave "Add a changelog entry" --plan plan.json
  taskweave "Add a changelog entry" --planner-command "./bin/planner"
  taskweave "Refresh fixtures" --plan plan.json --workers 1 --preview-plan
  taskweave "Dry run" --plan plan.json --mock --json`;
}
