/**
 * Standardized exit codes
 */

export const ExitCode = {
  /** Goal approved */
  SUCCESS: 0,
  /** Run finished without achieving the goal */
  GOAL_FAILED: 1,
  /** Invalid CLI usage or missing goal */
  USAGE_ERROR: 2,
  /** Unexpected/unhandled error */
  UNEXPECTED_ERROR: 3,
  /** Refinement/retry bound reached without approval */
  LIMIT_EXCEEDED: 4,
  /** Interrupted by the user (SIGINT) */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
