/**
 * Types module - shared interfaces and types
 * Every injectable seam (logger, clock, filesystem, process runner, prompter,
 * capability providers, collaborators) is declared here
 */

// Result type for expected failures
export type { Result, Ok, Err } from './result';
export { ok, err } from './result';

// Exit codes
export { ExitCode } from './exit-codes';

// Plan and steps
export type { StepStatus, StepArgs, StepSpec, RiskSeverity, PlanRisk, Plan } from './plan';
export { TERMINAL_STATUSES, isTerminalStatus } from './plan';

// Capability providers
export type { ErrorKind, CapabilityOutput, InvokeRequest, CapabilityProvider } from './capability';
export {
  TRANSIENT_ERROR_KINDS,
  isTransientKind,
  CapabilityError,
} from './capability';

// Execution pass
export type {
  StepFailure,
  SkipReason,
  StepRecord,
  AbortReason,
  SucceededOutcome,
  FailedOutcome,
  SkippedOutcome,
  NotRunOutcome,
  StepOutcome,
  ExecutionReport,
} from './execution';

// Review
export type { ReviewVerdict, IssueSeverity, ReviewIssue, ReviewDecision } from './review';

// Collaborators
export type {
  PlanRequest,
  Planner,
  ReviewRequest,
  Reviewer,
  MemoryEntry,
  MemoryMatch,
  NewMemoryEntry,
  MemoryRetriever,
} from './collaborators';

// Error taxonomy
export type {
  PlanInvalidCode,
  PlanInvalidIssue,
  PlanInvalid,
  DuplicateOutcomeError,
} from './errors';
export { createPlanInvalid, IllegalTransitionError } from './errors';

// Process runner interface
export type { ProcessRunner, SpawnOptions, SpawnResult } from './process-runner';

// File system interface
export type {
  FileSystem,
  FileStats,
  WriteOptions,
  FileSystemError,
  FileSystemErrorCode,
} from './file-system';
export { createFileSystemError } from './file-system';

// Prompter interface
export type {
  Prompter,
  ConfirmOptions,
  InputOptions,
  PrompterError,
  PrompterErrorCode,
} from './prompter';
export { createPrompterError } from './prompter';

// Clock interface
export type { Clock } from './clock';
export { SystemClock, MockClock, DelayAbortedError } from './clock';

// Logger interface
export type { Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions } from './logger';
export { shouldLog, getEventLevel, DEFAULT_REDACT_PATTERNS, redactSecrets } from './logger';

// Effective config types
export type {
  EffectiveConfig,
  LoopConfig,
  ExecutionConfig,
  BackoffSettings,
  CapabilityConfig,
  MemoryConfig,
  CollaboratorConfig,
  VerbosityConfig,
  InteractivityConfig,
  RunModeConfig,
  PathConfig,
  ConfigSource,
} from './effective-config';
export { DEFAULT_CONFIG, createDefaultConfig } from './effective-config';
