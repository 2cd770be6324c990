/**
 * EffectiveConfig type
 * Centralized configuration object passed through the system
 */

/**
 * Outer loop bound
 */
export interface LoopConfig {
  /** Maximum refinement/retry iterations after the first pass */
  maxRetries: number;
}

/**
 * Scheduler and step runner settings
 */
export interface ExecutionConfig {
  /** Worker pool size */
  maxWorkers: number;
  /** Per-attempt timeout in milliseconds */
  stepTimeoutMs: number;
  /** Retries of a transient step failure (attempts <= stepMaxRetries + 1) */
  stepMaxRetries: number;
  /** Stop dispatching new steps after any required-step failure */
  haltOnRequiredFailure: boolean;
}

/**
 * Retry delay schedule
 */
export interface BackoffSettings {
  /** Delay before retry n is delaysMs[n-1]; the last entry repeats */
  delaysMs: number[];
  /** Cap applied before jitter */
  maxDelayMs: number;
  /** Jitter as a fraction of the delay (0..1) */
  jitterRatio: number;
}

/**
 * Built-in capability provider settings
 */
export interface CapabilityConfig {
  /** Path fragments the filesystem provider refuses to touch */
  excludedPaths: string[];
  /** Substrings the shell provider refuses to run */
  forbiddenCommands: string[];
  /** Timeout for web fetches in milliseconds */
  webTimeoutMs: number;
  /** Author and committer identity for vcs commits */
  commitAuthorName: string;
  commitAuthorEmail: string;
}

export interface MemoryConfig {
  /** Retrieve context before planning and save successful runs */
  enabled: boolean;
  /** Number of matches rendered into planner context */
  topK: number;
  /** Oldest entries are evicted past this count */
  maxDocuments: number;
}

/**
 * Where plans and reviews come from
 */
export interface CollaboratorConfig {
  /** Plan document file used by the file planner */
  planFile?: string;
  /** External command that prints a plan document */
  plannerCommand?: string;
  /** External command that prints a review document */
  reviewerCommand?: string;
}

export interface VerbosityConfig {
  verbose: boolean;
  debug: boolean;
  jsonOutput: boolean;
}

export interface InteractivityConfig {
  /** Whether interactive prompts are enabled */
  interactive: boolean;
  /** Whether to show each plan and ask for confirmation before executing it */
  previewPlan: boolean;
}

export interface RunModeConfig {
  /** Replace every capability provider with a dry-run echo */
  mockMode: boolean;
  /** Commit working tree changes after an approved run */
  autoCommit: boolean;
}

export interface PathConfig {
  /** Working directory for the run */
  workingDirectory: string;
  /** Root the filesystem and shell providers are confined to */
  projectRoot: string;
  /** Base directory for taskweave artifacts (records, memory) */
  artifactBaseDir: string;
  /** Extra copy of the result record */
  outputFile?: string;
}

/**
 * Source of a configuration value
 */
export type ConfigSource = 'cli' | 'env' | 'repo' | 'user' | 'default';

/**
 * The complete effective configuration for a run
 */
export interface EffectiveConfig {
  schemaVersion: '1.0.0';
  goal: string;
  loop: LoopConfig;
  execution: ExecutionConfig;
  backoff: BackoffSettings;
  capabilities: CapabilityConfig;
  memory: MemoryConfig;
  collaborators: CollaboratorConfig;
  verbosity: VerbosityConfig;
  interactivity: InteractivityConfig;
  runMode: RunModeConfig;
  paths: PathConfig;
  runId: string;
  /** ISO 8601 */
  resolvedAt: string;
  /** Where each resolved value came from, keyed by dotted path */
  sources?: Record<string, ConfigSource>;
}

export const DEFAULT_CONFIG: Omit<
  EffectiveConfig,
  'goal' | 'runId' | 'resolvedAt' | 'paths' | 'sources'
> = {
  schemaVersion: '1.0.0',
  loop: {
    maxRetries: 2,
  },
  execution: {
    maxWorkers: 4,
    stepTimeoutMs: 300_000,
    stepMaxRetries: 3,
    haltOnRequiredFailure: false,
  },
  backoff: {
    delaysMs: [2000, 4000, 8000],
    maxDelayMs: 10_000,
    jitterRatio: 0.1,
  },
  capabilities: {
    excludedPaths: ['.git', '.env', '.venv', '__pycache__', 'node_modules'],
    forbiddenCommands: ['rm -rf', 'sudo', 'su', 'format', 'diskpart'],
    webTimeoutMs: 10_000,
    commitAuthorName: 'taskweave',
    commitAuthorEmail: 'taskweave@localhost',
  },
  memory: {
    enabled: true,
    topK: 5,
    maxDocuments: 5000,
  },
  collaborators: {},
  verbosity: {
    verbose: false,
    debug: false,
    jsonOutput: false,
  },
  interactivity: {
    interactive: true,
    previewPlan: false,
  },
  runMode: {
    mockMode: false,
    autoCommit: false,
  },
};

/**
 * Build a complete config from defaults, for tests and library callers
 */
export function createDefaultConfig(
  goal: string,
  paths: PathConfig,
  overrides: Partial<Omit<EffectiveConfig, 'goal' | 'paths'>> = {}
): EffectiveConfig {
  return {
    ...DEFAULT_CONFIG,
    goal,
    paths,
    runId: 'run',
    resolvedAt: new Date(0).toISOString(),
    ...overrides,
  };
}
