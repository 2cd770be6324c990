/**
 * Configuration Resolution
 * Single-pass config resolution with explicit precedence
 * CLI flags > environment (TASKWEAVE_*) > repo config > user config > defaults
 */

import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import {
  EffectiveConfig,
  DEFAULT_CONFIG,
  ConfigSource,
} from '../types/effective-config';
import { ConfigFile, parseConfigFile } from '../schemas/validators';

export const ARTIFACT_DIR_NAME = '.taskweave';

/**
 * CLI flags that can override configuration
 */
export interface CliFlags {
  goal?: string;
  planFile?: string;
  plannerCommand?: string;
  reviewerCommand?: string;
  maxRetries?: number;
  maxWorkers?: number;
  stepTimeoutMs?: number;
  stepMaxRetries?: number;
  haltOnRequiredFailure?: boolean;
  autoCommit?: boolean;
  /** false for --no-memory */
  memory?: boolean;
  outputFile?: string;
  previewPlan?: boolean;
  mockMode?: boolean;
  noInteractive?: boolean;
  verbose?: boolean;
  debug?: boolean;
  jsonOutput?: boolean;
  workingDirectory?: string;
  projectRoot?: string;
}

export interface ResolveConfigOptions {
  /** Defaults to process.env */
  env?: Record<string, string | undefined>;
  /** Defaults to os.homedir() */
  homeDirectory?: string;
  /** Defaults to process.cwd() */
  workingDirectory?: string;
  now?: Date;
  runId?: string;
}

export interface ConfigResolution {
  config: EffectiveConfig;
  /** Ignored config files and environment values */
  warnings: string[];
}

/**
 * Environment values, parsed
 */
interface EnvConfig {
  maxRetries?: number;
  maxWorkers?: number;
  stepTimeoutMs?: number;
  stepMaxRetries?: number;
  projectRoot?: string;
  autoCommit?: boolean;
}

export function getRepoConfigPath(cwd: string): string {
  return join(cwd, ARTIFACT_DIR_NAME, 'config.json');
}

export function getUserConfigPath(home: string): string {
  return join(home, '.config', 'taskweave', 'config.json');
}

/**
 * Load and validate a JSON config file if it exists
 */
function loadConfigFile(path: string, warnings: string[]): ConfigFile | null {
  if (!existsSync(path)) {
    return null;
  }
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    warnings.push(`Ignoring ${path}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
  const parsed = parseConfigFile(content);
  if (!parsed.success || !parsed.data) {
    warnings.push(`Ignoring ${path}: ${(parsed.errors ?? []).join('; ')}`);
    return null;
  }
  return parsed.data;
}

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

function readEnvInt(
  env: Record<string, string | undefined>,
  name: string,
  schema: z.ZodNumber,
  warnings: string[]
): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) {
    return undefined;
  }
  const parsed = z.coerce.number().pipe(schema).safeParse(raw);
  if (!parsed.success) {
    warnings.push(`Ignoring ${name}=${raw}: ${parsed.error.issues[0]?.message ?? 'invalid value'}`);
    return undefined;
  }
  return parsed.data;
}

function readEnvBoolean(
  env: Record<string, string | undefined>,
  name: string,
  warnings: string[]
): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return undefined;
  }
  if (TRUE_VALUES.includes(raw)) {
    return true;
  }
  if (FALSE_VALUES.includes(raw)) {
    return false;
  }
  warnings.push(`Ignoring ${name}=${raw}: expected true or false`);
  return undefined;
}

function loadEnvConfig(env: Record<string, string | undefined>, warnings: string[]): EnvConfig {
  const nonNegative = z.number().int().min(0);
  const projectRoot = env.TASKWEAVE_PROJECT_ROOT?.trim();
  return {
    maxRetries: readEnvInt(env, 'TASKWEAVE_MAX_RETRIES', nonNegative.max(20), warnings),
    maxWorkers: readEnvInt(env, 'TASKWEAVE_MAX_WORKERS', z.number().int().min(1).max(64), warnings),
    stepTimeoutMs: readEnvInt(env, 'TASKWEAVE_STEP_TIMEOUT_MS', z.number().int().positive(), warnings),
    stepMaxRetries: readEnvInt(env, 'TASKWEAVE_STEP_MAX_RETRIES', nonNegative.max(10), warnings),
    projectRoot: projectRoot ? projectRoot : undefined,
    autoCommit: readEnvBoolean(env, 'TASKWEAVE_AUTO_COMMIT', warnings),
  };
}

/**
 * Generate a run ID from the start time (sorts chronologically)
 */
export function generateRunId(now: Date = new Date()): string {
  return now.toISOString().replace('Z', '').replace(/[:.]/g, '-').replace('T', '_');
}

/**
 * Resolve configuration from all sources with explicit precedence
 * CLI flags > environment > repo config > user config > defaults
 */
export function resolveConfig(cliFlags: CliFlags, options: ResolveConfigOptions = {}): ConfigResolution {
  const cwd = resolve(options.workingDirectory ?? cliFlags.workingDirectory ?? process.cwd());
  const now = options.now ?? new Date();
  const warnings: string[] = [];

  const repoConfig = loadConfigFile(getRepoConfigPath(cwd), warnings);
  const userConfig = loadConfigFile(getUserConfigPath(options.homeDirectory ?? homedir()), warnings);
  const envConfig = loadEnvConfig(options.env ?? process.env, warnings);

  // Track sources for debugging
  const sources: Record<string, ConfigSource> = {};

  // Helper to resolve a value with precedence
  function resolveValue<T>(
    key: string,
    cli: T | undefined,
    env: T | undefined,
    repo: T | undefined,
    user: T | undefined,
    defaultVal: T
  ): T {
    if (cli !== undefined) {
      sources[key] = 'cli';
      return cli;
    }
    if (env !== undefined) {
      sources[key] = 'env';
      return env;
    }
    if (repo !== undefined) {
      sources[key] = 'repo';
      return repo;
    }
    if (user !== undefined) {
      sources[key] = 'user';
      return user;
    }
    sources[key] = 'default';
    return defaultVal;
  }

  const projectRoot = resolveValue(
    'paths.projectRoot',
    cliFlags.projectRoot,
    envConfig.projectRoot,
    repoConfig?.projectRoot,
    userConfig?.projectRoot,
    cwd
  );

  const config: EffectiveConfig = {
    schemaVersion: '1.0.0',
    goal: cliFlags.goal ?? '',
    runId: options.runId ?? generateRunId(now),
    resolvedAt: now.toISOString(),

    loop: {
      maxRetries: resolveValue(
        'loop.maxRetries',
        cliFlags.maxRetries,
        envConfig.maxRetries,
        repoConfig?.loop?.maxRetries,
        userConfig?.loop?.maxRetries,
        DEFAULT_CONFIG.loop.maxRetries
      ),
    },

    execution: {
      maxWorkers: resolveValue(
        'execution.maxWorkers',
        cliFlags.maxWorkers,
        envConfig.maxWorkers,
        repoConfig?.execution?.maxWorkers,
        userConfig?.execution?.maxWorkers,
        DEFAULT_CONFIG.execution.maxWorkers
      ),
      stepTimeoutMs: resolveValue(
        'execution.stepTimeoutMs',
        cliFlags.stepTimeoutMs,
        envConfig.stepTimeoutMs,
        repoConfig?.execution?.stepTimeoutMs,
        userConfig?.execution?.stepTimeoutMs,
        DEFAULT_CONFIG.execution.stepTimeoutMs
      ),
      stepMaxRetries: resolveValue(
        'execution.stepMaxRetries',
        cliFlags.stepMaxRetries,
        envConfig.stepMaxRetries,
        repoConfig?.execution?.stepMaxRetries,
        userConfig?.execution?.stepMaxRetries,
        DEFAULT_CONFIG.execution.stepMaxRetries
      ),
      haltOnRequiredFailure: resolveValue(
        'execution.haltOnRequiredFailure',
        cliFlags.haltOnRequiredFailure,
        undefined,
        repoConfig?.execution?.haltOnRequiredFailure,
        userConfig?.execution?.haltOnRequiredFailure,
        DEFAULT_CONFIG.execution.haltOnRequiredFailure
      ),
    },

    backoff: {
      delaysMs: resolveValue(
        'backoff.delaysMs',
        undefined,
        undefined,
        repoConfig?.backoff?.delaysMs,
        userConfig?.backoff?.delaysMs,
        DEFAULT_CONFIG.backoff.delaysMs
      ),
      maxDelayMs: resolveValue(
        'backoff.maxDelayMs',
        undefined,
        undefined,
        repoConfig?.backoff?.maxDelayMs,
        userConfig?.backoff?.maxDelayMs,
        DEFAULT_CONFIG.backoff.maxDelayMs
      ),
      jitterRatio: resolveValue(
        'backoff.jitterRatio',
        undefined,
        undefined,
        repoConfig?.backoff?.jitterRatio,
        userConfig?.backoff?.jitterRatio,
        DEFAULT_CONFIG.backoff.jitterRatio
      ),
    },

    capabilities: {
      excludedPaths: resolveValue(
        'capabilities.excludedPaths',
        undefined,
        undefined,
        repoConfig?.capabilities?.excludedPaths,
        userConfig?.capabilities?.excludedPaths,
        DEFAULT_CONFIG.capabilities.excludedPaths
      ),
      forbiddenCommands: resolveValue(
        'capabilities.forbiddenCommands',
        undefined,
        undefined,
        repoConfig?.capabilities?.forbiddenCommands,
        userConfig?.capabilities?.forbiddenCommands,
        DEFAULT_CONFIG.capabilities.forbiddenCommands
      ),
      webTimeoutMs: resolveValue(
        'capabilities.webTimeoutMs',
        undefined,
        undefined,
        repoConfig?.capabilities?.webTimeoutMs,
        userConfig?.capabilities?.webTimeoutMs,
        DEFAULT_CONFIG.capabilities.webTimeoutMs
      ),
      commitAuthorName: resolveValue(
        'capabilities.commitAuthorName',
        undefined,
        undefined,
        repoConfig?.capabilities?.commitAuthorName,
        userConfig?.capabilities?.commitAuthorName,
        DEFAULT_CONFIG.capabilities.commitAuthorName
      ),
      commitAuthorEmail: resolveValue(
        'capabilities.commitAuthorEmail',
        undefined,
        undefined,
        repoConfig?.capabilities?.commitAuthorEmail,
        userConfig?.capabilities?.commitAuthorEmail,
        DEFAULT_CONFIG.capabilities.commitAuthorEmail
      ),
    },

    memory: {
      enabled: resolveValue(
        'memory.enabled',
        cliFlags.memory,
        undefined,
        repoConfig?.memory?.enabled,
        userConfig?.memory?.enabled,
        DEFAULT_CONFIG.memory.enabled
      ),
      topK: resolveValue(
        'memory.topK',
        undefined,
        undefined,
        repoConfig?.memory?.topK,
        userConfig?.memory?.topK,
        DEFAULT_CONFIG.memory.topK
      ),
      maxDocuments: resolveValue(
        'memory.maxDocuments',
        undefined,
        undefined,
        repoConfig?.memory?.maxDocuments,
        userConfig?.memory?.maxDocuments,
        DEFAULT_CONFIG.memory.maxDocuments
      ),
    },

    collaborators: {
      planFile: resolveValue(
        'collaborators.planFile',
        cliFlags.planFile,
        undefined,
        repoConfig?.collaborators?.planFile,
        userConfig?.collaborators?.planFile,
        undefined
      ),
      plannerCommand: resolveValue(
        'collaborators.plannerCommand',
        cliFlags.plannerCommand,
        undefined,
        repoConfig?.collaborators?.plannerCommand,
        userConfig?.collaborators?.plannerCommand,
        undefined
      ),
      reviewerCommand: resolveValue(
        'collaborators.reviewerCommand',
        cliFlags.reviewerCommand,
        undefined,
        repoConfig?.collaborators?.reviewerCommand,
        userConfig?.collaborators?.reviewerCommand,
        undefined
      ),
    },

    verbosity: {
      verbose: cliFlags.verbose ?? DEFAULT_CONFIG.verbosity.verbose,
      debug: cliFlags.debug ?? DEFAULT_CONFIG.verbosity.debug,
      jsonOutput: cliFlags.jsonOutput ?? DEFAULT_CONFIG.verbosity.jsonOutput,
    },

    interactivity: {
      interactive: !(cliFlags.noInteractive ?? false),
      previewPlan: resolveValue(
        'interactivity.previewPlan',
        cliFlags.previewPlan,
        undefined,
        repoConfig?.previewPlan,
        userConfig?.previewPlan,
        DEFAULT_CONFIG.interactivity.previewPlan
      ),
    },

    runMode: {
      mockMode: cliFlags.mockMode ?? DEFAULT_CONFIG.runMode.mockMode,
      autoCommit: resolveValue(
        'runMode.autoCommit',
        cliFlags.autoCommit,
        envConfig.autoCommit,
        repoConfig?.autoCommit,
        userConfig?.autoCommit,
        DEFAULT_CONFIG.runMode.autoCommit
      ),
    },

    paths: {
      workingDirectory: cwd,
      projectRoot: resolve(cwd, projectRoot),
      artifactBaseDir: join(cwd, ARTIFACT_DIR_NAME),
      ...(cliFlags.outputFile ? { outputFile: resolve(cwd, cliFlags.outputFile) } : {}),
    },

    sources,
  };

  return { config, warnings };
}
