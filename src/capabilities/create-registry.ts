/**
 * Build the capability registry for a run from the effective config
 */

import type { Clock } from '../types/clock';
import type { MemoryRetriever } from '../types/collaborators';
import type { EffectiveConfig } from '../types/effective-config';
import type { FileSystem } from '../types/file-system';
import type { ProcessRunner } from '../types/process-runner';
import { CapabilityRegistry } from './capability-registry';
import { FileSystemProvider } from './filesystem-provider';
import { MemoryProvider } from './memory-provider';
import { ScriptedProvider } from './scripted-provider';
import { ShellProvider } from './shell-provider';
import { VcsProvider } from './vcs-provider';
import { WebProvider } from './web-provider';
import type { FetchFunction } from './web-provider';

export const BUILTIN_CAPABILITIES = ['filesystem', 'shell', 'vcs', 'web', 'memory'] as const;

export type BuiltinCapability = (typeof BUILTIN_CAPABILITIES)[number];

export interface CapabilityDependencies {
  config: EffectiveConfig;
  fs: FileSystem;
  runner: ProcessRunner;
  clock: Clock;
  /** Registers the memory capability when present */
  memory?: MemoryRetriever;
  fetch?: FetchFunction;
}

/**
 * A registry where every built-in capability echoes its request back
 * without side effects
 */
export function createDryRunRegistry(clock: Clock): CapabilityRegistry {
  return new CapabilityRegistry(
    BUILTIN_CAPABILITIES.map((name) => new ScriptedProvider({ name, clock, dryRun: true }))
  );
}

export function createCapabilityRegistry(deps: CapabilityDependencies): CapabilityRegistry {
  const { config } = deps;
  if (config.runMode.mockMode) {
    return createDryRunRegistry(deps.clock);
  }

  const { projectRoot } = config.paths;
  const { excludedPaths, forbiddenCommands, webTimeoutMs, commitAuthorName, commitAuthorEmail } =
    config.capabilities;

  const registry = new CapabilityRegistry([
    new FileSystemProvider({ fs: deps.fs, projectRoot, excludedPaths }),
    new ShellProvider({ runner: deps.runner, projectRoot, forbiddenCommands, excludedPaths }),
    new VcsProvider({
      runner: deps.runner,
      projectRoot,
      commitAuthor: { name: commitAuthorName, email: commitAuthorEmail },
    }),
    new WebProvider({ timeoutMs: webTimeoutMs, ...(deps.fetch ? { fetch: deps.fetch } : {}) }),
  ]);
  if (deps.memory) {
    registry.register(new MemoryProvider(deps.memory, config.memory.topK));
  }
  return registry;
}
