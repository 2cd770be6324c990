/**
 * Capabilities module - registry and built-in providers
 */

export { CapabilityRegistry } from './capability-registry';
export {
  BUILTIN_CAPABILITIES,
  createCapabilityRegistry,
  createDryRunRegistry,
} from './create-registry';
export type { BuiltinCapability, CapabilityDependencies } from './create-registry';

// Providers
export { FileSystemProvider, MAX_READ_LINES, MAX_LIST_ENTRIES } from './filesystem-provider';
export type { FileSystemProviderOptions } from './filesystem-provider';
export { ShellProvider } from './shell-provider';
export type { ShellProviderOptions } from './shell-provider';
export { VcsProvider } from './vcs-provider';
export type { VcsProviderOptions } from './vcs-provider';
export { WebProvider } from './web-provider';
export type { WebProviderOptions, FetchFunction } from './web-provider';
export { MemoryProvider } from './memory-provider';
export { ScriptedProvider } from './scripted-provider';
export type { ScriptedResponse, ScriptedProviderOptions } from './scripted-provider';

// Helpers
export { resolveInsideRoot, findForbiddenCommand } from './sandbox';
export { htmlToText } from './html-text';
