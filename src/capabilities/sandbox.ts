/**
 * Project-root sandbox shared by the filesystem and shell providers
 */

import { isAbsolute, relative, resolve, sep } from 'path';
import { CapabilityError } from '../types/capability';

export interface SandboxPath {
  /** Absolute path */
  absolute: string;
  /** Path relative to the project root ("" for the root itself) */
  relative: string;
}

/**
 * Resolve `path` against `projectRoot`, refusing anything outside the root
 * or inside an excluded path segment
 */
export function resolveInsideRoot(
  projectRoot: string,
  path: string,
  excludedPaths: readonly string[]
): SandboxPath {
  const root = resolve(projectRoot);
  const absolute = resolve(root, path);
  const relativePath = relative(root, absolute);

  if (relativePath === '..' || relativePath.startsWith(`..${sep}`) || isAbsolute(relativePath)) {
    throw new CapabilityError('PERMISSION_DENIED', `Path is outside the project root: ${path}`);
  }

  const segments = relativePath.split(sep);
  const excluded = excludedPaths.find((entry) => segments.includes(entry));
  if (excluded !== undefined) {
    throw new CapabilityError('PERMISSION_DENIED', `Path is excluded (${excluded}): ${path}`);
  }

  return { absolute, relative: relativePath };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * First forbidden entry that appears in the command as a whole word
 * (case-insensitive), or undefined
 */
export function findForbiddenCommand(
  command: string,
  forbiddenCommands: readonly string[]
): string | undefined {
  const lower = command.toLowerCase();
  return forbiddenCommands.find((entry) =>
    new RegExp(`(^|[^a-z0-9_-])${escapeRegExp(entry.toLowerCase())}($|[^a-z0-9_-])`).test(lower)
  );
}
