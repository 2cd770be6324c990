/**
 * Filesystem capability
 *
 * Actions: read_file {path}, write_file {path, content}, list_dir {path?}.
 * Every path is confined to the project root.
 */

import type { CapabilityOutput, CapabilityProvider, ErrorKind, InvokeRequest } from '../types/capability';
import { CapabilityError } from '../types/capability';
import type { FileSystem, FileSystemError, FileSystemErrorCode } from '../types/file-system';
import type { StepArgs } from '../types/plan';
import { optionalString, requireString, requireText, unknownAction } from './args';
import { resolveInsideRoot } from './sandbox';

export const MAX_READ_LINES = 10_000;
export const MAX_LIST_ENTRIES = 1_000;

const ERROR_KINDS: Record<FileSystemErrorCode, ErrorKind> = {
  NOT_FOUND: 'REJECTED',
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  PATH_TRAVERSAL: 'PERMISSION_DENIED',
  ALREADY_EXISTS: 'REJECTED',
  NOT_A_FILE: 'VALIDATION',
  NOT_A_DIRECTORY: 'VALIDATION',
  IO_ERROR: 'REJECTED',
};

function toCapabilityError(error: FileSystemError): CapabilityError {
  return new CapabilityError(ERROR_KINDS[error.code], error.message, { cause: error.cause });
}

export interface FileSystemProviderOptions {
  fs: FileSystem;
  projectRoot: string;
  /** Path segments that may not be read or written */
  excludedPaths: readonly string[];
}

export class FileSystemProvider implements CapabilityProvider {
  readonly name = 'filesystem';

  constructor(private readonly options: FileSystemProviderOptions) {}

  async invoke(request: InvokeRequest): Promise<CapabilityOutput> {
    switch (request.action) {
      case 'read_file':
        return this.readFile(request.args);
      case 'write_file':
        return this.writeFile(request.args);
      case 'list_dir':
        return this.listDir(request.args);
      default:
        throw unknownAction(this.name, request.action);
    }
  }

  private resolve(path: string): { absolute: string; relative: string } {
    return resolveInsideRoot(this.options.projectRoot, path, this.options.excludedPaths);
  }

  private async readFile(args: StepArgs): Promise<CapabilityOutput> {
    const target = this.resolve(requireText(args, 'path'));
    const read = await this.options.fs.readFile(target.absolute);
    if (!read.ok) {
      throw toCapabilityError(read.error);
    }

    const lines = read.value.split('\n');
    const truncated = lines.length > MAX_READ_LINES;
    const content = truncated
      ? `${lines.slice(0, MAX_READ_LINES).join('\n')}\n\n[... truncated, ${lines.length - MAX_READ_LINES} more lines ...]`
      : read.value;

    return { path: target.relative, content, lines: lines.length, truncated };
  }

  private async writeFile(args: StepArgs): Promise<CapabilityOutput> {
    const target = this.resolve(requireText(args, 'path'));
    const content = requireString(args, 'content');

    const written = await this.options.fs.writeFile(target.absolute, content, {
      createParents: true,
    });
    if (!written.ok) {
      throw toCapabilityError(written.error);
    }
    return { path: target.relative, bytes: Buffer.byteLength(content) };
  }

  private async listDir(args: StepArgs): Promise<CapabilityOutput> {
    const target = this.resolve(optionalString(args, 'path') ?? '.');
    const listed = await this.options.fs.list(target.absolute);
    if (!listed.ok) {
      throw toCapabilityError(listed.error);
    }

    const names = listed.value.slice(0, MAX_LIST_ENTRIES);
    const entries: Array<{ name: string; type: 'file' | 'directory'; size?: number }> = [];
    for (const name of names) {
      const stats = await this.options.fs.stat(this.options.fs.join(target.absolute, name));
      if (!stats.ok) {
        continue;
      }
      entries.push(
        stats.value.isDirectory
          ? { name, type: 'directory' }
          : { name, type: 'file', size: stats.value.size }
      );
    }

    return {
      path: target.relative === '' ? '.' : target.relative,
      entries,
      truncated: listed.value.length > MAX_LIST_ENTRIES,
    };
  }
}
