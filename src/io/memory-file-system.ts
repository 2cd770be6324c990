/**
 * In-memory FileSystem implementation
 * For testing - maintains virtual filesystem in memory
 */

import { resolve, join, dirname, isAbsolute, relative, sep } from 'path';
import {
  FileSystem,
  FileStats,
  WriteOptions,
  FileSystemError,
  createFileSystemError,
} from '../types/file-system';
import { Result, ok, err } from '../types/result';

interface VirtualFile {
  type: 'file';
  content: string;
  modifiedAt: Date;
}

interface VirtualDirectory {
  type: 'directory';
  modifiedAt: Date;
}

type VirtualEntry = VirtualFile | VirtualDirectory;

/**
 * In-memory implementation of FileSystem for testing
 */
export class MemoryFileSystem implements FileSystem {
  private entries: Map<string, VirtualEntry> = new Map();
  private readonly basePath: string;

  constructor(basePath: string = '/') {
    this.basePath = basePath;
    this.entries.set(this.normalizePath(basePath), { type: 'directory', modifiedAt: new Date() });
  }

  /**
   * Absolute, resolved form used as the storage key
   */
  private normalizePath(path: string): string {
    return resolve(isAbsolute(path) ? path : join(this.basePath, path));
  }

  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    const entry = this.entries.get(this.normalizePath(path));

    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    if (entry.type === 'directory') {
      return err(createFileSystemError('NOT_A_FILE', path));
    }
    return ok(entry.content);
  }

  async writeFile(
    path: string,
    content: string,
    options?: WriteOptions
  ): Promise<Result<void, FileSystemError>> {
    const normalizedPath = this.normalizePath(path);
    const parentDir = dirname(normalizedPath);

    const parentEntry = this.entries.get(parentDir);
    if (!parentEntry) {
      if (!options?.createParents) {
        return err(createFileSystemError('NOT_FOUND', path, 'Parent directory does not exist'));
      }
      const mkdirResult = await this.mkdir(parentDir, true);
      if (!mkdirResult.ok) {
        return mkdirResult;
      }
    } else if (parentEntry.type !== 'directory') {
      return err(createFileSystemError('NOT_A_DIRECTORY', parentDir));
    }

    if (this.entries.get(normalizedPath)?.type === 'directory') {
      return err(createFileSystemError('NOT_A_FILE', path));
    }

    this.entries.set(normalizedPath, { type: 'file', content, modifiedAt: new Date() });
    return ok(undefined);
  }

  async exists(path: string): Promise<boolean> {
    return this.entries.has(this.normalizePath(path));
  }

  async stat(path: string): Promise<Result<FileStats, FileSystemError>> {
    const entry = this.entries.get(this.normalizePath(path));

    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', path));
    }

    return ok({
      size: entry.type === 'file' ? Buffer.byteLength(entry.content) : 0,
      isFile: entry.type === 'file',
      isDirectory: entry.type === 'directory',
      modifiedAt: entry.modifiedAt,
    });
  }

  async mkdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>> {
    const normalizedPath = this.normalizePath(path);

    const existingEntry = this.entries.get(normalizedPath);
    if (existingEntry) {
      if (existingEntry.type === 'directory') {
        return ok(undefined);
      }
      return err(createFileSystemError('NOT_A_DIRECTORY', path));
    }

    const parentDir = dirname(normalizedPath);
    if (parentDir !== normalizedPath) {
      const parentEntry = this.entries.get(parentDir);
      if (!parentEntry) {
        if (!recursive) {
          return err(
            createFileSystemError('NOT_FOUND', parentDir, 'Parent directory does not exist')
          );
        }
        const mkdirResult = await this.mkdir(parentDir, true);
        if (!mkdirResult.ok) {
          return mkdirResult;
        }
      } else if (parentEntry.type !== 'directory') {
        return err(createFileSystemError('NOT_A_DIRECTORY', parentDir));
      }
    }

    this.entries.set(normalizedPath, { type: 'directory', modifiedAt: new Date() });
    return ok(undefined);
  }

  async list(path: string): Promise<Result<string[], FileSystemError>> {
    const normalizedPath = this.normalizePath(path);
    const entry = this.entries.get(normalizedPath);

    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    if (entry.type !== 'directory') {
      return err(createFileSystemError('NOT_A_DIRECTORY', path));
    }

    const prefix = normalizedPath === sep ? sep : normalizedPath + sep;
    const children: string[] = [];
    for (const entryPath of this.entries.keys()) {
      if (entryPath !== normalizedPath && entryPath.startsWith(prefix)) {
        const name = entryPath.slice(prefix.length);
        if (!name.includes(sep)) {
          children.push(name);
        }
      }
    }
    return ok(children.sort());
  }

  resolve(...paths: string[]): string {
    return resolve(this.basePath, ...paths);
  }

  join(...paths: string[]): string {
    return join(...paths);
  }

  dirname(path: string): string {
    return dirname(path);
  }

  relative(from: string, to: string): string {
    return relative(from, to);
  }

  isAbsolute(path: string): boolean {
    return isAbsolute(path);
  }
}

/**
 * Create an in-memory filesystem for testing
 */
export function createMemoryFileSystem(basePath?: string): MemoryFileSystem {
  return new MemoryFileSystem(basePath);
}
