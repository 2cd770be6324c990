/**
 * Real FileSystem implementation
 * Uses Node.js fs module with atomic writes and path traversal protection
 */

import { readFile, writeFile, stat, mkdir, readdir } from 'fs/promises';
import { existsSync, mkdirSync, writeFileSync, renameSync, rmSync } from 'fs';
import { resolve, join, dirname, isAbsolute, relative } from 'path';
import { randomBytes } from 'crypto';
import {
  FileSystem,
  FileStats,
  WriteOptions,
  FileSystemError,
  createFileSystemError,
} from '../types/file-system';
import { Result, ok, err } from '../types/result';

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map a Node.js fs error onto the FileSystemError taxonomy
 */
export function toFileSystemError(error: unknown, path: string): FileSystemError {
  switch (errnoCode(error)) {
    case 'ENOENT':
      return createFileSystemError('NOT_FOUND', path);
    case 'EACCES':
    case 'EPERM':
      return createFileSystemError('PERMISSION_DENIED', path);
    case 'EISDIR':
      return createFileSystemError('NOT_A_FILE', path);
    case 'ENOTDIR':
      return createFileSystemError('NOT_A_DIRECTORY', path);
    case 'EEXIST':
      return createFileSystemError('ALREADY_EXISTS', path);
  }
  const cause = error instanceof Error ? error : undefined;
  return createFileSystemError('IO_ERROR', path, cause?.message ?? String(error), cause);
}

/**
 * Real implementation of FileSystem using Node.js fs
 */
export class RealFileSystem implements FileSystem {
  private readonly basePath?: string;

  /**
   * @param basePath - Optional base path for path traversal protection
   */
  constructor(basePath?: string) {
    this.basePath = basePath ? resolve(basePath) : undefined;
  }

  private isWithinBasePath(path: string): boolean {
    if (!this.basePath) {
      return true;
    }
    const relativePath = relative(this.basePath, resolve(path));
    return !relativePath.startsWith('..') && !isAbsolute(relativePath);
  }

  /**
   * Validate path against traversal attacks
   */
  private validatePath(path: string): Result<string, FileSystemError> {
    const normalizedPath = resolve(path);
    if (!this.isWithinBasePath(normalizedPath)) {
      return err(createFileSystemError('PATH_TRAVERSAL', path));
    }
    return ok(normalizedPath);
  }

  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }

    try {
      return ok(await readFile(validatedPath.value, { encoding: 'utf-8' }));
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async writeFile(
    path: string,
    content: string,
    options?: WriteOptions
  ): Promise<Result<void, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }

    try {
      if (options?.createParents) {
        mkdirSync(dirname(validatedPath.value), { recursive: true });
      }

      // Atomic write: write to temp file, then rename
      if (options?.atomic ?? true) {
        const tempPath = `${validatedPath.value}.${randomBytes(8).toString('hex')}.tmp`;
        try {
          writeFileSync(tempPath, content, { encoding: 'utf-8' });
          renameSync(tempPath, validatedPath.value);
        } catch (error) {
          rmSync(tempPath, { force: true });
          throw error;
        }
      } else {
        await writeFile(validatedPath.value, content, { encoding: 'utf-8' });
      }

      return ok(undefined);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return err(createFileSystemError('NOT_FOUND', path, 'Parent directory does not exist'));
      }
      return err(toFileSystemError(error, path));
    }
  }

  async exists(path: string): Promise<boolean> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return false;
    }
    return existsSync(validatedPath.value);
  }

  async stat(path: string): Promise<Result<FileStats, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }

    try {
      const stats = await stat(validatedPath.value);
      return ok({
        size: stats.size,
        isFile: stats.isFile(),
        isDirectory: stats.isDirectory(),
        modifiedAt: stats.mtime,
      });
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async mkdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }

    try {
      await mkdir(validatedPath.value, { recursive: recursive ?? false });
      return ok(undefined);
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async list(path: string): Promise<Result<string[], FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }

    try {
      const entries = await readdir(validatedPath.value);
      return ok(entries.sort());
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  resolve(...paths: string[]): string {
    return resolve(...paths);
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
 * Create a real filesystem with optional base path restriction
 */
export function createRealFileSystem(basePath?: string): FileSystem {
  return new RealFileSystem(basePath);
}
