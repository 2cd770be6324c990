/**
 * FileSystem interface
 * Abstracts filesystem operations for testability
 */

import type { Result } from './result';

export interface WriteOptions {
  /** Write to a temp file, then rename (default: true) */
  atomic?: boolean;
  /** Create parent directories if they don't exist */
  createParents?: boolean;
}

export interface FileStats {
  size: number;
  isFile: boolean;
  isDirectory: boolean;
  modifiedAt: Date;
}

export type FileSystemErrorCode =
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'ALREADY_EXISTS'
  | 'NOT_A_FILE'
  | 'NOT_A_DIRECTORY'
  | 'PATH_TRAVERSAL'
  | 'IO_ERROR';

export interface FileSystemError {
  code: FileSystemErrorCode;
  message: string;
  path: string;
  cause?: Error;
}

/**
 * Interface for filesystem operations
 * Implementations are real (Node.js fs) or in-memory (tests)
 */
export interface FileSystem {
  readFile(path: string): Promise<Result<string, FileSystemError>>;

  writeFile(
    path: string,
    content: string,
    options?: WriteOptions
  ): Promise<Result<void, FileSystemError>>;

  exists(path: string): Promise<boolean>;

  stat(path: string): Promise<Result<FileStats, FileSystemError>>;

  mkdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>>;

  /**
   * Names of the direct children of a directory, sorted
   */
  list(path: string): Promise<Result<string[], FileSystemError>>;

  resolve(...paths: string[]): string;

  join(...paths: string[]): string;

  dirname(path: string): string;

  /**
   * Path from `from` to `to`
   */
  relative(from: string, to: string): string;

  isAbsolute(path: string): boolean;
}

export function createFileSystemError(
  code: FileSystemErrorCode,
  path: string,
  message?: string,
  cause?: Error
): FileSystemError {
  const defaultMessages: Record<FileSystemErrorCode, string> = {
    NOT_FOUND: `Path not found: ${path}`,
    PERMISSION_DENIED: `Permission denied: ${path}`,
    ALREADY_EXISTS: `Path already exists: ${path}`,
    NOT_A_FILE: `Not a file: ${path}`,
    NOT_A_DIRECTORY: `Not a directory: ${path}`,
    PATH_TRAVERSAL: `Path traversal detected: ${path}`,
    IO_ERROR: `IO error: ${path}`,
  };

  return {
    code,
    path,
    message: message ?? defaultMessages[code],
    cause,
  };
}
