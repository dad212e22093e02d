/**
 * FileSystem interface
 * Abstracts the few filesystem operations the agent needs (config files,
 * review snapshots, corpus files) so they can run in memory under test
 */

import { Result } from './result';

export interface WriteOptions {
  /** Write to a temp file, then rename (default: true) */
  atomic?: boolean;
  /** Create parent directories if they don't exist */
  createParents?: boolean;
}

export type FileSystemErrorCode = 'NOT_FOUND' | 'PERMISSION_DENIED' | 'NOT_A_FILE' | 'IO_ERROR';

export interface FileSystemError {
  code: FileSystemErrorCode;
  message: string;
  path: string;
  cause?: unknown;
}

export interface FileSystem {
  readFile(path: string): Promise<Result<string, FileSystemError>>;

  writeFile(path: string, content: string, options?: WriteOptions): Promise<Result<void, FileSystemError>>;

  exists(path: string): Promise<boolean>;

  join(...paths: string[]): string;

  resolve(...paths: string[]): string;
}

export function createFileSystemError(
  code: FileSystemErrorCode,
  path: string,
  message?: string,
  cause?: unknown
): FileSystemError {
  const defaultMessages: Record<FileSystemErrorCode, string> = {
    NOT_FOUND: `Path not found: ${path}`,
    PERMISSION_DENIED: `Permission denied: ${path}`,
    NOT_A_FILE: `Not a file: ${path}`,
    IO_ERROR: `IO error: ${path}`,
  };
  return { code, path, message: message ?? defaultMessages[code], cause };
}
