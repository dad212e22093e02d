/**
 * Real FileSystem implementation
 * Uses the Node.js fs module with atomic writes
 */

import { readFile, writeFile, mkdir, rename, unlink, stat } from 'fs/promises';
import { resolve, join, dirname } from 'path';
import { randomBytes } from 'crypto';
import { FileSystem, WriteOptions, FileSystemError, createFileSystemError } from '../types/file-system';
import { Result, ok, err } from '../types/result';

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function toFileSystemError(error: unknown, path: string): FileSystemError {
  switch (errnoCode(error)) {
    case 'ENOENT':
      return createFileSystemError('NOT_FOUND', path, undefined, error);
    case 'EACCES':
    case 'EPERM':
      return createFileSystemError('PERMISSION_DENIED', path, undefined, error);
    case 'EISDIR':
      return createFileSystemError('NOT_A_FILE', path, undefined, error);
    default:
      return createFileSystemError(
        'IO_ERROR',
        path,
        error instanceof Error ? error.message : String(error),
        error
      );
  }
}

export class RealFileSystem implements FileSystem {
  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    try {
      return ok(await readFile(resolve(path), { encoding: 'utf-8' }));
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async writeFile(path: string, content: string, options?: WriteOptions): Promise<Result<void, FileSystemError>> {
    const target = resolve(path);
    try {
      if (options?.createParents) {
        await mkdir(dirname(target), { recursive: true });
      }

      // Atomic write: write to temp file, then rename
      if (options?.atomic ?? true) {
        const tempPath = `${target}.${randomBytes(8).toString('hex')}.tmp`;
        try {
          await writeFile(tempPath, content, { encoding: 'utf-8' });
          await rename(tempPath, target);
        } catch (error) {
          await unlink(tempPath).catch(() => undefined);
          throw error;
        }
      } else {
        await writeFile(target, content, { encoding: 'utf-8' });
      }
      return ok(undefined);
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(resolve(path));
      return true;
    } catch {
      return false;
    }
  }

  join(...paths: string[]): string {
    return join(...paths);
  }

  resolve(...paths: string[]): string {
    return resolve(...paths);
  }
}
