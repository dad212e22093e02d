/**
 * In-memory FileSystem implementation
 * For testing - keeps files in a map keyed by absolute path
 */

import { resolve, join, dirname, isAbsolute } from 'path';
import { FileSystem, WriteOptions, FileSystemError, createFileSystemError } from '../types/file-system';
import { Result, ok, err } from '../types/result';

export class MemoryFileSystem implements FileSystem {
  private readonly files = new Map<string, string>();
  private readonly directories = new Set<string>();
  private readonly basePath: string;

  constructor(basePath: string = '/') {
    this.basePath = resolve(basePath);
    this.directories.add(this.basePath);
  }

  private normalizePath(path: string): string {
    return resolve(isAbsolute(path) ? path : join(this.basePath, path));
  }

  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    const normalized = this.normalizePath(path);
    if (this.directories.has(normalized)) {
      return err(createFileSystemError('NOT_A_FILE', path));
    }
    const content = this.files.get(normalized);
    if (content === undefined) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    return ok(content);
  }

  async writeFile(path: string, content: string, options?: WriteOptions): Promise<Result<void, FileSystemError>> {
    const normalized = this.normalizePath(path);
    if (this.directories.has(normalized)) {
      return err(createFileSystemError('NOT_A_FILE', path));
    }
    const parent = dirname(normalized);
    if (!this.directories.has(parent)) {
      if (!options?.createParents) {
        return err(createFileSystemError('NOT_FOUND', path, 'Parent directory does not exist'));
      }
      this.addDirectory(parent);
    }
    this.files.set(normalized, content);
    return ok(undefined);
  }

  async exists(path: string): Promise<boolean> {
    const normalized = this.normalizePath(path);
    return this.files.has(normalized) || this.directories.has(normalized);
  }

  join(...paths: string[]): string {
    return join(...paths);
  }

  resolve(...paths: string[]): string {
    return resolve(this.basePath, ...paths);
  }

  // ===========================================================================
  // Test helpers
  // ===========================================================================

  /**
   * Seed a file, creating its parent directories
   */
  setFile(path: string, content: string): void {
    const normalized = this.normalizePath(path);
    this.addDirectory(dirname(normalized));
    this.files.set(normalized, content);
  }

  getFile(path: string): string | undefined {
    return this.files.get(this.normalizePath(path));
  }

  listFiles(): string[] {
    return [...this.files.keys()].sort();
  }

  private addDirectory(path: string): void {
    let current = path;
    while (!this.directories.has(current)) {
      this.directories.add(current);
      const parent = dirname(current);
      if (parent === current) {
        break;
      }
      current = parent;
    }
  }
}
