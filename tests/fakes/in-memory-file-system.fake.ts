/**
 * In-memory fake for the filesystem port.
 *
 * - Files and directories live in maps keyed by absolute POSIX path
 * - Adding a file creates its parent directories
 * - writeFileBytes requires the parent directory, like the real thing
 * - Individual paths can be made to fail with a chosen error code
 */

import * as path from 'path';
import { okAsync, errAsync, type ResultAsync } from 'neverthrow';
import type { DirEntry, FileSystemPort, FsError } from '../../src/ports/fs.port.js';

export class InMemoryFileSystem implements FileSystemPort {
  private readonly files = new Map<string, Uint8Array>();
  private readonly dirs = new Set<string>(['/']);
  private readonly failures = new Map<string, FsError>();
  readonly writes: string[] = [];

  // ═══════════════════════════════════════════════════════════════════
  // Arrangement helpers
  // ═══════════════════════════════════════════════════════════════════

  addFile(filePath: string, bytes: Uint8Array): this {
    this.addDir(path.dirname(filePath));
    this.files.set(filePath, new Uint8Array(bytes));
    return this;
  }

  addDir(dirPath: string): this {
    let current = dirPath;
    while (!this.dirs.has(current)) {
      this.dirs.add(current);
      current = path.dirname(current);
    }
    return this;
  }

  failOn(targetPath: string, error: FsError): this {
    this.failures.set(targetPath, error);
    return this;
  }

  fileAt(filePath: string): Uint8Array | undefined {
    return this.files.get(filePath);
  }

  hasDir(dirPath: string): boolean {
    return this.dirs.has(dirPath);
  }

  // ═══════════════════════════════════════════════════════════════════
  // Port
  // ═══════════════════════════════════════════════════════════════════

  readdir(dirPath: string): ResultAsync<readonly DirEntry[], FsError> {
    const failure = this.failures.get(dirPath);
    if (failure) return errAsync(failure);
    if (this.files.has(dirPath)) {
      return errAsync({ code: 'FS_NOT_A_DIRECTORY', message: `Not a directory: ${dirPath}` });
    }
    if (!this.dirs.has(dirPath)) {
      return errAsync({ code: 'FS_NOT_FOUND', message: `Not found: ${dirPath}` });
    }

    const entries: DirEntry[] = [];
    for (const dir of this.dirs) {
      if (dir !== dirPath && path.dirname(dir) === dirPath) {
        entries.push({ name: path.basename(dir), kind: 'directory' });
      }
    }
    for (const file of this.files.keys()) {
      if (path.dirname(file) === dirPath) {
        entries.push({ name: path.basename(file), kind: 'file' });
      }
    }
    // Reverse insertion order so callers cannot rely on listing order.
    return okAsync(entries.reverse());
  }

  readFileBytes(filePath: string): ResultAsync<Uint8Array, FsError> {
    const failure = this.failures.get(filePath);
    if (failure) return errAsync(failure);

    const file = this.files.get(filePath);
    if (!file) {
      return errAsync({ code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` });
    }
    return okAsync(new Uint8Array(file));
  }

  mkdirp(dirPath: string): ResultAsync<void, FsError> {
    const failure = this.failures.get(dirPath);
    if (failure) return errAsync(failure);
    if (this.files.has(dirPath)) {
      return errAsync({ code: 'FS_IO_ERROR', message: `Path exists and is not a directory: ${dirPath}` });
    }
    this.addDir(dirPath);
    return okAsync(undefined);
  }

  writeFileBytes(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError> {
    const failure = this.failures.get(filePath);
    if (failure) return errAsync(failure);
    if (!this.dirs.has(path.dirname(filePath))) {
      return errAsync({ code: 'FS_NOT_FOUND', message: `Parent directory does not exist: ${filePath}` });
    }
    this.files.set(filePath, new Uint8Array(bytes));
    this.writes.push(filePath);
    return okAsync(undefined);
  }
}
