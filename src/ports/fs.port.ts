import type { ResultAsync } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_NOT_A_DIRECTORY'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string };

export type DirEntryKind = 'file' | 'directory' | 'other';

export interface DirEntry {
  readonly name: string;
  readonly kind: DirEntryKind;
}

/**
 * Port: reading volume trees.
 * Used by: volume discovery, restore orchestrator, record inspector.
 */
export interface VolumeReadPort {
  /** Entries of one directory (names, not full paths), in no particular order. */
  readdir(dirPath: string): ResultAsync<readonly DirEntry[], FsError>;
  readFileBytes(filePath: string): ResultAsync<Uint8Array, FsError>;
}

/**
 * Port: writing restored files.
 * Used by: restore writer.
 */
export interface RestoreWritePort {
  /** Create a directory and its parents; an existing directory is not an error. */
  mkdirp(dirPath: string): ResultAsync<void, FsError>;
  writeFileBytes(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError>;
}

export interface FileSystemPort extends VolumeReadPort, RestoreWritePort {}
