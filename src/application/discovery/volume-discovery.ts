import * as path from 'path';
import type { ResultAsync } from 'neverthrow';
import { okAsync } from 'neverthrow';
import type { DirEntry, FsError, VolumeReadPort } from '../../ports/fs.port.js';

/**
 * Which files in a volume tree are records, and which one is the volume header.
 */
export interface DiscoveryRules {
  readonly headerFileName: string;
  /** Exact file names that are never records (e.g. helper scripts) */
  readonly ignoredFileNames: readonly string[];
  /** File name suffixes that are never records (e.g. disk images) */
  readonly ignoredSuffixes: readonly string[];
}

/** Plain code-unit ordering, so results do not depend on the host locale. */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function isIgnoredName(name: string, rules: DiscoveryRules): boolean {
  return rules.ignoredFileNames.includes(name) || rules.ignoredSuffixes.some((suffix) => name.endsWith(suffix));
}

/**
 * Every regular file below `root`, as full paths, sorted.
 * Directories are read one at a time.
 */
export function walkFiles(fs: VolumeReadPort, root: string): ResultAsync<readonly string[], FsError> {
  return fs.readdir(root).andThen((entries) =>
    [...entries]
      .sort((a, b) => compareCodeUnits(a.name, b.name))
      .reduce<ResultAsync<readonly string[], FsError>>(
        (acc, entry) => acc.andThen((files) => visitEntry(fs, root, entry).map((more) => [...files, ...more])),
        okAsync([])
      )
      .map((files) => [...files].sort(compareCodeUnits))
  );
}

function visitEntry(fs: VolumeReadPort, dir: string, entry: DirEntry): ResultAsync<readonly string[], FsError> {
  const fullPath = path.join(dir, entry.name);
  switch (entry.kind) {
    case 'directory':
      return walkFiles(fs, fullPath);
    case 'file':
      return okAsync([fullPath]);
    case 'other':
      return okAsync([]);
  }
}

/**
 * Paths of all volume identification records under `root`, sorted.
 * Volumes are restored in this order.
 */
export function findVolumeHeaders(
  fs: VolumeReadPort,
  root: string,
  rules: DiscoveryRules
): ResultAsync<readonly string[], FsError> {
  return walkFiles(fs, root).map((files) => files.filter((file) => path.basename(file) === rules.headerFileName));
}

/**
 * Fragment record files of one volume directory, sorted.
 */
export function listFragmentFiles(
  fs: VolumeReadPort,
  volumeDir: string,
  rules: DiscoveryRules
): ResultAsync<readonly string[], FsError> {
  return walkFiles(fs, volumeDir).map((files) =>
    files.filter((file) => {
      const name = path.basename(file);
      return name !== rules.headerFileName && !isIgnoredName(name, rules);
    })
  );
}
