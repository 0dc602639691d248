import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';

export type OutputPathError = {
  readonly code: 'OUTPUT_PATH_INVALID';
  readonly logicalPath: string;
  readonly message: string;
};

/**
 * Map a logical path from the backup to a relative output path:
 * lower-cased, `\` turned into `/`, one leading `/` removed.
 *
 * Rejects paths that would be empty or would climb out of the output root.
 */
export function normalizeOutputPath(logicalPath: string): Result<string, OutputPathError> {
  let normalized = logicalPath.toLowerCase().replace(/\\/g, '/');
  if (normalized.startsWith('/')) {
    normalized = normalized.slice(1);
  }

  if (normalized.length === 0 || normalized.endsWith('/')) {
    return err({ code: 'OUTPUT_PATH_INVALID', logicalPath, message: `no file name in "${logicalPath}"` });
  }
  if (normalized.startsWith('/') || normalized.split('/').includes('..')) {
    return err({ code: 'OUTPUT_PATH_INVALID', logicalPath, message: `"${logicalPath}" escapes the output root` });
  }

  return ok(normalized);
}
