import * as path from 'path';
import type { ResultAsync } from 'neverthrow';
import { errAsync } from 'neverthrow';
import type { FsError, RestoreWritePort } from '../../ports/fs.port.js';
import type { Logger } from '../logging/types.js';
import { bytesEqual } from '../format/byte-reader.js';
import type { OutputPathError } from './output-path.js';
import { normalizeOutputPath } from './output-path.js';

export type WriteError = FsError | OutputPathError;

export interface WriteOutcome {
  readonly logicalPath: string;
  /** Relative to the output root, `/`-separated */
  readonly outputPath: string;
  readonly absolutePath: string;
  readonly bytesWritten: number;
  /** Set when this run already wrote different bytes to the same output path */
  readonly warning?: string;
}

export interface RestoreWriterOptions {
  readonly outputRoot: string;
}

/**
 * Persists assembled files under the output root.
 *
 * Remembers what it wrote during the run. Two logical paths that normalize
 * to the same output path (e.g. differing only in case) with different
 * bytes produce a warning; the later write wins.
 */
export class RestoreWriter {
  private readonly written = new Map<string, Uint8Array>();

  constructor(
    private readonly fs: RestoreWritePort,
    private readonly options: RestoreWriterOptions,
    private readonly logger: Logger
  ) {}

  write(logicalPath: string, content: Uint8Array): ResultAsync<WriteOutcome, WriteError> {
    const normalized = normalizeOutputPath(logicalPath);
    if (normalized.isErr()) {
      this.logger.warn({ logicalPath, reason: normalized.error.message }, 'refusing to write file');
      return errAsync(normalized.error);
    }

    const outputPath = normalized.value;
    const absolutePath = path.join(this.options.outputRoot, ...outputPath.split('/'));

    return this.fs
      .mkdirp(path.dirname(absolutePath))
      .andThen(() => this.fs.writeFileBytes(absolutePath, content))
      .map(() => {
        const warning = this.remember(outputPath, content);
        this.logger.debug({ logicalPath, outputPath, bytes: content.length }, 'file written');
        return {
          logicalPath,
          outputPath,
          absolutePath,
          bytesWritten: content.length,
          ...(warning !== undefined ? { warning } : {}),
        };
      });
  }

  private remember(outputPath: string, content: Uint8Array): string | undefined {
    const before = this.written.get(outputPath);
    this.written.set(outputPath, content);

    if (before === undefined || bytesEqual(before, content)) {
      return undefined;
    }

    this.logger.warn({ outputPath }, 'content changed on rewrite');
    return `content changed on ${outputPath}`;
  }
}
