import * as path from 'path';
import type { Result } from 'neverthrow';
import { ok, err, ResultAsync } from 'neverthrow';
import type { FsError, VolumeReadPort } from '../../ports/fs.port.js';
import type { Logger } from '../../core/logging/types.js';
import type { AppError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import type { BadHeaderPolicy } from '../../config/app-config.js';
import type { VolumeHeader, HeaderDecodeError } from '../../core/format/volume-header.js';
import { decodeVolumeHeader } from '../../core/format/volume-header.js';
import { decodeFragment } from '../../core/format/fragment-record.js';
import type { FragmentAssembler, AssembledFile, UnfinishedFile } from '../../core/assembly/fragment-assembler.js';
import type { RestoreWriter } from '../../core/output/restore-writer.js';
import type { DiscoveryRules } from '../discovery/volume-discovery.js';
import { findVolumeHeaders, listFragmentFiles } from '../discovery/volume-discovery.js';
import { assertNever } from '../../runtime/assert-never.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type VolumeReport =
  | {
      readonly kind: 'loaded';
      readonly headerPath: string;
      readonly header: VolumeHeader;
      readonly fragmentFiles: number;
    }
  | {
      readonly kind: 'rejected';
      readonly headerPath: string;
      readonly error: HeaderDecodeError | FsError;
    };

export interface WrittenFileReport {
  readonly logicalPath: string;
  readonly outputPath: string;
  readonly parts: number;
  readonly bytes: number;
}

export interface SkippedFragmentReport {
  readonly filePath: string;
  readonly logicalPath: string;
  readonly reasons: readonly string[];
}

export interface DuplicateFragmentReport {
  readonly filePath: string;
  readonly logicalPath: string;
  readonly sequence: number;
}

export interface InconsistencyReport {
  readonly filePath: string;
  readonly logicalPath: string;
  readonly details: readonly string[];
}

/** A fragment file that could not be read, or an assembled file that could not be written. */
export interface FileFailureReport {
  readonly path: string;
  readonly code: string;
  readonly message: string;
}

export interface RestoreReport {
  readonly volumes: readonly VolumeReport[];
  readonly written: readonly WrittenFileReport[];
  readonly skipped: readonly SkippedFragmentReport[];
  readonly duplicates: readonly DuplicateFragmentReport[];
  readonly inconsistencies: readonly InconsistencyReport[];
  readonly contentWarnings: readonly string[];
  readonly failures: readonly FileFailureReport[];
  readonly unfinished: readonly UnfinishedFile[];
}

export interface RestoreVolumesPorts {
  readonly fs: VolumeReadPort;
  /** Fresh per run: reassembly state must not leak between runs */
  readonly assembler: FragmentAssembler;
  readonly writer: RestoreWriter;
  readonly logger: Logger;
}

export interface RestoreVolumesOptions {
  readonly discovery: DiscoveryRules;
  readonly badHeader: BadHeaderPolicy;
}

interface MutableReport {
  volumes: VolumeReport[];
  written: WrittenFileReport[];
  skipped: SkippedFragmentReport[];
  duplicates: DuplicateFragmentReport[];
  inconsistencies: InconsistencyReport[];
  contentWarnings: string[];
  failures: FileFailureReport[];
}

// ═══════════════════════════════════════════════════════════════════════════
// USE CASE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Restore every volume found under `inputRoot`.
 *
 * Volumes are taken in header-path order, fragments within a volume in
 * file-path order, one at a time. Only a missing/unreadable input tree, or
 * a bad header under the `abort_run` policy, fails the run; everything else
 * ends up in the report.
 */
export function restoreVolumes(
  inputRoot: string,
  ports: RestoreVolumesPorts,
  options: RestoreVolumesOptions
): ResultAsync<RestoreReport, AppError> {
  return ResultAsync.fromPromise(runRestore(inputRoot, ports, options), (e) =>
    Err.unexpected('restore', e)
  ).andThen((result) => result);
}

async function runRestore(
  inputRoot: string,
  ports: RestoreVolumesPorts,
  options: RestoreVolumesOptions
): Promise<Result<RestoreReport, AppError>> {
  const { fs, logger } = ports;
  const report: MutableReport = {
    volumes: [],
    written: [],
    skipped: [],
    duplicates: [],
    inconsistencies: [],
    contentWarnings: [],
    failures: [],
  };

  const headers = await findVolumeHeaders(fs, inputRoot, options.discovery);
  if (headers.isErr()) {
    return err(Err.ioFailed('scan', inputRoot, headers.error.code, headers.error.message));
  }
  logger.info({ inputRoot, volumes: headers.value.length }, 'volumes discovered');

  for (const headerPath of headers.value) {
    const loaded = await loadVolumeHeader(fs, headerPath);
    if (loaded.isErr()) {
      const error = loaded.error;
      logger.warn({ headerPath, code: error.code, reason: error.message }, 'volume header rejected');

      switch (options.badHeader.kind) {
        case 'abort_run':
          return err(
            isFsError(error)
              ? Err.ioFailed('read', headerPath, error.code, error.message)
              : Err.volumeFormatInvalid(headerPath, error.code, error.message)
          );
        case 'skip_volume':
          report.volumes.push({ kind: 'rejected', headerPath, error });
          continue;
        default:
          return assertNever(options.badHeader);
      }
    }

    const volumeDir = path.dirname(headerPath);
    const files = await listFragmentFiles(fs, volumeDir, options.discovery);
    if (files.isErr()) {
      return err(Err.ioFailed('scan', volumeDir, files.error.code, files.error.message));
    }

    report.volumes.push({ kind: 'loaded', headerPath, header: loaded.value, fragmentFiles: files.value.length });
    logger.info({ headerPath, sequence: loaded.value.sequence, files: files.value.length }, 'volume loaded');

    for (const filePath of files.value) {
      await processFragmentFile(filePath, ports, report);
    }
  }

  const unfinished = ports.assembler.unfinished();
  if (unfinished.length > 0) {
    logger.info({ count: unfinished.length }, 'unfinished files remain');
  }

  return ok({ ...report, unfinished });
}

function loadVolumeHeader(
  fs: VolumeReadPort,
  headerPath: string
): ResultAsync<VolumeHeader, HeaderDecodeError | FsError> {
  return fs.readFileBytes(headerPath).andThen((bytes) => decodeVolumeHeader(bytes));
}

async function processFragmentFile(filePath: string, ports: RestoreVolumesPorts, report: MutableReport): Promise<void> {
  const bytes = await ports.fs.readFileBytes(filePath);
  if (bytes.isErr()) {
    ports.logger.warn({ filePath, code: bytes.error.code }, 'fragment unreadable');
    report.failures.push({ path: filePath, code: bytes.error.code, message: bytes.error.message });
    return;
  }

  const fragment = decodeFragment(bytes.value);
  const outcome = ports.assembler.accept(fragment);

  switch (outcome.kind) {
    case 'skipped':
      ports.logger.warn({ filePath, reasons: outcome.reasons }, 'fragment skipped');
      report.skipped.push({ filePath, logicalPath: fragment.logicalPath, reasons: outcome.reasons });
      return;

    case 'duplicate':
      ports.logger.info({ filePath, logicalPath: fragment.logicalPath }, 'fragment for completed file ignored');
      report.duplicates.push({ filePath, logicalPath: fragment.logicalPath, sequence: fragment.sequence });
      return;

    case 'pending':
      noteInconsistencies(filePath, outcome.logicalPath, outcome.inconsistencies, ports.logger, report);
      return;

    case 'completed':
      noteInconsistencies(filePath, outcome.file.logicalPath, outcome.inconsistencies, ports.logger, report);
      await writeAssembled(outcome.file, ports, report);
      return;

    default:
      return assertNever(outcome);
  }
}

async function writeAssembled(file: AssembledFile, ports: RestoreVolumesPorts, report: MutableReport): Promise<void> {
  const written = await ports.writer.write(file.logicalPath, file.content);
  if (written.isErr()) {
    report.failures.push({ path: file.logicalPath, code: written.error.code, message: written.error.message });
    return;
  }

  report.written.push({
    logicalPath: file.logicalPath,
    outputPath: written.value.outputPath,
    parts: file.fragments.length,
    bytes: written.value.bytesWritten,
  });
  if (written.value.warning !== undefined) {
    report.contentWarnings.push(written.value.warning);
  }
}

function noteInconsistencies(
  filePath: string,
  logicalPath: string,
  details: readonly string[],
  logger: Logger,
  report: MutableReport
): void {
  if (details.length === 0) return;
  logger.warn({ filePath, logicalPath, details }, 'inconsistent fragment set');
  report.inconsistencies.push({ filePath, logicalPath, details });
}

function isFsError(error: HeaderDecodeError | FsError): error is FsError {
  return error.code.startsWith('FS_');
}
