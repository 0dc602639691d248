/**
 * Restore Command
 *
 * Restores every volume under an input directory and reports the outcome.
 * Pure function with dependency injection.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliOutput, CliResult, CliSection } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import type { AppError } from '../../errors/app-error.js';
import { formatAppError } from '../../errors/formatter.js';
import type { RestoreReport, VolumeReport } from '../../application/use-cases/restore-volumes.js';
import { describeVolumeHeader } from '../../core/format/describe.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface RestoreCommandDeps {
  readonly restore: (inputRoot: string) => ResultAsync<RestoreReport, AppError>;
}

export interface RestoreCommandOptions {
  readonly outputDir: string;
  readonly verbose?: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeRestoreCommand(
  inputRoot: string,
  deps: RestoreCommandDeps,
  options: RestoreCommandOptions
): Promise<CliResult> {
  const result = await deps.restore(inputRoot);

  if (result.isErr()) {
    const error = result.error;
    if (error._tag === 'ConfigInvalid') {
      return misuse(error.message, error.issues.map((i) => `${i.path}: ${i.message}`));
    }
    return failure(`Restore of ${inputRoot} failed`, {
      details: [formatAppError(error)],
      suggestions: error._tag === 'VolumeFormatInvalid'
        ? ['Run without --abort-on-bad-header to skip unrecognized volumes']
        : undefined,
    });
  }

  return success(summarizeReport(result.value, options));
}

export function summarizeReport(report: RestoreReport, options: RestoreCommandOptions): CliOutput {
  const loaded = report.volumes.filter((v) => v.kind === 'loaded').length;
  const rejected = report.volumes.length - loaded;

  const details = [
    `Volumes: ${loaded} loaded, ${rejected} rejected`,
    `Files written: ${report.written.length}`,
    `Fragments skipped: ${report.skipped.length}`,
    `Duplicate fragments: ${report.duplicates.length}`,
    `Unfinished files: ${report.unfinished.length}`,
    `Output: ${options.outputDir}`,
  ];

  const sections: CliSection[] = [];
  if (options.verbose) {
    sections.push({ title: 'Volumes', lines: report.volumes.map(describeVolumeReport) });
    sections.push({
      title: 'Written',
      lines: report.written.map((w) =>
        w.parts === 1 ? `${w.logicalPath} as ${w.outputPath}` : `${w.logicalPath} (${w.parts} parts) as ${w.outputPath}`
      ),
    });
  }
  sections.push({
    title: 'Unfinished files',
    lines: report.unfinished.map(
      (u) => `${u.logicalPath} (${u.fragmentCount} fragment(s), seq ${u.sequences.join(', ')})`
    ),
  });

  const warnings = [
    ...report.volumes.flatMap((v) => (v.kind === 'rejected' ? [`${v.headerPath}: ${v.error.message}`] : [])),
    ...report.skipped.map((s) => `skipped ${s.filePath}: ${s.reasons.join(', ')}`),
    ...report.inconsistencies.map((i) => `${i.logicalPath}: ${i.details.join(', ')}`),
    ...report.contentWarnings,
    ...report.failures.map((f) => `${f.path}: ${f.message}`),
  ];

  return {
    message: `Restored ${report.written.length} file(s) from ${loaded} volume(s)`,
    details,
    sections,
    warnings,
  };
}

function describeVolumeReport(volume: VolumeReport): string {
  switch (volume.kind) {
    case 'loaded':
      return `${volume.headerPath} ${describeVolumeHeader(volume.header)} (${volume.fragmentFiles} files)`;
    case 'rejected':
      return `${volume.headerPath} rejected: ${volume.error.message}`;
  }
}
