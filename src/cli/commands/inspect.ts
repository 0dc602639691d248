/**
 * Inspect Command
 *
 * Prints one line per record found under a directory.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { AppError } from '../../errors/app-error.js';
import { formatAppError } from '../../errors/formatter.js';
import type { RecordDescription } from '../../application/use-cases/inspect-records.js';

export interface InspectCommandDeps {
  readonly inspect: (root: string) => ResultAsync<readonly RecordDescription[], AppError>;
}

export async function executeInspectCommand(root: string, deps: InspectCommandDeps): Promise<CliResult> {
  const result = await deps.inspect(root);

  if (result.isErr()) {
    return failure(`Cannot inspect ${root}`, { details: [formatAppError(result.error)] });
  }

  const records = result.value;
  if (records.length === 0) {
    return success({
      message: `No records found in ${root}`,
      suggestions: ['Point the command at a directory holding volume copies'],
    });
  }

  const headers = records.filter((r) => r.kind === 'header').length;
  return success({
    message: `${records.length} record(s), ${headers} volume header(s)`,
    sections: [{ title: 'Records', lines: records.map((r) => `${r.filePath} ${r.description}`) }],
  });
}
