import * as path from 'path';
import type { ResultAsync } from 'neverthrow';
import { okAsync } from 'neverthrow';
import type { VolumeReadPort } from '../../ports/fs.port.js';
import type { AppError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import { decodeVolumeHeader } from '../../core/format/volume-header.js';
import { decodeFragment } from '../../core/format/fragment-record.js';
import { describeFragment, describeVolumeHeader } from '../../core/format/describe.js';
import type { DiscoveryRules } from '../discovery/volume-discovery.js';
import { isIgnoredName, walkFiles } from '../discovery/volume-discovery.js';

export type RecordKind = 'header' | 'fragment' | 'unreadable';

export interface RecordDescription {
  readonly filePath: string;
  readonly kind: RecordKind;
  readonly description: string;
}

/**
 * Describe every record under `root` without restoring anything.
 * Handy for checking a set of volumes before a restore.
 */
export function inspectRecords(
  fs: VolumeReadPort,
  root: string,
  rules: DiscoveryRules
): ResultAsync<readonly RecordDescription[], AppError> {
  return walkFiles(fs, root)
    .mapErr((e) => Err.ioFailed('scan', root, e.code, e.message))
    .andThen((files) =>
      files
        .filter((file) => !isIgnoredName(path.basename(file), rules))
        .reduce<ResultAsync<readonly RecordDescription[], AppError>>(
          (acc, file) => acc.andThen((done) => describeFile(fs, file, rules).map((entry) => [...done, entry])),
          okAsync([])
        )
    );
}

function describeFile(fs: VolumeReadPort, filePath: string, rules: DiscoveryRules): ResultAsync<RecordDescription, never> {
  const isHeader = path.basename(filePath) === rules.headerFileName;

  return fs
    .readFileBytes(filePath)
    .map((bytes): RecordDescription => {
      if (!isHeader) {
        return { filePath, kind: 'fragment', description: describeFragment(decodeFragment(bytes)) };
      }
      return decodeVolumeHeader(bytes).match(
        (header): RecordDescription => ({ filePath, kind: 'header', description: describeVolumeHeader(header) }),
        (e): RecordDescription => ({ filePath, kind: 'header', description: `unrecognized header: ${e.message}` })
      );
    })
    .orElse((e) => okAsync<RecordDescription, never>({ filePath, kind: 'unreadable', description: e.message }));
}
