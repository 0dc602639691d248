/**
 * Library entrypoint: decoders, assembler, writer and use cases for
 * restoring split legacy backups.
 */

import 'reflect-metadata';

export * from './core/format/index.js';
export * from './core/assembly/index.js';
export * from './core/output/index.js';

export type { FileSystemPort, VolumeReadPort, RestoreWritePort, FsError, DirEntry } from './ports/fs.port.js';
export { NodeFileSystem } from './infra/local/fs/index.js';

export {
  findVolumeHeaders,
  listFragmentFiles,
  walkFiles,
  type DiscoveryRules,
} from './application/discovery/volume-discovery.js';
export {
  restoreVolumes,
  type RestoreReport,
  type RestoreVolumesPorts,
  type RestoreVolumesOptions,
  type VolumeReport,
} from './application/use-cases/restore-volumes.js';
export { inspectRecords, type RecordDescription } from './application/use-cases/inspect-records.js';

export { loadConfig, type AppConfig, type ValidatedConfig, type BadHeaderPolicy } from './config/app-config.js';
export type { AppError, ConfigInvalidError, IoFailedError, VolumeFormatInvalidError } from './errors/index.js';
export { Err, formatAppError } from './errors/index.js';
export type { Logger, ILoggerFactory } from './core/logging/types.js';
export { PinoLoggerFactory } from './core/logging/create-logger.js';
