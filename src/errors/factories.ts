/**
 * Error factories. One constructor per tag keeps messages consistent.
 */

import type {
  ConfigInvalidError,
  ConfigIssue,
  IoFailedError,
  UnexpectedError,
  VolumeFormatInvalidError,
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Configuration invalid',
  }),

  volumeFormatInvalid: (headerPath: string, code: string, details: string): VolumeFormatInvalidError => ({
    _tag: 'VolumeFormatInvalid',
    headerPath,
    code,
    message: `Unrecognized volume header ${headerPath}: ${details}`,
  }),

  ioFailed: (operation: string, path: string, code: string, details: string): IoFailedError => ({
    _tag: 'IoFailed',
    operation,
    path,
    code,
    message: `Failed to ${operation} ${path}: ${details}`,
  }),

  unexpected: (operation: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    operation,
    cause,
    message: `Unexpected error during ${operation}`,
  }),
};
