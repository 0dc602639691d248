/**
 * Application error hierarchy.
 *
 * Errors are data: tagged, readonly, and handled exhaustively by the
 * formatter. Per-record problems (warnings on a decoded record, skipped
 * fragments, unfinished files) are not errors and never appear here.
 */

import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/** A volume identification record could not be decoded at all. */
export type VolumeFormatInvalidError = Readonly<{
  readonly _tag: 'VolumeFormatInvalid';
  readonly headerPath: string;
  readonly code: string;
  readonly message: string;
}>;

export type IoFailedError = Readonly<{
  readonly _tag: 'IoFailed';
  readonly operation: string;
  readonly path: string;
  readonly code: string;
  readonly message: string;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly operation: string;
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError =
  | ConfigInvalidError
  | VolumeFormatInvalidError
  | IoFailedError
  | UnexpectedError;

/**
 * Marks config that came out of `loadConfig` (or an explicit test constructor),
 * so raw objects cannot be passed where validated config is required.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
