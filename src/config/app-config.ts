/**
 * Application configuration: parse, don't validate.
 *
 * - One zod schema is the whole config surface
 * - Parsing happens once, at the boundary, and yields branded values
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';

// =============================================================================
// Branded primitives
// =============================================================================

export type OutputDir = Brand<string, 'OutputDir'>;
export type HeaderFileName = Brand<string, 'HeaderFileName'>;

/** What to do when a volume identification record cannot be decoded. */
export type BadHeaderPolicy = { readonly kind: 'skip_volume' } | { readonly kind: 'abort_run' };

export interface AppConfig {
  readonly paths: { readonly outputDir: OutputDir };
  readonly discovery: {
    readonly headerFileName: HeaderFileName;
    readonly ignoredFileNames: readonly string[];
    readonly ignoredSuffixes: readonly string[];
  };
  readonly policy: { readonly badHeader: BadHeaderPolicy };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

export const DEFAULT_HEADER_FILE_NAME = 'BACKUPID.@@@';

// =============================================================================
// Schema
// =============================================================================

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) =>
      v
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    );

const EnvSchema = z.object({
  BACKUP_RESTORE_OUTPUT_DIR: z.string().min(1, 'Output directory cannot be empty').default('.'),

  BACKUP_RESTORE_HEADER_FILE: z
    .string()
    .min(1, 'Header file name cannot be empty')
    .refine((v) => !v.includes('/') && !v.includes('\\'), 'Header file name must not contain path separators')
    .default(DEFAULT_HEADER_FILE_NAME),

  BACKUP_RESTORE_IGNORE_FILES: commaList('cmd.sh'),
  BACKUP_RESTORE_IGNORE_SUFFIXES: commaList('.img'),

  BACKUP_RESTORE_ON_BAD_HEADER: z.enum(['skip_volume', 'abort_run']).default('skip_volume'),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(createValidatedConfig(buildConfig(parsed.data)));
}

export interface ConfigOverrides {
  readonly outputDir?: string;
  readonly badHeader?: BadHeaderPolicy;
}

/**
 * Apply command-line overrides on top of validated config.
 * An empty output dir is ignored rather than trusted.
 */
export function withOverrides(config: ValidatedConfig, overrides: ConfigOverrides): ValidatedConfig {
  return createValidatedConfig({
    ...config,
    paths: {
      outputDir: overrides.outputDir ? toOutputDir(overrides.outputDir) : config.paths.outputDir,
    },
    policy: { badHeader: overrides.badHeader ?? config.policy.badHeader },
  });
}

/**
 * Tests and local construction only: a validated config without env parsing.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function toOutputDir(value: string): OutputDir {
  return value as OutputDir;
}

function buildConfig(env: ParsedEnv): AppConfig {
  const badHeader: BadHeaderPolicy =
    env.BACKUP_RESTORE_ON_BAD_HEADER === 'abort_run' ? { kind: 'abort_run' } : { kind: 'skip_volume' };

  return {
    paths: { outputDir: toOutputDir(env.BACKUP_RESTORE_OUTPUT_DIR) },
    discovery: {
      headerFileName: env.BACKUP_RESTORE_HEADER_FILE as HeaderFileName,
      ignoredFileNames: env.BACKUP_RESTORE_IGNORE_FILES,
      ignoredSuffixes: env.BACKUP_RESTORE_IGNORE_SUFFIXES,
    },
    policy: { badHeader },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
