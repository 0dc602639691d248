/**
 * CLI Result Types
 *
 * Commands return these; the composition root prints and exits.
 */

import type { ExitCode } from './exit-code.js';

/**
 * A report section, e.g. "Unfinished files" followed by one line per file.
 */
export interface CliSection {
  readonly title: string;
  readonly lines: readonly string[];
}

export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly sections?: readonly CliSection[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

export type CliResult =
  | { kind: 'success'; output?: CliOutput }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function failure(
  message: string,
  options?: {
    exitCode?: ExitCode;
    details?: readonly string[];
    suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      suggestions: options?.suggestions,
    },
  };
}

/**
 * Bad arguments or bad configuration.
 */
export function misuse(message: string, details?: readonly string[], suggestions?: readonly string[]): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'misuse' },
    output: { message, details, suggestions },
  };
}
