import type { ProcessExit } from '../../runtime/ports/process-terminator.js';

/**
 * Typed exit codes for CLI commands (Unix conventions).
 */
export type ExitCode =
  | { kind: 'success' }        // 0 - run completed (warnings included)
  | { kind: 'general_error' }  // 1 - run could not complete
  | { kind: 'misuse' };        // 2 - bad arguments or configuration

export function toProcessExit(exitCode: ExitCode): ProcessExit {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
      return { kind: 'failure' };
    case 'misuse':
      return { kind: 'misuse' };
  }
}

/**
 * Numeric value for raw process.exit(), for use before the container exists.
 */
export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
  }
}
