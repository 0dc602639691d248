/**
 * CLI Result Interpreter
 *
 * The only place where a CliResult becomes a process exit.
 */

import type { CliResult } from './types/cli-result.js';
import { toProcessExit, toNumericExitCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult } from './output-formatter.js';

export function interpretCliResult(result: CliResult, terminator: ProcessTerminator): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      // Let the process end on its own so pending stderr log lines flush.
      return;

    case 'failure':
      terminator.terminate(toProcessExit(result.exitCode));
  }
}

/**
 * For failures that happen before the container exists (bad config).
 */
export function interpretCliResultWithoutDI(result: CliResult): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      return;

    case 'failure':
      process.exit(toNumericExitCode(result.exitCode));
  }
}
