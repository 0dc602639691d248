export type { ExitCode } from './exit-code.js';
export { toProcessExit, toNumericExitCode } from './exit-code.js';

export type { CliOutput, CliResult, CliSection } from './cli-result.js';
export { success, failure, misuse } from './cli-result.js';
