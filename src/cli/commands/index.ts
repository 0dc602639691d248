/**
 * CLI Commands - Public API
 */

export {
  executeRestoreCommand,
  summarizeReport,
  type RestoreCommandDeps,
  type RestoreCommandOptions,
} from './restore.js';
export { executeInspectCommand, type InspectCommandDeps } from './inspect.js';
