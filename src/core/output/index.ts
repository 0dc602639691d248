export { normalizeOutputPath, type OutputPathError } from './output-path.js';
export { RestoreWriter, type RestoreWriterOptions, type WriteOutcome, type WriteError } from './restore-writer.js';
