export type * from './app-error.js';
export { Err } from './factories.js';
export { formatAppError } from './formatter.js';
