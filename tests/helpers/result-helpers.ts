/**
 * Unwrap Results in tests, failing with the full payload when the variant is wrong.
 */

import type { Result } from 'neverthrow';

export function expectOk<T, E>(result: Result<T, E>, context: string): T {
  if (result.isErr()) {
    throw new Error(`Expected Ok in ${context}, but got Err:\n${JSON.stringify(result.error, null, 2)}`);
  }
  return result.value;
}

export function expectErr<T, E>(result: Result<T, E>, context: string): E {
  if (result.isOk()) {
    throw new Error(`Expected Err in ${context}, but got Ok:\n${JSON.stringify(result.value, null, 2)}`);
  }
  return result.error;
}
