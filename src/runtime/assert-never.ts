/**
 * Exhaustiveness helper for discriminated unions.
 * Put it in the `default` branch of a `switch` so a new union member fails to compile.
 */
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
