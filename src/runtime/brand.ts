/**
 * Brand helper for "parse, don't validate".
 *
 * A branded value proves it came through a parser at a boundary (config,
 * CLI arguments). Brands are erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
