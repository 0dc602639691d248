/**
 * Port for ending the current process.
 * Only composition roots (the CLI entrypoint) may use it.
 */
export type ProcessExit =
  | { readonly kind: 'success' }
  | { readonly kind: 'failure' }
  | { readonly kind: 'misuse' };

export interface ProcessTerminator {
  terminate(exit: ProcessExit): never;
}
