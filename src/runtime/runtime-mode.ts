/**
 * How the current process was started.
 * Injected through DI rather than sniffed from env vars deep inside services.
 */
export type RuntimeMode =
  | { readonly kind: 'cli' }
  | { readonly kind: 'test' };
