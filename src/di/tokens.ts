/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by layer.
 *
 * Per-run objects (FragmentAssembler, RestoreWriter) are deliberately not
 * registered: each command builds fresh ones so no reassembly state outlives
 * a run.
 */
export const DI = {
  Config: {
    /** Validated application config */
    App: Symbol('Config.App'),
  },

  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  Infra: {
    /** Filesystem port (volume reads + restored file writes) */
    FileSystem: Symbol('Infra.FileSystem'),
  },

  Runtime: {
    /** Runtime mode (cli/test) */
    Mode: Symbol('Runtime.Mode'),
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },
} as const;
