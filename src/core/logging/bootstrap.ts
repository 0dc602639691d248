import pino from 'pino';
import type { Logger } from './types.js';
import { resolveLogLevel } from './types.js';

/**
 * Logger for code that runs before the DI container exists
 * (config loading, container initialization).
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = pino(
      {
        name: 'backup-restore',
        level: resolveLogLevel(process.env['BACKUP_RESTORE_LOG_LEVEL']),
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
