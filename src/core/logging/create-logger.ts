import pino from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory } from './types.js';
import { resolveLogLevel } from './types.js';

/**
 * Root pino logger.
 *
 * JSON lines on stderr (fd 2, sync) so that stdout stays free for the
 * human-readable restore report.
 */
function createRootLogger(): Logger {
  return pino(
    {
      name: 'backup-restore',
      level: resolveLogLevel(process.env['BACKUP_RESTORE_LOG_LEVEL']),
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger();
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
