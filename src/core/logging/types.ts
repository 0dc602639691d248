import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type: pino's own, no wrapper.
 *
 * Data-first calls:
 *   logger.info({ volume: 'disk01' }, 'volume loaded');
 *   logger.warn({ path }, 'content changed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Child logger bound to a component name */
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * BACKUP_RESTORE_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const level = raw?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : DEFAULT_LOG_LEVEL;
}
