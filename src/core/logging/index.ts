export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { LOG_LEVELS, DEFAULT_LOG_LEVEL, isLogLevel, resolveLogLevel } from './types.js';

// Factory (for DI registration)
export { PinoLoggerFactory } from './create-logger.js';

// Bootstrap (for pre-DI code)
export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';
