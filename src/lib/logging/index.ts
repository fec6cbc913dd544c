/**
 * Logging Module
 *
 * Loggers are created explicitly and handed to the components that
 * use them; nothing here holds a shared instance.
 */

export { createLogger, isLogLevel, levelFromEnv, type LoggerOptions } from './logger.js';
export { silentLogger, LOG_LEVELS, type Logger, type LogLevel } from './types.js';
