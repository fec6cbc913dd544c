import { pino, destination, type Logger as PinoLogger } from 'pino';
import { LOG_LEVELS, silentLogger, type Logger, type LogLevel } from './types.js';

export interface LoggerOptions {
  level?: LogLevel;
  /** File descriptor to write to; defaults to stderr so CLI output stays clean */
  fd?: number;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Level from PIXELVERDICT_LOG_LEVEL, if it names a known level.
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel | undefined {
  const value = env.PIXELVERDICT_LOG_LEVEL;
  return isLogLevel(value) ? value : undefined;
}

function bind(base: PinoLogger, level: Exclude<LogLevel, 'silent'>): Logger['info'] {
  return (contextOrMessage, message) => {
    if (typeof contextOrMessage === 'string') {
      base[level](contextOrMessage);
    } else {
      base[level](contextOrMessage, message ?? '');
    }
  };
}

/**
 * Creates a structured logger with context support.
 *
 * @example
 * ```ts
 * const logger = createLogger({ module: 'screenshots' }, { level: 'debug' });
 * logger.info({ path }, 'Saved diff image');
 * ```
 */
export function createLogger(
  context: Record<string, unknown> = {},
  options: LoggerOptions = {}
): Logger {
  const level = options.level ?? levelFromEnv() ?? 'info';

  if (level === 'silent') {
    return silentLogger;
  }

  const base = pino({ level, base: context }, destination(options.fd ?? 2));

  return {
    debug: bind(base, 'debug'),
    info: bind(base, 'info'),
    warn: bind(base, 'warn'),
    error: bind(base, 'error'),
  };
}
