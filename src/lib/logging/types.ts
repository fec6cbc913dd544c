export const LOG_LEVELS = ['silent', 'debug', 'info', 'warn', 'error'] as const;

/**
 * Log level enumeration.
 */
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Structured logger interface supporting both simple messages and context objects.
 *
 * @example
 * ```ts
 * logger.info('Comparison complete');
 * logger.warn({ reason: 'window larger than image' }, 'SSIM degraded');
 * ```
 */
export interface Logger {
  debug: (contextOrMessage: Record<string, unknown> | string, message?: string) => void;
  info: (contextOrMessage: Record<string, unknown> | string, message?: string) => void;
  warn: (contextOrMessage: Record<string, unknown> | string, message?: string) => void;
  error: (contextOrMessage: Record<string, unknown> | string, message?: string) => void;
}

/**
 * No-op logger implementation (silent).
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
