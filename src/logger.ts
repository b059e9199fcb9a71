import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Create the root logger.
 *
 * `LOG_LEVEL` wins when set; otherwise tests run silent and everything
 * else logs at `info`.
 */
function createLogger(): Logger {
  const isTest = process.env.NODE_ENV === 'test';
  const level = process.env.LOG_LEVEL ?? (isTest ? 'silent' : 'info');

  return pino({
    level,
    base: { service: 'md2out' },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
