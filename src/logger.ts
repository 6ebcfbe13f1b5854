import pino, { type Logger } from 'pino';

/**
 * Process-wide logger. Writes to stderr so the stdio transport keeps
 * stdout for protocol frames.
 */
export const logger: Logger = pino(
  { level: process.env.LOG_LEVEL || 'info' },
  pino.destination(2)
);

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
