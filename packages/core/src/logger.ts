import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Root logger. Level comes from `LOG_LEVEL` (default: `info`); provider
 * credentials are redacted wherever they appear in a logged object.
 */
export const logger: Logger = pino({
  name: 'bridgesim',
  level: process.env['LOG_LEVEL'] ?? 'info',
  redact: ['apiKey', '*.apiKey', 'headers.authorization'],
});

/** Create a child logger tagged with `component` and any extra bindings. */
export function createLogger(name: string, bindings: Record<string, unknown> = {}): Logger {
  return logger.child({ component: name, ...bindings });
}
