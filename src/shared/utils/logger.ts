/**
 * Structured JSON logger built on Pino. One JSON object per line on stdout.
 */

import pino from 'pino';

const LOG_LEVELS: ReadonlySet<string> = new Set([
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
]);

/**
 * Create and configure a Pino logger instance.
 *
 * Reads LOG_LEVEL from environment variable (supports both lowercase and uppercase).
 * Defaults to 'info' if not specified or not a Pino level.
 *
 * @param name - Logger name
 * @param level - Optional log level override
 * @returns Configured Pino logger
 */
export function setupLogger(name: string = 'cloud-sweep', level?: string): pino.Logger {
  const requested = (level ?? process.env.LOG_LEVEL ?? 'info').toLowerCase();
  const logLevel = LOG_LEVELS.has(requested) ? requested : 'info';

  return pino({
    name,
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
