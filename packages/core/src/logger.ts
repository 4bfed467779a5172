/**
 * Pino-based structured logger shared by all packages
 */

import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';

/**
 * Build a root logger; writes to stdout unless another destination is given
 */
export function createRootLogger(level: string, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'media-cache',
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

export const logger = createRootLogger(LOG_LEVEL);

export type { Logger, DestinationStream as LogDestination };

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>, parent: Logger = logger): Logger {
  return parent.child(context);
}
