import pino from 'pino';
import type { Logger } from 'pino';
import type { AppConfig } from './config.js';

/**
 * Builds the process logger.
 *
 * Log lines go to stderr (fd 2): stdout is reserved for LHE output so
 * tools can be chained with pipes.
 */
export function createLogger(config: Pick<AppConfig, 'logLevel'>, service: string = 'lhe-tools'): Logger {
  return pino(
    {
      level: config.logLevel,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
      base: { service },
    },
    pino.destination(2),
  );
}

/** Logger that drops everything; used where no logger is supplied. */
export const silentLogger: Logger = pino({ level: 'silent' });
