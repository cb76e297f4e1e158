/**
 * Logger construction. Command output goes to stdout, so logs default to stderr.
 */

import pino, { type Logger } from 'pino';

/** Logger options, matching the `log` section of the configuration. */
export interface LoggerOptions {
  /** Level threshold (trace, debug, info, warn, error, fatal). */
  level: string;
  /** Optional log file path. Logs go to stderr when absent. */
  file?: string;
}

/** Create a pino logger writing to `file`, or to stderr. */
export function createLogger(options: LoggerOptions): Logger {
  if (options.file) {
    return pino({
      level: options.level,
      transport: {
        target: 'pino/file',
        options: { destination: options.file, mkdir: true },
      },
    });
  }
  return pino({ level: options.level }, pino.destination(2));
}

/** Shared fallback for components constructed without a logger. */
export const defaultLogger: Logger = createLogger({ level: 'warn' });
