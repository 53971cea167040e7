/**
 * pino logging for likewise
 *
 * Entries go to stderr, or appended to `logging.file`; stdout stays free for
 * command output.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import type { LoggingConfig } from '../config/schema.js';

export type LikewiseLogger = Logger;

/**
 * Bindings for a retrieval-scoped child logger
 */
export interface LogContext {
  type?: string;
  id?: number;
  languageId?: number;
  [key: string]: unknown;
}

const STDERR = 2;

export function createLogger(config: LoggingConfig): LikewiseLogger {
  const destination = config.file !== undefined && config.file !== '' ? config.file : STDERR;
  const options: LoggerOptions = {
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { service: 'likewise' },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (config.pretty) {
    // a transport owns its destination, so it cannot be combined with a stream
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: { destination, colorize: destination === STDERR, ignore: 'pid,hostname,service' },
      },
    });
  }

  return pino(options, pino.destination({ dest: destination, append: true, sync: true }));
}

export function createChildLogger(logger: LikewiseLogger, context: LogContext): LikewiseLogger {
  return logger.child(context);
}

let defaultLogger: LikewiseLogger | null = null;

/**
 * Process-wide logger used by components constructed without one
 */
export function getLogger(): LikewiseLogger {
  defaultLogger ??= createLogger({ level: 'info', pretty: false });
  return defaultLogger;
}

export function setDefaultLogger(logger: LikewiseLogger): void {
  defaultLogger = logger;
}
