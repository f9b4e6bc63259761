/**
 * Structured logging setup. Components receive a winston Logger through their
 * constructor and derive a child tagged with their component name.
 */

import winston from 'winston';
import type { Logger } from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  silent?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const format = options.json === false
    ? winston.format.combine(
        winston.format.timestamp(),
        winston.format.colorize(),
        winston.format.simple()
      )
    : winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      );

  return winston.createLogger({
    level: options.level ?? 'info',
    format,
    silent: options.silent ?? false,
    transports: [new winston.transports.Console()]
  });
}

export function componentLogger(logger: Logger, component: string): Logger {
  return logger.child({ component });
}
