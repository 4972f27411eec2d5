import path from 'path';
import winston from 'winston';
import type { AppConfig } from './config';

export type Logger = winston.Logger;

export const LOG_FILE_NAME = 'app.log';
export const LOG_MAX_BYTES = 1_000_000;
export const LOG_MAX_FILES = 5;

const lineFormat = winston.format.printf(({ timestamp, level, message, component, ...rest }) => {
  const extra = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  return `${timestamp} | ${level} | ${component ?? 'app'} | ${message}${extra}`;
});

/**
 * Console + size-rotating file logger. Components get a child via
 * `logger.child({ component: 'name' })`.
 */
export function createLogger(config: AppConfig['log']): Logger {
  return winston.createLogger({
    level: config.level,
    format: winston.format.combine(
      winston.format.errors({ stack: true }),
      winston.format.timestamp(),
      lineFormat
    ),
    transports: [
      new winston.transports.Console({
        format: winston.format.combine(winston.format.colorize(), lineFormat),
      }),
      new winston.transports.File({
        filename: path.join(config.dir, LOG_FILE_NAME),
        maxsize: LOG_MAX_BYTES,
        maxFiles: LOG_MAX_FILES,
        tailable: true,
      }),
    ],
  });
}

export function createSilentLogger(): Logger {
  return winston.createLogger({ silent: true });
}
