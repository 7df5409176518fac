import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { LoggingConfig } from '../config/types.js';

function consoleTransport(colorizeAll: boolean): winston.transports.ConsoleTransportInstance {
  return new winston.transports.Console({
    format: winston.format.combine(winston.format.colorize({ all: colorizeAll }), winston.format.simple()),
  });
}

/**
 * Shared logger. Usable at import time with a console transport; silent
 * under NODE_ENV=test.
 */
export const logger = winston.createLogger({
  level: 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [consoleTransport(true)],
});

let configured = false;

function rotatingFile(file: LoggingConfig['file'], prefix: 'app' | 'error'): DailyRotateFile {
  return new DailyRotateFile({
    filename: `${file.path}/${prefix}-%DATE%.log`,
    datePattern: 'YYYY-MM-DD',
    maxSize: `${file.maxSize}m`,
    maxFiles: `${file.maxFiles}d`,
    zippedArchive: true,
    auditFile: `${file.path}/.audit-${prefix}.json`,
    ...(prefix === 'error' && { level: 'error' }),
  });
}

/**
 * Replace the start-up transports with the configured ones. Only the first
 * call has any effect.
 */
export function initializeLogger(config: LoggingConfig): void {
  if (configured) {
    return;
  }
  configured = true;

  logger.level = config.level;
  logger.clear();
  if (config.file.enabled) {
    logger.add(rotatingFile(config.file, 'error'));
    logger.add(rotatingFile(config.file, 'app'));
  }
  if (config.console.enabled) {
    logger.add(consoleTransport(config.console.colorize));
  }
  logger.info('[Logger] Configured', { level: config.level, fileLogging: config.file.enabled });
}
