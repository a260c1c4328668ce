/**
 * Structured logging for the harvester.
 * Console output for the operator plus one log file per day under the log directory.
 */

import { mkdirSync } from 'fs';
import path from 'path';
import winston from 'winston';

export type Logger = winston.Logger;

export interface LoggerOptions {
  level?: string;
  /** Directory for the daily log file; omit to log to the console only */
  logDir?: string;
  silent?: boolean;
  /** Date used to name the log file (defaults to today) */
  date?: Date;
}

export function dailyLogFileName(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}.log`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';

  const fileFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${timestamp} [${level.toUpperCase()}] ${message}${metaStr}`;
    })
  );

  const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${timestamp} [${level}]: ${message}${metaStr}`;
    })
  );

  const transports: winston.transport[] = [new winston.transports.Console({ format: consoleFormat })];

  if (options.logDir && !options.silent) {
    mkdirSync(options.logDir, { recursive: true });
    transports.push(
      new winston.transports.File({
        filename: path.join(options.logDir, dailyLogFileName(options.date ?? new Date())),
        format: fileFormat,
      })
    );
  }

  return winston.createLogger({
    level,
    transports,
    silent: options.silent ?? false,
    exitOnError: false,
  });
}

/**
 * Ends the logger and resolves once every transport has flushed, so lines
 * written just before `process.exit` reach the log file.
 */
export async function closeLogger(logger: Logger): Promise<void> {
  const flushed = logger.transports.map(
    (transport) => new Promise<void>((resolve) => transport.once('finish', () => resolve()))
  );
  logger.end();
  await Promise.all(flushed);
}
