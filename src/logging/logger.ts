/**
 * Logger Configuration
 * Winston-based logging for the inverter bridge
 */

import { mkdirSync } from 'fs';
import path from 'path';
import winston from 'winston';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = typeof LOG_LEVELS[number];
export type LogFormat = 'pretty' | 'json';

/**
 * Narrow logger surface the bridge modules depend on.
 * A winston logger satisfies it; tests pass jest mocks.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Write error.log and combined.log here as well as to the console */
  logDir?: string;
}

/**
 * LOG_LEVEL as given in the environment, or undefined when unset or not a
 * level winston is configured with
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

const LOG_FILE_MAX_BYTES = 10485760; // 10MB

export function renderPretty(info: winston.Logform.TransformableInfo): string {
  const { level, message, timestamp, stack, ...metadata } = info;
  let line = `${String(timestamp)} [${level.toUpperCase()}]: ${String(message)}`;

  if (Object.keys(metadata).length > 0) {
    line += ` ${JSON.stringify(metadata)}`;
  }
  if (typeof stack === 'string') {
    line += `\n${stack}`;
  }

  return line;
}

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const level = options.level ?? 'info';
  const lineFormat = options.format === 'json'
    ? winston.format.json()
    : winston.format.printf(renderPretty);

  const transports: winston.transport[] = [
    new winston.transports.Console({ format: lineFormat }),
  ];

  if (options.logDir) {
    mkdirSync(options.logDir, { recursive: true });

    transports.push(
      new winston.transports.File({
        filename: path.join(options.logDir, 'error.log'),
        level: 'error',
        format: winston.format.json(),
        maxsize: LOG_FILE_MAX_BYTES,
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(options.logDir, 'combined.log'),
        format: winston.format.json(),
        maxsize: LOG_FILE_MAX_BYTES,
        maxFiles: 10,
        tailable: true,
      })
    );
  }

  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true })
    ),
    transports,
  });
}
