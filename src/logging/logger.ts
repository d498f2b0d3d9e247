/**
 * Logging context.
 *
 * Built once at process start and handed to every component through its
 * constructor. Console output carries the message only; warnings and
 * errors get a coloured prefix so each failure stays one readable line.
 *
 * @module logging/logger
 */

import winston from 'winston';
import pc from 'picocolors';
import type { Writable } from 'node:stream';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = winston.Logger;

export interface LoggerOptions {
  /** Minimum level written. */
  level: LogLevel;
  /** Write to this stream instead of the console. */
  stream?: Writable;
  /** Colour prefixes with ANSI codes. Default: false. */
  color?: boolean;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Render one log line.
 *
 * @internal Exported for testing only.
 */
export function formatLine(level: string, message: string, color: boolean): string {
  const colors = pc.createColors(color);
  switch (level) {
    case 'error':
      return `${colors.red('error:')} ${message}`;
    case 'warn':
      return `${colors.yellow('warn:')} ${message}`;
    case 'debug':
      return colors.dim(message);
    default:
      return message;
  }
}

export function createLogger(options: LoggerOptions): Logger {
  const color = options.color ?? false;
  const format = winston.format.printf((info) =>
    formatLine(info.level, String(info.message), color),
  );

  const transport = options.stream
    ? new winston.transports.Stream({ stream: options.stream, format })
    : new winston.transports.Console({ format, stderrLevels: ['error', 'warn'] });

  return winston.createLogger({
    level: options.level,
    transports: [transport],
    exitOnError: false,
  });
}
