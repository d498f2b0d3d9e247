/**
 * In-memory logger for tests.
 *
 * @module test-helpers/log-capture
 */

import { PassThrough } from 'node:stream';
import { createLogger, type Logger, type LogLevel } from '../logging/logger.js';

export interface LogCapture {
  logger: Logger;
  /** All lines written so far, after pending writes have flushed. */
  lines(): Promise<string[]>;
}

export function createLogCapture(level: LogLevel = 'debug'): LogCapture {
  const stream = new PassThrough();
  const chunks: string[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf-8')));

  const logger = createLogger({ level, stream });

  return {
    logger,
    async lines() {
      // winston pipes through several streams before the sink sees a line
      for (let i = 0; i < 3; i++) {
        await new Promise<void>((resolve) => setImmediate(resolve));
      }
      return chunks
        .join('')
        .split(/\r?\n/)
        .filter((line) => line.length > 0);
    },
  };
}
