/**
 * Follow a growing log file line by line.
 *
 * OpenVPN runs detached and writes to its own log file, so the parent
 * can exit without the tunnel losing its stdout. Lines are delivered as
 * they appear; the file is stat-watched at `intervalMs`.
 *
 * @module connection/log-tail
 */

import { watchFile, unwatchFile } from 'node:fs';
import { open } from 'node:fs/promises';
import { StringDecoder } from 'node:string_decoder';

export interface LogTailOptions {
  /** Called once per complete line, without the trailing newline. */
  onLine: (line: string) => void;
  /** Called when the file cannot be read. */
  onError: (err: Error) => void;
  /** Stat-watch interval. Default: 250. */
  intervalMs?: number;
}

export interface LogTail {
  stop(): void;
}

const DEFAULT_INTERVAL_MS = 250;

export function tailLog(path: string, options: LogTailOptions): LogTail {
  let offset = 0;
  let partial = '';
  // Holds back a multi-byte character split across two reads
  let decoder = new StringDecoder('utf8');
  let reading = false;
  let pending = false;
  let stopped = false;

  const readNew = async (): Promise<void> => {
    const file = await open(path, 'r');
    try {
      const { size } = await file.stat();
      if (size < offset) {
        // Truncated underneath us; start over
        offset = 0;
        partial = '';
        decoder = new StringDecoder('utf8');
      }
      while (offset < size && !stopped) {
        const buffer = Buffer.alloc(Math.min(size - offset, 64 * 1024));
        const { bytesRead } = await file.read(buffer, 0, buffer.length, offset);
        if (bytesRead === 0) break;
        offset += bytesRead;
        partial += decoder.write(buffer.subarray(0, bytesRead));

        const lines = partial.split(/\r?\n/);
        partial = lines.pop() ?? '';
        for (const line of lines) {
          if (stopped) return;
          options.onLine(line);
        }
      }
    } finally {
      await file.close();
    }
  };

  const pump = (): void => {
    if (stopped) return;
    if (reading) {
      pending = true;
      return;
    }
    reading = true;
    void readNew()
      .catch((err: unknown) => {
        if ((err as NodeJS.ErrnoException).code === 'ENOENT') return;
        if (!stopped) options.onError(err instanceof Error ? err : new Error(String(err)));
      })
      .finally(() => {
        reading = false;
        if (pending) {
          pending = false;
          pump();
        }
      });
  };

  const listener = (): void => pump();
  watchFile(path, { interval: options.intervalMs ?? DEFAULT_INTERVAL_MS }, listener);
  pump();

  return {
    stop() {
      stopped = true;
      unwatchFile(path, listener);
    },
  };
}
