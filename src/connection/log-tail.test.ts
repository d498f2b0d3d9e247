/**
 * Tests for tailLog.
 *
 * Uses a real file in a temp directory and a short stat-watch interval.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { appendFile, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { tailLog, type LogTail } from './log-tail.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('tailLog', () => {
  let tmpDir: string;
  let logPath: string;
  let tail: LogTail | undefined;
  let lines: string[];
  let onError: Mock<(err: Error) => void>;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'log-tail-'));
    logPath = join(tmpDir, 'openvpn.log');
    lines = [];
    onError = vi.fn<(err: Error) => void>();
  });

  afterEach(async () => {
    tail?.stop();
    tail = undefined;
    await rm(tmpDir, { recursive: true, force: true });
  });

  function start(path = logPath): void {
    tail = tailLog(path, {
      intervalMs: 20,
      onLine: (line) => lines.push(line),
      onError,
    });
  }

  it('delivers existing and appended lines in order', async () => {
    await writeFile(logPath, 'one\ntwo\r\n', 'utf-8');
    start();
    await vi.waitFor(() => expect(lines).toEqual(['one', 'two']));

    await appendFile(logPath, 'three\n');

    await vi.waitFor(() => expect(lines).toEqual(['one', 'two', 'three']));
  });

  it('holds a partial line until its newline arrives', async () => {
    await writeFile(logPath, 'TLS: Initial packet', 'utf-8');
    start();
    await delay(100);
    expect(lines).toEqual([]);

    await appendFile(logPath, ' from [AF_INET]192.0.2.1:1194\n');

    await vi.waitFor(() => expect(lines).toEqual(['TLS: Initial packet from [AF_INET]192.0.2.1:1194']));
  });

  it('decodes a multi-byte character split across two reads', async () => {
    await writeFile(logPath, Buffer.concat([Buffer.from('Verbindung hergestellt: Z', 'utf-8'), Buffer.from([0xc3])]));
    start();
    await delay(100);
    expect(lines).toEqual([]);

    await appendFile(logPath, Buffer.concat([Buffer.from([0xbc]), Buffer.from('rich\n', 'utf-8')]));

    await vi.waitFor(() => expect(lines).toEqual(['Verbindung hergestellt: Zürich']));
  });

  it('starts over when the file is truncated', async () => {
    await writeFile(logPath, 'first run line\n', 'utf-8');
    start();
    await vi.waitFor(() => expect(lines).toEqual(['first run line']));

    await writeFile(logPath, 'again\n', 'utf-8');

    await vi.waitFor(() => expect(lines).toEqual(['first run line', 'again']));
  });

  it('waits for a file that does not exist yet', async () => {
    start();
    await delay(60);

    await writeFile(logPath, 'created\n', 'utf-8');

    await vi.waitFor(() => expect(lines).toEqual(['created']));
    expect(onError).not.toHaveBeenCalled();
  });

  it('delivers nothing after stop()', async () => {
    start();
    tail?.stop();

    await writeFile(logPath, 'late\n', 'utf-8');
    await delay(100);

    expect(lines).toEqual([]);
  });

  it('reports read errors other than a missing file', async () => {
    const dirPath = join(tmpDir, 'not-a-file');
    await mkdir(dirPath);
    await writeFile(join(dirPath, 'entry'), '', 'utf-8');

    start(dirPath);

    await vi.waitFor(() => expect(onError).toHaveBeenCalled());
    expect(onError.mock.calls[0][0]).toMatchObject({ code: 'EISDIR' });
  });
});
