/**
 * Tests for the CLI dispatcher.
 *
 * Every run writes into an in-memory stream, uses a temp data directory
 * and, for connection commands, vi.fn() collaborators.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PassThrough } from 'node:stream';
import { mkdtemp, rm, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runCli, type RunCliOptions } from './run.js';
import type { AuthCredentials, AuthRequest, TunnelHandle, TunnelStartRequest } from '../connection/types.js';

interface RunResult {
  exitCode: number;
  lines: string[];
}

async function run(argv: string[], options: Omit<RunCliOptions, 'stream'> = {}): Promise<RunResult> {
  const stream = new PassThrough();
  const chunks: string[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf-8')));

  const exitCode = await runCli(argv, { ...options, stream, interactive: false });
  for (let i = 0; i < 3; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
  const lines = chunks
    .join('')
    .split(/\r?\n/)
    .filter((line) => line.length > 0);
  return { exitCode, lines };
}

describe('runCli', () => {
  let tmpDir: string;
  let dataDir: string;
  let configFile: string;
  let dataFlag: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'run-cli-'));
    dataDir = join(tmpDir, 'data');
    dataFlag = `--data-dir=${dataDir}`;
    configFile = join(tmpDir, 'work.ovpn');
    await writeFile(configFile, 'client\n', 'utf-8');
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  // ---- describe('runCli() -- help and usage')

  describe('help and usage', () => {
    it('prints the version', async () => {
      const { exitCode, lines } = await run(['--version']);

      expect(exitCode).toBe(0);
      expect(lines[0]).toBe('saml-vpn-cli  v0.1.0');
    });

    it('prints general help with --help', async () => {
      const { exitCode, lines } = await run(['--help']);

      expect(exitCode).toBe(0);
      expect(lines).toContain('Commands:');
      expect(lines).toContain('  add-profile <name> <configFile>   Store an OpenVPN config file under a name');
    });

    it('prints help and exits 2 without a command', async () => {
      const { exitCode, lines } = await run([]);

      expect(exitCode).toBe(2);
      expect(lines[0]).toBe('saml-vpn - OpenVPN connection profiles with SAML sign-in');
    });

    it('prints command help', async () => {
      const { exitCode, lines } = await run(['connect', '--help']);

      expect(exitCode).toBe(0);
      expect(lines[0]).toBe('Usage: saml-vpn connect <profileName>');
    });

    it('rejects an unknown command with exit 2', async () => {
      const { exitCode, lines } = await run(['frobnicate']);

      expect(exitCode).toBe(2);
      expect(lines).toContain('error: Unknown command: frobnicate');
      expect(lines).toContain("Run 'saml-vpn --help' for usage.");
    });

    it('rejects a malformed option with exit 2', async () => {
      const { exitCode, lines } = await run(['status', '--log-level=loud']);

      expect(exitCode).toBe(2);
      expect(lines).toContain('error: Invalid log level: loud (expected one of error, warn, info, debug)');
    });
  });

  // ---- describe('runCli() -- profiles')

  describe('profiles', () => {
    it('adds, lists and removes a profile across invocations', async () => {
      expect(await run(['add-profile', 'work', configFile, dataFlag])).toEqual({
        exitCode: 0,
        lines: ['Profile added: work'],
      });
      expect((await run(['list-profiles', dataFlag])).lines).toEqual(['Profiles:', '  work']);
      expect((await run(['remove-profile', 'work', dataFlag])).lines).toEqual(['Profile removed: work']);
      expect((await run(['list-profiles', dataFlag])).lines).toEqual(['No profiles configured']);
    });

    it('treats missing positionals as blank', async () => {
      expect(await run(['add-profile', dataFlag])).toEqual({
        exitCode: 2,
        lines: ['error: Profile name is required'],
      });
      expect(await run(['add-profile', 'work', dataFlag])).toEqual({
        exitCode: 2,
        lines: ['error: Config file is required'],
      });
    });
  });

  // ---- describe('runCli() -- config')

  describe('config', () => {
    it('fails with exit 2 on an invalid config file', async () => {
      await mkdir(dataDir, { recursive: true });
      await writeFile(join(dataDir, 'config.json'), '{ nope', 'utf-8');

      const { exitCode, lines } = await run(['list-profiles', dataFlag]);

      expect(exitCode).toBe(2);
      expect(lines).toEqual([`error: Invalid JSON in config file: ${join(dataDir, 'config.json')}`]);
    });

    it('applies log_level from the config file', async () => {
      await mkdir(dataDir, { recursive: true });
      await writeFile(join(dataDir, 'config.json'), JSON.stringify({ log_level: 'warn' }), 'utf-8');

      const { exitCode, lines } = await run(['list-profiles', dataFlag]);

      expect(exitCode).toBe(0);
      expect(lines).toEqual([]);
    });

    it('lets --log-level override the config file', async () => {
      await mkdir(dataDir, { recursive: true });
      await writeFile(join(dataDir, 'config.json'), JSON.stringify({ log_level: 'warn' }), 'utf-8');

      const { lines } = await run(['list-profiles', dataFlag, '--log-level=info']);

      expect(lines).toEqual(['No profiles configured']);
    });
  });

  // ---- describe('runCli() -- connection')

  describe('connection', () => {
    function fakes() {
      const handle: TunnelHandle = {
        profileName: 'work',
        configFilePath: configFile,
        pid: 4242,
        startedAt: new Date().toISOString(),
        established: Promise.resolve(),
      };
      const auth = {
        authenticate: vi.fn<(request: AuthRequest) => Promise<AuthCredentials>>(
          async () => ({ username: 'N/A', password: 'test-assertion' }),
        ),
      };
      const engine = {
        start: vi.fn<(request: TunnelStartRequest) => Promise<TunnelHandle>>(async () => handle),
        teardown: vi.fn<(handle: TunnelHandle) => Promise<void>>(async () => undefined),
        findActive: vi.fn<() => Promise<TunnelHandle | null>>(async () => null),
      };
      return { handle, auth, engine };
    }

    it('connects a stored profile', async () => {
      const { auth, engine } = fakes();
      await run(['add-profile', 'work', configFile, dataFlag]);

      const { exitCode, lines } = await run(['connect', 'work', dataFlag], { auth, engine });

      expect(exitCode).toBe(0);
      expect(lines).toEqual(['Connecting to profile: work', 'Connected: work']);
      expect(auth.authenticate).toHaveBeenCalledWith(
        expect.objectContaining({ ports: [35001], profile: { name: 'work', configFilePath: configFile } }),
      );
    });

    it('passes acs_ports from the config to the auth provider', async () => {
      const { auth, engine } = fakes();
      await mkdir(dataDir, { recursive: true });
      await writeFile(join(dataDir, 'config.json'), JSON.stringify({ acs_ports: [35001, 35002] }), 'utf-8');
      await run(['add-profile', 'work', configFile, dataFlag]);

      await run(['connect', 'work', dataFlag], { auth, engine });

      expect(auth.authenticate).toHaveBeenCalledWith(expect.objectContaining({ ports: [35001, 35002] }));
    });

    it('reports a tunnel from an earlier run in status', async () => {
      const { handle, auth, engine } = fakes();
      engine.findActive.mockResolvedValue(handle);

      const { exitCode, lines } = await run(['status', dataFlag], { auth, engine });

      expect(exitCode).toBe(0);
      expect(lines).toEqual(['Connected: work (pid 4242)']);
    });

    it('warns on disconnect with nothing running', async () => {
      const { auth, engine } = fakes();

      const { exitCode, lines } = await run(['disconnect', dataFlag], { auth, engine });

      expect(exitCode).toBe(0);
      expect(lines).toEqual(['Disconnecting...', 'warn: No active connection']);
      expect(engine.teardown).not.toHaveBeenCalled();
    });
  });
});
