/**
 * OpenVPN tunnel engine.
 *
 * Writes the SAML credentials to a private file, spawns `openvpn`
 * detached with its log redirected to the runtime directory, and
 * watches that log for the initialization marker. A small state file
 * records the running tunnel so a later CLI invocation can report on
 * it or tear it down. Shutdown is SIGTERM -> grace period -> SIGKILL.
 *
 * @module connection/openvpn-engine
 */

import { spawn } from 'node:child_process';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { Logger } from '../logging/logger.js';
import { errorMessage } from '../types/outcome.js';
import { tailLog } from './log-tail.js';
import type { TunnelHandle, TunnelStartRequest, VpnEngine } from './types.js';

/** Log line OpenVPN prints once routes and the tun device are up. */
export const ESTABLISHED_MARKER = 'Initialization Sequence Completed';

/** Log fragment OpenVPN prints when the server refuses the credentials. */
export const AUTH_FAILED_MARKER = 'AUTH_FAILED';

const DEFAULT_GRACE_MS = 5000;
const DEFAULT_LOG_POLL_MS = 250;
const LIVENESS_POLL_MS = 100;

/**
 * The part of a child process the engine relies on.
 *
 * `ChildProcess` satisfies it; tests substitute an EventEmitter.
 */
export interface TunnelProcess {
  readonly pid?: number | undefined;
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  off(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  unref(): void;
}

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export type SpawnTunnel = (command: string, args: string[]) => TunnelProcess;

export interface OpenVpnEngineOptions {
  /** openvpn executable name or path. */
  binary: string;
  /** Directory for the state, log and credentials files. */
  runtimeDir: string;
  logger: Logger;
  /** Wait after SIGTERM before SIGKILL. Default: 5000. */
  graceMs?: number;
  /** Log stat-watch interval. Default: 250. */
  logPollIntervalMs?: number;
  spawnProcess?: SpawnTunnel;
}

const TunnelStateSchema = z
  .object({
    pid: z.number().int().positive(),
    profileName: z.string().min(1),
    configFilePath: z.string().min(1),
    startedAt: z.string(),
    logPath: z.string(),
  })
  .passthrough();

type TunnelState = z.infer<typeof TunnelStateSchema>;

const spawnDetached: SpawnTunnel = (command, args) =>
  // Detached with no pipes: the tunnel outlives this process
  spawn(command, args, { detached: true, stdio: 'ignore' });

/**
 * Whether a process with this PID exists.
 *
 * EPERM means it exists but belongs to another user (openvpn started
 * under sudo, for example).
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    return (err as NodeJS.ErrnoException).code === 'EPERM';
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class OpenVpnEngine implements VpnEngine {
  private readonly binary: string;
  private readonly runtimeDir: string;
  private readonly logger: Logger;
  private readonly graceMs: number;
  private readonly logPollIntervalMs: number;
  private readonly spawnProcess: SpawnTunnel;
  private cancelWatch: (() => void) | null = null;

  constructor(options: OpenVpnEngineOptions) {
    this.binary = options.binary;
    this.runtimeDir = options.runtimeDir;
    this.logger = options.logger;
    this.graceMs = options.graceMs ?? DEFAULT_GRACE_MS;
    this.logPollIntervalMs = options.logPollIntervalMs ?? DEFAULT_LOG_POLL_MS;
    this.spawnProcess = options.spawnProcess ?? spawnDetached;
  }

  get statePath(): string {
    return join(this.runtimeDir, 'tunnel.json');
  }

  get logPath(): string {
    return join(this.runtimeDir, 'openvpn.log');
  }

  get credentialsPath(): string {
    return join(this.runtimeDir, 'credentials');
  }

  async start(request: TunnelStartRequest): Promise<TunnelHandle> {
    await mkdir(this.runtimeDir, { recursive: true, mode: 0o700 });

    // Recreate so the mode applies even if a stale file is left over
    await rm(this.credentialsPath, { force: true });
    const { username, password } = request.credentials;
    await writeFile(this.credentialsPath, `${username}\n${password}\n`, { encoding: 'utf-8', mode: 0o600 });
    await writeFile(this.logPath, '', 'utf-8');

    const args = [
      '--config', request.configFilePath,
      '--auth-user-pass', this.credentialsPath,
      '--auth-nocache',
      '--log', this.logPath,
    ];
    this.logger.debug(`Spawning ${this.binary} ${args.join(' ')}`);

    // Listen from the moment of spawn: openvpn can exit on a bad config
    // before the awaits below complete
    const early: { exit: ExitStatus | null } = { exit: null };
    const onEarlyExit = (code: number | null, signal: NodeJS.Signals | null): void => {
      early.exit = { code, signal };
    };

    let child: TunnelProcess;
    try {
      child = this.spawnProcess(this.binary, args);
      child.once('exit', onEarlyExit);
      await waitForSpawn(child);
    } catch (err: unknown) {
      await this.removeQuietly(this.credentialsPath);
      throw new Error(`Failed to launch ${this.binary}: ${errorMessage(err)}`);
    }
    child.unref();

    const startedAt = new Date().toISOString();
    const pid = child.pid ?? null;
    if (pid !== null && early.exit === null) {
      await this.writeState({
        pid,
        profileName: request.profileName,
        configFilePath: request.configFilePath,
        startedAt,
        logPath: this.logPath,
      });
    }

    child.off('exit', onEarlyExit);
    const established = (
      early.exit !== null ? this.rejectExited(early.exit) : this.watchEstablished(child)
    ).finally(() => this.removeQuietly(this.credentialsPath));

    return {
      profileName: request.profileName,
      configFilePath: request.configFilePath,
      pid,
      startedAt,
      established,
    };
  }

  async teardown(handle: TunnelHandle): Promise<void> {
    this.cancelWatch?.();
    try {
      if (handle.pid !== null && isProcessAlive(handle.pid)) {
        await this.terminate(handle.pid);
      }
    } finally {
      await this.removeQuietly(this.statePath);
      await this.removeQuietly(this.credentialsPath);
    }
  }

  async findActive(): Promise<TunnelHandle | null> {
    const state = await this.readState();
    if (state === null) return null;

    if (!isProcessAlive(state.pid)) {
      this.logger.debug(`Removing stale tunnel state for pid ${state.pid}`);
      await this.removeQuietly(this.statePath);
      return null;
    }

    return {
      profileName: state.profileName,
      configFilePath: state.configFilePath,
      pid: state.pid,
      startedAt: state.startedAt,
      established: Promise.resolve(),
    };
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private watchEstablished(child: TunnelProcess): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let lastLine = '';
      let settled = false;

      const finish = (err?: Error): void => {
        if (settled) return;
        settled = true;
        tail.stop();
        child.off('exit', onExit);
        this.cancelWatch = null;
        if (err) reject(err);
        else resolve();
      };

      const onExit = (code: number | null, signal: NodeJS.Signals | null): void => {
        finish(exitedError({ code, signal }, lastLine));
      };

      const tail = tailLog(this.logPath, {
        intervalMs: this.logPollIntervalMs,
        onLine: (line) => {
          const trimmed = line.trim();
          if (trimmed === '') return;
          this.logger.debug(`openvpn: ${trimmed}`);
          lastLine = trimmed;
          if (trimmed.includes(ESTABLISHED_MARKER)) {
            finish();
          } else if (trimmed.includes(AUTH_FAILED_MARKER)) {
            finish(new Error('VPN server rejected the credentials (AUTH_FAILED)'));
          }
        },
        onError: (err) => finish(new Error(`Could not read ${this.logPath}: ${err.message}`)),
      });

      child.once('exit', onExit);
      this.cancelWatch = () => finish(new Error('Tunnel was torn down'));
    });
  }

  private async rejectExited(exit: ExitStatus): Promise<void> {
    let lastLine = '';
    try {
      const lines = (await readFile(this.logPath, 'utf-8')).split(/\r?\n/).map((line) => line.trim());
      lastLine = lines.filter((line) => line !== '').pop() ?? '';
    } catch (err: unknown) {
      this.logger.debug(`Could not read ${this.logPath}: ${errorMessage(err)}`);
    }
    throw exitedError(exit, lastLine);
  }

  private async terminate(pid: number): Promise<void> {
    this.logger.debug(`Sending SIGTERM to openvpn (pid ${pid})`);
    try {
      process.kill(pid, 'SIGTERM');
    } catch (err: unknown) {
      const code = (err as NodeJS.ErrnoException).code;
      if (code === 'ESRCH') return;
      if (code === 'EPERM') {
        throw new Error(`Not permitted to stop openvpn (pid ${pid})`);
      }
      throw err;
    }

    const deadline = Date.now() + this.graceMs;
    while (Date.now() < deadline && isProcessAlive(pid)) {
      await delay(LIVENESS_POLL_MS);
    }
    if (!isProcessAlive(pid)) return;

    this.logger.warn(`openvpn (pid ${pid}) did not exit after ${this.graceMs}ms, sending SIGKILL`);
    try {
      process.kill(pid, 'SIGKILL');
    } catch (err: unknown) {
      if ((err as NodeJS.ErrnoException).code !== 'ESRCH') throw err;
    }
  }

  private async readState(): Promise<TunnelState | null> {
    let content: string;
    try {
      content = await readFile(this.statePath, 'utf-8');
    } catch (err: unknown) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      raw = null;
    }
    const parsed = TunnelStateSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(`Ignoring unreadable tunnel state file: ${this.statePath}`);
      await this.removeQuietly(this.statePath);
      return null;
    }
    return parsed.data;
  }

  private async writeState(state: TunnelState): Promise<void> {
    const tmpPath = `${this.statePath}.tmp`;
    await writeFile(tmpPath, JSON.stringify(state, null, 2) + '\n', 'utf-8');
    await rename(tmpPath, this.statePath);
  }

  private async removeQuietly(path: string): Promise<void> {
    try {
      await rm(path, { force: true });
    } catch (err: unknown) {
      this.logger.debug(`Could not remove ${path}: ${errorMessage(err)}`);
    }
  }
}

function exitedError(exit: ExitStatus, lastLine: string): Error {
  const how = exit.signal !== null ? `on ${exit.signal}` : `with code ${exit.code ?? 'unknown'}`;
  return new Error(`openvpn exited ${how}${lastLine ? `: ${lastLine}` : ''}`);
}

function waitForSpawn(child: TunnelProcess): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    child.once('spawn', () => resolve());
    child.once('error', (err: Error) => reject(err));
  });
}
