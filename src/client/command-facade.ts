/**
 * Command facade between the CLI and the core.
 *
 * Each method validates one user intent, delegates to the profile store
 * or the connection orchestrator, writes the user-visible lines through
 * the logger and returns the exit code. Nothing here touches argv or
 * process.exit, so the same facade backs the CLI and the tests.
 *
 * @module client/command-facade
 */

import type { Logger } from '../logging/logger.js';
import type { ProfileStore } from '../storage/profile-store.js';
import type { ConnectionOrchestrator } from '../connection/orchestrator.js';
import type { ConnectionInfo, ConnectionState } from '../connection/types.js';
import type { ProfileRef } from '../types/profile.js';
import { isExistingFile } from '../storage/file-checks.js';
import type { Failure, Outcome } from '../types/outcome.js';
import { EXIT_SUCCESS, exitCodeFor } from './exit-codes.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CommandResult {
  exitCode: number;
  /** Set when the command did not succeed (including warnings). */
  failure?: Failure;
}

export interface CommandFacadeOptions {
  store: ProfileStore;
  orchestrator: ConnectionOrchestrator;
  logger: Logger;
  /** Give up on connect after this many seconds; 0 waits indefinitely. */
  connectTimeoutSeconds?: number;
}

export interface FacadeConnectOptions {
  /** Aborting cancels the attempt (Ctrl-C). */
  signal?: AbortSignal;
}

const STATE_LABELS: Record<ConnectionState, string> = {
  idle: 'Disconnected',
  authenticating: 'Authenticating',
  connecting: 'Connecting',
  established: 'Connected',
  failed: 'Failed',
};

function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

// ---------------------------------------------------------------------------
// Facade
// ---------------------------------------------------------------------------

export class CommandFacade {
  private readonly store: ProfileStore;
  private readonly orchestrator: ConnectionOrchestrator;
  private readonly logger: Logger;
  private readonly connectTimeoutSeconds: number;

  constructor(options: CommandFacadeOptions) {
    this.store = options.store;
    this.orchestrator = options.orchestrator;
    this.logger = options.logger;
    this.connectTimeoutSeconds = options.connectTimeoutSeconds ?? 0;
  }

  async listProfiles(): Promise<CommandResult> {
    const listed = await this.store.list();
    if (!listed.ok) return this.report(listed.failure);

    const profiles = listed.value;
    if (profiles.length === 0) {
      this.logger.info('No profiles configured');
      return { exitCode: EXIT_SUCCESS };
    }

    this.logger.info('Profiles:');
    for (const profile of profiles) {
      this.logger.info(`  ${profile.name}`);
    }
    return { exitCode: EXIT_SUCCESS };
  }

  async addProfile(name = '', configFile = ''): Promise<CommandResult> {
    if (isBlank(name)) {
      return this.report({ kind: 'InvalidInput', message: 'Profile name is required' });
    }
    if (isBlank(configFile)) {
      return this.report({ kind: 'InvalidInput', message: 'Config file is required' });
    }
    if (!(await isExistingFile(configFile))) {
      return this.report({ kind: 'InvalidInput', message: `Config file not found: ${configFile}` });
    }

    const added = await this.store.add(name, configFile);
    if (!added.ok) return this.report(added.failure);

    this.logger.info(`Profile added: ${added.value.name}`);
    return { exitCode: EXIT_SUCCESS };
  }

  async removeProfile(name = ''): Promise<CommandResult> {
    if (isBlank(name)) {
      return this.report({ kind: 'InvalidInput', message: 'Profile name is required' });
    }

    const removed = await this.store.remove(name);
    if (!removed.ok) {
      if (removed.failure.kind === 'NotFound') {
        this.logger.warn(removed.failure.message);
        return { exitCode: EXIT_SUCCESS, failure: removed.failure };
      }
      return this.report(removed.failure);
    }

    this.logger.info(`Profile removed: ${removed.value.name}`);
    return { exitCode: EXIT_SUCCESS };
  }

  async connect(name = '', options: FacadeConnectOptions = {}): Promise<CommandResult> {
    if (isBlank(name)) {
      return this.report({ kind: 'InvalidInput', message: 'Profile name is required' });
    }

    const found = await this.store.get(name);
    if (!found.ok) return this.report(found.failure);

    const profile = found.value;
    if (profile === null) {
      return this.report({ kind: 'NotFound', message: `Profile not found: ${name}` });
    }
    if (!(await isExistingFile(profile.configFilePath))) {
      return this.report({ kind: 'ConfigNotFound', message: `OVPN config file not found: ${profile.configFilePath}` });
    }

    this.logger.info(`Connecting to profile: ${profile.name}`);
    const { outcome, timedOut } = await this.connectWithTimeout(
      { name: profile.name, configFilePath: profile.configFilePath },
      options.signal,
    );

    if (!outcome.ok) {
      if (timedOut && outcome.failure.kind === 'Cancelled') {
        return this.report({
          kind: 'Cancelled',
          message: `Connection timed out after ${this.connectTimeoutSeconds} second${this.connectTimeoutSeconds === 1 ? '' : 's'}`,
        });
      }
      return this.report(outcome.failure);
    }

    this.logger.info(`Connected: ${outcome.value.profileName}`);
    if (outcome.value.pid !== null) {
      this.logger.debug(`openvpn pid ${outcome.value.pid}`);
    }
    return { exitCode: EXIT_SUCCESS };
  }

  async disconnect(): Promise<CommandResult> {
    this.logger.info('Disconnecting...');

    const disconnected = await this.orchestrator.disconnect();
    if (!disconnected.ok) {
      if (disconnected.failure.kind === 'NoActiveConnection') {
        this.logger.warn(disconnected.failure.message);
        return { exitCode: EXIT_SUCCESS, failure: disconnected.failure };
      }
      return this.report(disconnected.failure);
    }

    this.logger.info(`Disconnected: ${disconnected.value.profileName}`);
    return { exitCode: EXIT_SUCCESS };
  }

  async status(): Promise<CommandResult> {
    const result = await this.orchestrator.status();
    if (!result.ok) return this.report(result.failure);

    const { state, profileName, pid, uptimeMs } = result.value;
    if (state === 'idle' || profileName === null) {
      this.logger.info(STATE_LABELS.idle);
      return { exitCode: EXIT_SUCCESS };
    }

    const suffix = pid !== null ? ` (pid ${pid})` : '';
    this.logger.info(`${STATE_LABELS[state]}: ${profileName}${suffix}`);
    if (uptimeMs !== null) {
      this.logger.debug(`Uptime: ${Math.floor(uptimeMs / 1000)}s`);
    }
    return { exitCode: EXIT_SUCCESS };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async connectWithTimeout(
    profile: ProfileRef,
    signal: AbortSignal | undefined,
  ): Promise<{ outcome: Outcome<ConnectionInfo>; timedOut: boolean }> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    let timedOut = false;
    const timer =
      this.connectTimeoutSeconds > 0
        ? setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, this.connectTimeoutSeconds * 1000)
        : null;

    try {
      const outcome = await this.orchestrator.connect(profile, { signal: controller.signal });
      return { outcome, timedOut };
    } finally {
      if (timer !== null) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private report(failure: Failure): CommandResult {
    this.logger.error(failure.message);
    return { exitCode: exitCodeFor(failure.kind), failure };
  }
}
