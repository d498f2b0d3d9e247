/**
 * Connection lifecycle orchestrator.
 *
 * Owns at most one connection session and drives it through
 * idle -> authenticating -> connecting -> established. Authentication
 * always completes before the engine is started. A second connect while
 * a session exists (in this process, or a tunnel the engine reports from
 * an earlier one) fails with AlreadyConnected.
 *
 * Callers observe completion by awaiting connect(); onStateChange()
 * reports intermediate states for progress display.
 *
 * @module connection/orchestrator
 */

import { EventEmitter } from 'node:events';
import type { Logger } from '../logging/logger.js';
import type { ProfileRef } from '../types/profile.js';
import { fail, succeed, errorMessage, type FailureKind, type Outcome } from '../types/outcome.js';
import { isExistingFile } from '../storage/file-checks.js';
import type {
  AuthCredentials,
  AuthProvider,
  ConnectionInfo,
  ConnectionState,
  ConnectionStatus,
  ConnectOptions,
  DisconnectInfo,
  StateListener,
  TunnelHandle,
  VpnEngine,
} from './types.js';

export interface ConnectionOrchestratorOptions {
  engine: VpnEngine;
  auth: AuthProvider;
  logger: Logger;
  /** Callback ports offered to the auth provider. */
  acsPorts: number[];
}

interface ConnectionSession {
  profile: ProfileRef;
  state: ConnectionState;
  handle: TunnelHandle | null;
  /** Aborts the in-flight attempt; null once established. */
  controller: AbortController | null;
  /** The running connect() attempt, awaited by disconnect(). */
  attempt: Promise<Outcome<ConnectionInfo>> | null;
}

/** Rejection used when an awaited step loses the race against abort. */
class AttemptAbortedError extends Error {
  constructor() {
    super('Connection attempt cancelled');
    this.name = 'AttemptAbortedError';
  }
}

function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    // Keep the losing promise's rejection handled
    promise.catch(() => undefined);
    return Promise.reject(new AttemptAbortedError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new AttemptAbortedError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/** Forward an external abort into the session controller; returns an unlink function. */
function linkSignal(external: AbortSignal | undefined, controller: AbortController): () => void {
  if (external === undefined) return () => undefined;
  if (external.aborted) {
    controller.abort(external.reason);
    return () => undefined;
  }
  const onAbort = (): void => controller.abort(external.reason);
  external.addEventListener('abort', onAbort, { once: true });
  return () => external.removeEventListener('abort', onAbort);
}

export class ConnectionOrchestrator {
  private readonly engine: VpnEngine;
  private readonly auth: AuthProvider;
  private readonly logger: Logger;
  private readonly acsPorts: number[];
  private readonly events = new EventEmitter();
  private session: ConnectionSession | null = null;
  private pendingTeardown: Promise<Outcome<DisconnectInfo>> | null = null;

  constructor(options: ConnectionOrchestratorOptions) {
    this.engine = options.engine;
    this.auth = options.auth;
    this.logger = options.logger;
    this.acsPorts = [...options.acsPorts];
  }

  getState(): ConnectionState {
    return this.session?.state ?? 'idle';
  }

  /** Subscribe to state changes. Returns an unsubscribe function. */
  onStateChange(listener: StateListener): () => void {
    this.events.on('state', listener);
    return () => {
      this.events.off('state', listener);
    };
  }

  /**
   * Authenticate and bring up a tunnel for `profile`.
   *
   * Resolves once the tunnel is established or the attempt has failed.
   * Aborting `options.signal` stops whichever collaborator is active,
   * returns the orchestrator to idle and resolves Cancelled.
   */
  async connect(profile: ProfileRef, options: ConnectOptions = {}): Promise<Outcome<ConnectionInfo>> {
    if (this.session !== null) {
      const name = this.session.profile.name;
      return fail(
        'AlreadyConnected',
        this.session.state === 'established'
          ? `Already connected to profile: ${name}`
          : `A connection attempt is already in progress for profile: ${name}`,
      );
    }

    const controller = new AbortController();
    const session: ConnectionSession = {
      profile: { name: profile.name, configFilePath: profile.configFilePath },
      state: 'idle',
      handle: null,
      controller,
      attempt: null,
    };
    // Claimed before the first await so overlapping calls see it
    this.session = session;

    const unlink = linkSignal(options.signal, controller);
    const attempt = this.runAttempt(session, controller.signal);
    session.attempt = attempt;
    try {
      return await attempt;
    } finally {
      unlink();
    }
  }

  /**
   * Tear down the established tunnel.
   *
   * With no session in this process, adopts a tunnel the engine reports
   * as still running. The session always returns to idle, even when
   * teardown fails; the failure is still reported.
   */
  async disconnect(): Promise<Outcome<DisconnectInfo>> {
    // A disconnect already tearing down answers for this one too
    if (this.pendingTeardown !== null) {
      return this.pendingTeardown;
    }
    const session = this.session;

    if (session !== null && session.state !== 'established') {
      this.logger.debug(`Cancelling in-flight connection for ${session.profile.name}`);
      session.controller?.abort();
      if (session.attempt !== null) {
        await session.attempt;
      }
      // The tunnel may have come up before the abort landed
      if (this.session === session && this.getState() === 'established') {
        return this.disconnect();
      }
      return succeed({ profileName: session.profile.name });
    }

    const teardown = this.tearDownActive(session);
    this.pendingTeardown = teardown;
    try {
      return await teardown;
    } finally {
      this.pendingTeardown = null;
    }
  }

  private async tearDownActive(session: ConnectionSession | null): Promise<Outcome<DisconnectInfo>> {
    let handle: TunnelHandle | null;
    if (session !== null) {
      handle = session.handle;
    } else {
      try {
        handle = await this.engine.findActive();
      } catch (err) {
        return fail('EngineError', `Could not inspect running tunnels: ${errorMessage(err)}`);
      }
    }

    if (handle === null) {
      return fail('NoActiveConnection', 'No active connection');
    }

    try {
      await this.engine.teardown(handle);
      return succeed({ profileName: handle.profileName });
    } catch (err) {
      return fail('EngineError', `Teardown failed: ${errorMessage(err)}`);
    } finally {
      if (session !== null) {
        this.endSession(session);
      }
    }
  }

  /** Current state, including a tunnel left running by an earlier process. */
  async status(): Promise<Outcome<ConnectionStatus>> {
    const session = this.session;
    if (session !== null) {
      const handle = session.handle;
      return succeed({
        state: session.state,
        profileName: session.profile.name,
        pid: handle?.pid ?? null,
        uptimeMs: session.state === 'established' && handle !== null ? uptimeOf(handle) : null,
      });
    }

    let active: TunnelHandle | null;
    try {
      active = await this.engine.findActive();
    } catch (err) {
      return fail('EngineError', `Could not inspect running tunnels: ${errorMessage(err)}`);
    }

    if (active === null) {
      return succeed({ state: 'idle', profileName: null, pid: null, uptimeMs: null });
    }
    return succeed({
      state: 'established',
      profileName: active.profileName,
      pid: active.pid,
      uptimeMs: uptimeOf(active),
    });
  }

  // ---------------------------------------------------------------------------
  // Attempt steps
  // ---------------------------------------------------------------------------

  private async runAttempt(session: ConnectionSession, signal: AbortSignal): Promise<Outcome<ConnectionInfo>> {
    const { profile } = session;

    let existing: TunnelHandle | null;
    try {
      existing = await this.engine.findActive();
    } catch (err) {
      return this.release(session, 'EngineError', `Could not inspect running tunnels: ${errorMessage(err)}`);
    }
    if (existing !== null) {
      return this.release(session, 'AlreadyConnected', `Already connected to profile: ${existing.profileName}`);
    }

    if (!(await isExistingFile(profile.configFilePath))) {
      return this.release(session, 'ConfigNotFound', `Config file not found: ${profile.configFilePath}`);
    }
    if (signal.aborted) {
      return this.cancel(session);
    }

    this.transition(session, 'authenticating');
    let credentials: AuthCredentials;
    try {
      credentials = await raceAbort(
        this.auth.authenticate({ ports: [...this.acsPorts], profile, signal }),
        signal,
      );
    } catch (err) {
      if (signal.aborted) return this.cancel(session);
      return this.failSession(session, 'AuthFailed', `Authentication failed: ${errorMessage(err)}`);
    }
    if (signal.aborted) {
      return this.cancel(session);
    }

    this.transition(session, 'connecting');
    let handle: TunnelHandle;
    try {
      handle = await this.engine.start({
        profileName: profile.name,
        configFilePath: profile.configFilePath,
        credentials,
      });
    } catch (err) {
      return this.failSession(session, 'EngineError', `Could not start VPN engine: ${errorMessage(err)}`);
    }
    session.handle = handle;

    try {
      await raceAbort(handle.established, signal);
    } catch (err) {
      await this.teardownQuietly(handle);
      if (signal.aborted) return this.cancel(session);
      return this.failSession(session, 'EngineError', `Tunnel failed: ${errorMessage(err)}`);
    }

    session.controller = null;
    this.transition(session, 'established');
    return succeed({
      profileName: profile.name,
      pid: handle.pid,
      startedAt: handle.startedAt,
    });
  }

  private transition(session: ConnectionSession, state: ConnectionState): void {
    session.state = state;
    this.logger.debug(`Connection state: ${state} (${session.profile.name})`);
    this.events.emit('state', state, session.profile.name);
  }

  /** Drop a session that never left idle. */
  private release(session: ConnectionSession, kind: FailureKind, message: string): Outcome<ConnectionInfo> {
    if (this.session === session) {
      this.session = null;
    }
    return fail(kind, message);
  }

  private failSession(session: ConnectionSession, kind: FailureKind, message: string): Outcome<ConnectionInfo> {
    this.transition(session, 'failed');
    this.endSession(session);
    return fail(kind, message);
  }

  private cancel(session: ConnectionSession): Outcome<ConnectionInfo> {
    this.endSession(session);
    return fail('Cancelled', 'Connection attempt cancelled');
  }

  private endSession(session: ConnectionSession): void {
    if (this.session !== session) return;
    this.session = null;
    this.logger.debug(`Connection state: idle (${session.profile.name})`);
    this.events.emit('state', 'idle', session.profile.name);
  }

  private async teardownQuietly(handle: TunnelHandle): Promise<void> {
    try {
      await this.engine.teardown(handle);
    } catch (err) {
      this.logger.warn(`Could not tear down tunnel for ${handle.profileName}: ${errorMessage(err)}`);
    }
  }
}

function uptimeOf(handle: TunnelHandle): number | null {
  const started = Date.parse(handle.startedAt);
  return Number.isNaN(started) ? null : Date.now() - started;
}
