/**
 * Type definitions for the connection layer.
 *
 * The orchestrator drives two collaborators through these interfaces:
 * an AuthProvider that obtains credentials (usually via a browser) and
 * a VpnEngine that turns credentials plus a config file into a tunnel.
 *
 * @module connection/types
 */

import type { ProfileRef } from '../types/profile.js';

/** Session lifecycle states. */
export type ConnectionState = 'idle' | 'authenticating' | 'connecting' | 'established' | 'failed';

/** Credentials handed from the auth provider to the engine. */
export interface AuthCredentials {
  username: string;
  password: string;
}

export interface AuthRequest {
  /** Acceptable local callback ports, in preference order. */
  ports: number[];
  profile: ProfileRef;
  /** Aborted when the connect attempt is cancelled. */
  signal: AbortSignal;
}

export interface AuthProvider {
  /** Resolve credentials, or reject when the flow fails or is aborted. */
  authenticate(request: AuthRequest): Promise<AuthCredentials>;
}

export interface TunnelStartRequest {
  profileName: string;
  configFilePath: string;
  credentials: AuthCredentials;
}

/** Opaque handle for one tunnel process. */
export interface TunnelHandle {
  profileName: string;
  configFilePath: string;
  /** OS process ID, null if unknown. */
  pid: number | null;
  /** When the tunnel process was started (ISO timestamp). */
  startedAt: string;
  /** Settles when the tunnel is up (resolve) or has failed to come up (reject). */
  established: Promise<void>;
}

export interface VpnEngine {
  /** Launch the tunnel process. Rejects only if it cannot be started at all. */
  start(request: TunnelStartRequest): Promise<TunnelHandle>;
  /** Stop the tunnel and release its runtime files. */
  teardown(handle: TunnelHandle): Promise<void>;
  /** A tunnel this engine started earlier that is still running, if any. */
  findActive(): Promise<TunnelHandle | null>;
}

export interface ConnectOptions {
  signal?: AbortSignal;
}

export interface ConnectionInfo {
  profileName: string;
  pid: number | null;
  startedAt: string;
}

export interface DisconnectInfo {
  profileName: string;
}

/** Snapshot reported by status(). */
export interface ConnectionStatus {
  state: ConnectionState;
  profileName: string | null;
  pid: number | null;
  /** Uptime in milliseconds, null unless established. */
  uptimeMs: number | null;
}

export type StateListener = (state: ConnectionState, profileName: string | null) => void;
