/**
 * Connection module: lifecycle orchestration and the OpenVPN engine.
 *
 * @module connection
 */

export type {
  AuthCredentials,
  AuthProvider,
  AuthRequest,
  ConnectionInfo,
  ConnectionState,
  ConnectionStatus,
  ConnectOptions,
  DisconnectInfo,
  StateListener,
  TunnelHandle,
  TunnelStartRequest,
  VpnEngine,
} from './types.js';

export { ConnectionOrchestrator } from './orchestrator.js';
export type { ConnectionOrchestratorOptions } from './orchestrator.js';

export { OpenVpnEngine, isProcessAlive, ESTABLISHED_MARKER, AUTH_FAILED_MARKER } from './openvpn-engine.js';
export type { OpenVpnEngineOptions, SpawnTunnel, TunnelProcess } from './openvpn-engine.js';

export { tailLog } from './log-tail.js';
export type { LogTail, LogTailOptions } from './log-tail.js';
