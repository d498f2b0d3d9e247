// Types
export type { Profile, ProfileRef } from './types/profile.js';
export type { Failure, FailureKind, Outcome } from './types/outcome.js';
export { succeed, fail, errorMessage } from './types/outcome.js';

// Paths
export {
  APP_DIR_NAME,
  getDefaultDataDir,
  getProfileStorePath,
  getConfigPath,
  getRuntimeDir,
} from './types/paths.js';

// Logging
export { createLogger, isLogLevel, LOG_LEVELS } from './logging/index.js';
export type { Logger, LoggerOptions, LogLevel } from './logging/index.js';

// Config
export {
  AppConfigSchema,
  AuthConfigSchema,
  DEFAULT_APP_CONFIG,
  readAppConfig,
  validateAppConfig,
  AppConfigError,
} from './config/index.js';
export type { AppConfig, AuthConfig } from './config/index.js';

// Storage
export { ProfileStore, ProfileSchema, ProfileStoreFileSchema, PROFILE_STORE_VERSION } from './storage/profile-store.js';
export type { ProfileStoreFile } from './storage/profile-store.js';

// Connection
export {
  ConnectionOrchestrator,
  OpenVpnEngine,
  isProcessAlive,
  tailLog,
  ESTABLISHED_MARKER,
  AUTH_FAILED_MARKER,
} from './connection/index.js';
export type {
  AuthCredentials,
  AuthProvider,
  AuthRequest,
  ConnectionInfo,
  ConnectionOrchestratorOptions,
  ConnectionState,
  ConnectionStatus,
  ConnectOptions,
  DisconnectInfo,
  OpenVpnEngineOptions,
  StateListener,
  TunnelHandle,
  TunnelStartRequest,
  VpnEngine,
} from './connection/index.js';

// Auth
export { SamlAcsAuthProvider, SAML_USERNAME, browserCommand, openInBrowser } from './auth/index.js';
export type { SamlAcsAuthProviderOptions } from './auth/index.js';

// Facade
export { CommandFacade } from './client/command-facade.js';
export type { CommandResult, CommandFacadeOptions, FacadeConnectOptions } from './client/command-facade.js';
export { EXIT_CODES, EXIT_SUCCESS, EXIT_USAGE, exitCodeFor } from './client/exit-codes.js';

// Wiring
export { createApplicationContext } from './context.js';
export type { ApplicationContext, ApplicationContextOptions } from './context.js';
export { runCli } from './cli/run.js';
export type { RunCliOptions } from './cli/run.js';
