/**
 * Type definitions for application configuration.
 *
 * Read from `config.json` in the data directory. Every field has a
 * default provided by AppConfigSchema, so the file is optional.
 *
 * @module config/types
 */

import type { LogLevel } from '../logging/logger.js';

/** Browser sign-in settings for the SAML assertion consumer. */
export interface AuthConfig {
  /** Identity-provider URL opened in the browser before waiting. */
  login_url?: string;
  /** Whether to launch the system browser for login_url. Default: true. */
  open_browser: boolean;
}

export interface AppConfig {
  /** Minimum log level. Default: 'info'. */
  log_level: LogLevel;
  /** OpenVPN executable name or path. Default: 'openvpn'. */
  openvpn_binary: string;
  /** Local ports the SAML assertion consumer may bind, tried in order. Default: [35001]. */
  acs_ports: number[];
  /** Abort a connect attempt after this many seconds; 0 disables. Default: 0. */
  connect_timeout_seconds: number;
  /** Milliseconds between SIGTERM and SIGKILL on teardown. Default: 5000. */
  teardown_grace_ms: number;
  auth: AuthConfig;
}
