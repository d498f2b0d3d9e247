/**
 * Application wiring.
 *
 * Builds the store, collaborators, orchestrator and facade for one CLI
 * invocation from a data directory, the loaded config and the logger.
 * Collaborators can be injected to run the whole stack without OpenVPN
 * or a browser.
 *
 * @module context
 */

import type { AppConfig } from './config/types.js';
import type { Logger } from './logging/logger.js';
import { ProfileStore } from './storage/profile-store.js';
import { ConnectionOrchestrator } from './connection/orchestrator.js';
import { OpenVpnEngine } from './connection/openvpn-engine.js';
import type { AuthProvider, VpnEngine } from './connection/types.js';
import { SamlAcsAuthProvider } from './auth/saml-acs.js';
import { CommandFacade } from './client/command-facade.js';
import { getRuntimeDir } from './types/paths.js';

export interface ApplicationContextOptions {
  dataDir: string;
  config: AppConfig;
  logger: Logger;
  engine?: VpnEngine;
  auth?: AuthProvider;
}

export interface ApplicationContext {
  store: ProfileStore;
  engine: VpnEngine;
  auth: AuthProvider;
  orchestrator: ConnectionOrchestrator;
  facade: CommandFacade;
}

export function createApplicationContext(options: ApplicationContextOptions): ApplicationContext {
  const { dataDir, config, logger } = options;

  const store = new ProfileStore(dataDir, logger);

  const engine =
    options.engine ??
    new OpenVpnEngine({
      binary: config.openvpn_binary,
      runtimeDir: getRuntimeDir(dataDir),
      graceMs: config.teardown_grace_ms,
      logger,
    });

  const auth =
    options.auth ??
    new SamlAcsAuthProvider({
      logger,
      loginUrl: config.auth.login_url,
      openBrowser: config.auth.open_browser,
    });

  const orchestrator = new ConnectionOrchestrator({
    engine,
    auth,
    logger,
    acsPorts: config.acs_ports,
  });

  const facade = new CommandFacade({
    store,
    orchestrator,
    logger,
    connectTimeoutSeconds: config.connect_timeout_seconds,
  });

  return { store, engine, auth, orchestrator, facade };
}
