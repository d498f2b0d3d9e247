import { homedir } from 'node:os';
import { join } from 'node:path';

/** Directory name used under the platform application-data directory. */
export const APP_DIR_NAME = 'saml-vpn-cli';

/**
 * Resolve the per-user application-data directory.
 *
 * - Windows: %APPDATA%\saml-vpn-cli (falls back to ~/AppData/Roaming)
 * - macOS: ~/Library/Application Support/saml-vpn-cli
 * - Others: $XDG_CONFIG_HOME/saml-vpn-cli, else ~/.config/saml-vpn-cli
 *
 * @param platform - Defaults to process.platform
 * @param env - Defaults to process.env
 * @param home - Defaults to os.homedir()
 */
export function getDefaultDataDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
): string {
  if (platform === 'win32') {
    const appData = env.APPDATA && env.APPDATA.length > 0
      ? env.APPDATA
      : join(home, 'AppData', 'Roaming');
    return join(appData, APP_DIR_NAME);
  }

  if (platform === 'darwin') {
    return join(home, 'Library', 'Application Support', APP_DIR_NAME);
  }

  const xdg = env.XDG_CONFIG_HOME;
  if (xdg && xdg.length > 0) {
    return join(xdg, APP_DIR_NAME);
  }
  return join(home, '.config', APP_DIR_NAME);
}

/** Path of the profile store file inside a data directory. */
export function getProfileStorePath(dataDir: string): string {
  return join(dataDir, 'profiles.json');
}

/** Path of the optional application config file inside a data directory. */
export function getConfigPath(dataDir: string): string {
  return join(dataDir, 'config.json');
}

/** Directory holding the VPN engine's runtime files (state, log, credentials). */
export function getRuntimeDir(dataDir: string): string {
  return join(dataDir, 'run');
}
