/**
 * Profile management commands: list-profiles, add-profile, remove-profile.
 *
 * @module cli/commands/profiles
 */

import type { CommandFacade } from '../../client/command-facade.js';

export const listProfilesHelp = `
Usage: saml-vpn list-profiles

List the names of all stored profiles, in the order they were added.
`;

export const addProfileHelp = `
Usage: saml-vpn add-profile <profileName> <configFile>

Store an OpenVPN config file under a name. The file must exist; its path
is saved as an absolute path. Names are case-sensitive and cannot be
reused until the existing profile is removed.
`;

export const removeProfileHelp = `
Usage: saml-vpn remove-profile <profileName>

Forget a stored profile. The OpenVPN config file itself is left in place.
Removing a name that does not exist prints a warning and succeeds.
`;

export async function listProfilesCommand(facade: CommandFacade): Promise<number> {
  const result = await facade.listProfiles();
  return result.exitCode;
}

export async function addProfileCommand(facade: CommandFacade, args: string[]): Promise<number> {
  const [name, configFile] = args;
  const result = await facade.addProfile(name, configFile);
  return result.exitCode;
}

export async function removeProfileCommand(facade: CommandFacade, args: string[]): Promise<number> {
  const [name] = args;
  const result = await facade.removeProfile(name);
  return result.exitCode;
}
