/**
 * Profile types.
 *
 * A profile binds a user-chosen name to an OpenVPN config file. Profiles
 * are immutable once stored; changing one means removing and re-adding it.
 *
 * @module types/profile
 */

/** A stored VPN connection profile. */
export interface Profile {
  /** Case-sensitive unique key. */
  name: string;
  /** Absolute path to the OpenVPN config file. */
  configFilePath: string;
  /** When the profile was added (ISO timestamp). */
  createdAt: string;
}

/** The part of a profile the connection layer needs. */
export type ProfileRef = Pick<Profile, 'name' | 'configFilePath'>;
