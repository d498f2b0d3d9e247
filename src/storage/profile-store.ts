/**
 * Persistent profile storage.
 *
 * Profiles live in `<dataDir>/profiles.json` in insertion order. Every
 * operation re-reads the file, so writes from this process are visible
 * immediately and concurrent writers resolve as last-writer-wins.
 * Writes go to a temp file in the same directory and are renamed into
 * place.
 *
 * A missing file is an empty store. A corrupt file is reported as a
 * StorageError rather than replaced, so the next write cannot discard
 * the user's profiles.
 *
 * @module storage/profile-store
 */

import { z } from 'zod';
import { readFile, writeFile, rename, mkdir, rm } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import type { Logger } from '../logging/logger.js';
import type { Profile } from '../types/profile.js';
import { fail, succeed, errorMessage, type Outcome } from '../types/outcome.js';
import { getProfileStorePath } from '../types/paths.js';
import { isExistingFile } from './file-checks.js';

/** Schema version written to disk. */
export const PROFILE_STORE_VERSION = 1;

export const ProfileSchema = z.object({
  name: z.string().min(1),
  configFilePath: z.string().min(1),
  createdAt: z.string(),
});

export const ProfileStoreFileSchema = z.object({
  version: z.number(),
  profiles: z.array(ProfileSchema),
}).passthrough();

export type ProfileStoreFile = z.infer<typeof ProfileStoreFileSchema>;

export class ProfileStore {
  private readonly storePath: string;

  constructor(
    dataDir: string,
    private readonly logger: Logger,
  ) {
    this.storePath = getProfileStorePath(dataDir);
  }

  getStorePath(): string {
    return this.storePath;
  }

  /**
   * All profiles in insertion order. Each call returns a fresh array.
   */
  async list(): Promise<Outcome<Profile[]>> {
    const loaded = await this.load();
    if (!loaded.ok) return loaded;
    return succeed(loaded.value.profiles.map((profile) => ({ ...profile })));
  }

  /** Exact, case-sensitive lookup. */
  async get(name: string): Promise<Outcome<Profile | null>> {
    const loaded = await this.load();
    if (!loaded.ok) return loaded;
    const found = loaded.value.profiles.find((profile) => profile.name === name);
    return succeed(found ? { ...found } : null);
  }

  /**
   * Add a profile. Names are never overwritten: an existing name fails
   * with DuplicateName and leaves the store untouched.
   */
  async add(name: string, configFilePath: string): Promise<Outcome<Profile>> {
    if (name.trim().length === 0) {
      return fail('InvalidInput', 'Profile name is required');
    }
    if (configFilePath.trim().length === 0) {
      return fail('InvalidInput', 'Config file is required');
    }
    if (!(await isExistingFile(configFilePath))) {
      return fail('InvalidInput', `Config file not found: ${configFilePath}`);
    }

    const loaded = await this.load();
    if (!loaded.ok) return loaded;

    const data = loaded.value;
    if (data.profiles.some((profile) => profile.name === name)) {
      return fail('DuplicateName', `Profile already exists: ${name}`);
    }

    const profile: Profile = {
      name,
      configFilePath: resolve(configFilePath),
      createdAt: new Date().toISOString(),
    };
    data.profiles.push(profile);

    const saved = await this.save(data);
    if (!saved.ok) return saved;

    this.logger.debug(`Stored profile "${name}" in ${this.storePath}`);
    return succeed({ ...profile });
  }

  /** Remove a profile by exact name; NotFound when absent. */
  async remove(name: string): Promise<Outcome<Profile>> {
    const loaded = await this.load();
    if (!loaded.ok) return loaded;

    const data = loaded.value;
    const index = data.profiles.findIndex((profile) => profile.name === name);
    if (index === -1) {
      return fail('NotFound', `Profile not found: ${name}`);
    }

    const [removed] = data.profiles.splice(index, 1);

    const saved = await this.save(data);
    if (!saved.ok) return saved;

    this.logger.debug(`Removed profile "${name}" from ${this.storePath}`);
    return succeed(removed);
  }

  private async load(): Promise<Outcome<ProfileStoreFile>> {
    let content: string;
    try {
      content = await readFile(this.storePath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return succeed(this.createEmpty());
      }
      return fail('StorageError', `Failed to read profiles from ${this.storePath}: ${errorMessage(err)}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      return fail('StorageError', `Profile store is not valid JSON: ${this.storePath}`);
    }

    const result = ProfileStoreFileSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape';
      return fail('StorageError', `Profile store is malformed (${where}): ${this.storePath}`);
    }

    return succeed(result.data);
  }

  private async save(data: ProfileStoreFile): Promise<Outcome<void>> {
    const dir = dirname(this.storePath);
    const tempPath = join(
      dir,
      `.profiles-${Date.now()}-${Math.random().toString(36).slice(2)}.json.tmp`,
    );

    try {
      await mkdir(dir, { recursive: true });
      await writeFile(
        tempPath,
        JSON.stringify({ ...data, version: PROFILE_STORE_VERSION }, null, 2) + '\n',
        'utf-8',
      );
      await rename(tempPath, this.storePath);
      return succeed(undefined);
    } catch (err) {
      await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        this.logger.debug(`Could not remove ${tempPath}: ${errorMessage(cleanupErr)}`);
      });
      return fail('StorageError', `Failed to save profiles to ${this.storePath}: ${errorMessage(err)}`);
    }
  }

  private createEmpty(): ProfileStoreFile {
    return { version: PROFILE_STORE_VERSION, profiles: [] };
  }
}
