import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, readFile, mkdir, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ProfileStore } from './profile-store.js';
import { createLogCapture } from '../test-helpers/log-capture.js';

describe('ProfileStore', () => {
  let tmpDir: string;
  let dataDir: string;
  let configFile: string;
  let store: ProfileStore;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'profile-store-'));
    dataDir = join(tmpDir, 'data');
    configFile = join(tmpDir, 'work.ovpn');
    await writeFile(configFile, 'client\nremote vpn.example.test 443\n', 'utf-8');
    store = new ProfileStore(dataDir, createLogCapture().logger);
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  // ---------------------------------------------------------------
  // list()
  // ---------------------------------------------------------------
  describe('list()', () => {
    it('returns an empty list when the data directory does not exist', async () => {
      const result = await store.list();

      expect(result).toEqual({ ok: true, value: [] });
    });

    it('returns profiles in insertion order', async () => {
      await store.add('zeta', configFile);
      await store.add('alpha', configFile);
      await store.add('mid', configFile);

      const result = await store.list();

      expect(result.ok && result.value.map((p) => p.name)).toEqual(['zeta', 'alpha', 'mid']);
    });

    it('returns a fresh array on each call', async () => {
      await store.add('work', configFile);

      const first = await store.list();
      const second = await store.list();

      expect(first.ok && second.ok).toBe(true);
      if (first.ok && second.ok) {
        first.value.pop();
        expect(second.value).toHaveLength(1);
      }
    });

    it('reports StorageError for a corrupt store file', async () => {
      await mkdir(dataDir, { recursive: true });
      await writeFile(join(dataDir, 'profiles.json'), '{ broken', 'utf-8');

      const result = await store.list();

      expect(result).toEqual({
        ok: false,
        failure: {
          kind: 'StorageError',
          message: `Profile store is not valid JSON: ${join(dataDir, 'profiles.json')}`,
        },
      });
    });

    it('reports StorageError for a store file with the wrong shape', async () => {
      await mkdir(dataDir, { recursive: true });
      await writeFile(join(dataDir, 'profiles.json'), JSON.stringify({ version: 1, profiles: [{ name: 'x' }] }), 'utf-8');

      const result = await store.list();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.failure.kind).toBe('StorageError');
        expect(result.failure.message).toContain('profiles.0.configFilePath');
      }
    });
  });

  // ---------------------------------------------------------------
  // add()
  // ---------------------------------------------------------------
  describe('add()', () => {
    it('persists the profile with an absolute config path', async () => {
      const result = await store.add('work', configFile);

      expect(result.ok).toBe(true);
      const onDisk = JSON.parse(await readFile(join(dataDir, 'profiles.json'), 'utf-8'));
      expect(onDisk.version).toBe(1);
      expect(onDisk.profiles).toHaveLength(1);
      expect(onDisk.profiles[0].name).toBe('work');
      expect(onDisk.profiles[0].configFilePath).toBe(configFile);
      expect(typeof onDisk.profiles[0].createdAt).toBe('string');
    });

    it('lists an added name exactly once', async () => {
      await store.add('work', configFile);
      await store.add('home', configFile);

      const result = await store.list();

      expect(result.ok && result.value.filter((p) => p.name === 'work')).toHaveLength(1);
    });

    it('survives a new store instance (durable)', async () => {
      await store.add('work', configFile);

      const reopened = new ProfileStore(dataDir, createLogCapture().logger);
      const result = await reopened.get('work');

      expect(result.ok && result.value?.configFilePath).toBe(configFile);
    });

    it('rejects a blank name with InvalidInput', async () => {
      const result = await store.add('   ', configFile);

      expect(result).toEqual({ ok: false, failure: { kind: 'InvalidInput', message: 'Profile name is required' } });
    });

    it('rejects a missing config file with InvalidInput', async () => {
      const missing = join(tmpDir, 'missing.ovpn');

      const result = await store.add('work', missing);

      expect(result).toEqual({
        ok: false,
        failure: { kind: 'InvalidInput', message: `Config file not found: ${missing}` },
      });
    });

    it('rejects a directory as config file', async () => {
      const result = await store.add('work', tmpDir);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.failure.kind).toBe('InvalidInput');
    });

    it('rejects a duplicate name and leaves the original untouched', async () => {
      const other = join(tmpDir, 'other.ovpn');
      await writeFile(other, 'client\n', 'utf-8');
      await store.add('work', configFile);

      const result = await store.add('work', other);

      expect(result).toEqual({ ok: false, failure: { kind: 'DuplicateName', message: 'Profile already exists: work' } });
      const current = await store.get('work');
      expect(current.ok && current.value?.configFilePath).toBe(configFile);
    });

    it('treats names case-sensitively', async () => {
      await store.add('work', configFile);

      const result = await store.add('Work', configFile);

      expect(result.ok).toBe(true);
    });

    it('leaves no temp files behind', async () => {
      await store.add('work', configFile);
      await store.add('home', configFile);

      expect(await readdir(dataDir)).toEqual(['profiles.json']);
    });

    it('reports StorageError when the data directory is unusable', async () => {
      const blocker = join(tmpDir, 'blocker');
      await writeFile(blocker, '', 'utf-8');
      const blocked = new ProfileStore(join(blocker, 'data'), createLogCapture().logger);

      const result = await blocked.add('work', configFile);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.failure.kind).toBe('StorageError');
        expect(result.failure.message).toMatch(/^Failed to read profiles from /);
      }
    });

    it('does not write over a corrupt store file', async () => {
      await mkdir(dataDir, { recursive: true });
      await writeFile(join(dataDir, 'profiles.json'), '{ broken', 'utf-8');

      const result = await store.add('work', configFile);

      expect(result.ok).toBe(false);
      expect(await readFile(join(dataDir, 'profiles.json'), 'utf-8')).toBe('{ broken');
    });
  });

  // ---------------------------------------------------------------
  // remove()
  // ---------------------------------------------------------------
  describe('remove()', () => {
    it('removes the named profile', async () => {
      await store.add('work', configFile);
      await store.add('home', configFile);

      const result = await store.remove('work');

      expect(result.ok && result.value.name).toBe('work');
      const listed = await store.list();
      expect(listed.ok && listed.value.map((p) => p.name)).toEqual(['home']);
    });

    it('returns NotFound for an unknown name without writing', async () => {
      const result = await store.remove('ghost');

      expect(result).toEqual({ ok: false, failure: { kind: 'NotFound', message: 'Profile not found: ghost' } });
      await expect(readdir(dataDir)).rejects.toMatchObject({ code: 'ENOENT' });
    });
  });

  // ---------------------------------------------------------------
  // get()
  // ---------------------------------------------------------------
  describe('get()', () => {
    it('returns null for an absent name', async () => {
      expect(await store.get('nope')).toEqual({ ok: true, value: null });
    });

    it('matches exactly', async () => {
      await store.add('work', configFile);

      expect(await store.get('wor')).toEqual({ ok: true, value: null });
    });
  });

  it('exposes the store path', () => {
    expect(store.getStorePath()).toBe(join(dataDir, 'profiles.json'));
  });
});
