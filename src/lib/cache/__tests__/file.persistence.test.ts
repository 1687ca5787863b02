/**
 * File Cache Persistence Tests
 * Uses a temporary directory per test
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { FileCachePersistence } from '../file.persistence';
import { SnapshotStore } from '../snapshot.store';
import { PersistedCache } from '../cache.types';

const T0 = Date.parse('2026-10-19T10:00:00.000Z');

const sample: PersistedCache = {
  entries: {
    'terminal:wheat:indore': { payload: { commodity: 'Wheat', prices: [2300, 2350] }, fetchedAt: T0 },
  },
  lastRefresh: T0,
};

describe('FileCachePersistence', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'snapshot-cache-'));
    filePath = path.join(dir, 'nested', 'cache.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('restore', () => {
    it('should return null when the file does not exist', async () => {
      const persistence = new FileCachePersistence({ filePath });
      await expect(persistence.restore()).resolves.toBeNull();
    });

    it('should return null for a file that is not JSON', async () => {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, '{ truncated', 'utf-8');

      const persistence = new FileCachePersistence({ filePath });
      await expect(persistence.restore()).resolves.toBeNull();
    });

    it('should return null for JSON with an unexpected shape', async () => {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, JSON.stringify({ dashboard: { date: 'today' } }), 'utf-8');

      const persistence = new FileCachePersistence({ filePath });
      await expect(persistence.restore()).resolves.toBeNull();
    });
  });

  describe('persist', () => {
    it('should write the documented file format and read it back', async () => {
      const persistence = new FileCachePersistence({ filePath });

      await persistence.persist(sample);

      const onDisk: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
      expect(onDisk).toEqual({
        version: 1,
        last_refresh: '2026-10-19T10:00:00.000Z',
        entries: {
          'terminal:wheat:indore': {
            payload: { commodity: 'Wheat', prices: [2300, 2350] },
            fetched_at: '2026-10-19T10:00:00.000Z',
          },
        },
      });
      await expect(persistence.restore()).resolves.toEqual(sample);
    });

    it('should leave no temporary file behind', async () => {
      const persistence = new FileCachePersistence({ filePath });

      await persistence.persist(sample);

      await expect(fs.readdir(path.dirname(filePath))).resolves.toEqual(['cache.json']);
    });

    it('should coalesce writes queued while one is in flight', async () => {
      const persistence = new FileCachePersistence({ filePath });
      const versions = [1, 2, 3, 4].map((v) => ({
        entries: { 'dashboard:indore': { payload: { v }, fetchedAt: T0 + v } },
        lastRefresh: T0 + v,
      }));

      const writes = versions.map((snapshot) => persistence.persist(snapshot));
      await Promise.all(writes);
      await persistence.flush();

      const restored = await persistence.restore();
      expect(restored?.entries['dashboard:indore'].payload).toEqual({ v: 4 });
      expect(persistence.writeCount).toBeLessThan(versions.length);
    });

    it('should batch writes when debounced and write on flush', async () => {
      const persistence = new FileCachePersistence({ filePath, debounceMs: 60_000 });

      await persistence.persist(sample);
      await expect(fs.readFile(filePath, 'utf-8')).rejects.toThrow();

      await persistence.flush();
      expect(persistence.writeCount).toBe(1);
      await expect(persistence.restore()).resolves.toEqual(sample);
    });

    it('should not reject when the target cannot be written', async () => {
      const blocker = path.join(dir, 'blocker');
      await fs.writeFile(blocker, 'not a directory', 'utf-8');
      const persistence = new FileCachePersistence({ filePath: path.join(blocker, 'cache.json') });

      await expect(persistence.persist(sample)).resolves.toBeUndefined();
      expect(persistence.writeCount).toBe(0);
    });
  });

  describe('restart durability', () => {
    it('should serve the same payload and fetchedAt after a simulated restart', async () => {
      let now = T0;
      const first = new SnapshotStore({ persistence: new FileCachePersistence({ filePath }), clock: () => now });
      first.set('terminal:wheat:indore', { commodity: 'Wheat', modal: 2350 });
      now = T0 + 60_000;
      first.set('dashboard:indore', { location: 'Indore' });
      await first.flush();

      const second = new SnapshotStore({ persistence: new FileCachePersistence({ filePath }) });
      await expect(second.load()).resolves.toBe(2);

      expect(second.get('terminal:wheat:indore')).toEqual({
        payload: { commodity: 'Wheat', modal: 2350 },
        fetchedAt: T0,
      });
      expect(second.getLastRefresh()).toBe(T0 + 60_000);
    });

    it('should start empty after a corrupt file', async () => {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, 'garbage', 'utf-8');

      const store = new SnapshotStore({ persistence: new FileCachePersistence({ filePath }) });

      await expect(store.load()).resolves.toBe(0);
      expect(store.size).toBe(0);
    });
  });
});
