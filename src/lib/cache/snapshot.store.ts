/**
 * Snapshot Store
 * Process-wide topic → snapshot map with fire-and-forget persistence
 */

import {
  CacheEntry,
  CacheStats,
  ICachePersistence,
  JsonValue,
  PersistedCache,
  Snapshot,
  TopicKey,
} from './cache.types';

export interface SnapshotStoreOptions {
  persistence?: ICachePersistence;
  clock?: () => number;
}

function deepFreeze(value: JsonValue): void {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
    return;
  }
  const children: JsonValue[] = Array.isArray(value) ? value : Object.values(value);
  Object.freeze(value);
  children.forEach(deepFreeze);
}

export class SnapshotStore {
  private entries = new Map<TopicKey, CacheEntry>();
  private lastRefresh: number | null = null;
  private readonly persistence?: ICachePersistence;
  private readonly clock: () => number;

  constructor(options: SnapshotStoreOptions = {}) {
    this.persistence = options.persistence;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Last committed entry for a key. Never triggers a refresh.
   */
  get(key: TopicKey): CacheEntry | undefined {
    return this.entries.get(key);
  }

  has(key: TopicKey): boolean {
    return this.entries.has(key);
  }

  /**
   * Replace the entry for a key and schedule persistence of the whole store.
   * The new entry is visible to the next get() before persistence starts.
   */
  set(key: TopicKey, payload: Snapshot): CacheEntry {
    const owned = structuredClone(payload);
    deepFreeze(owned);

    const previous = this.entries.get(key);
    const now = this.clock();
    const fetchedAt = previous ? Math.max(now, previous.fetchedAt) : now;

    const entry: CacheEntry = Object.freeze({ payload: owned, fetchedAt });
    this.entries.set(key, entry);
    this.lastRefresh = this.lastRefresh === null ? fetchedAt : Math.max(this.lastRefresh, fetchedAt);

    if (this.persistence) {
      this.persistence.persist(this.toPersisted()).catch((error: unknown) => {
        console.error(`⚠️ Cache persistence error after updating ${key}:`, error);
      });
    }

    return entry;
  }

  /**
   * Bulk load previously persisted entries. Does not write back to persistence.
   */
  restore(persisted: PersistedCache): number {
    let restored = 0;

    for (const [key, entry] of Object.entries(persisted.entries)) {
      const current = this.entries.get(key);
      if (current && current.fetchedAt > entry.fetchedAt) {
        continue;
      }
      const payload = structuredClone(entry.payload);
      deepFreeze(payload);
      this.entries.set(key, Object.freeze({ payload, fetchedAt: entry.fetchedAt }));
      restored++;
    }

    if (persisted.lastRefresh !== null) {
      this.lastRefresh =
        this.lastRefresh === null ? persisted.lastRefresh : Math.max(this.lastRefresh, persisted.lastRefresh);
    }

    return restored;
  }

  /**
   * Restore from the configured persistence adapter. Returns the number of entries loaded.
   */
  async load(): Promise<number> {
    if (!this.persistence) {
      return 0;
    }
    const persisted = await this.persistence.restore();
    return persisted ? this.restore(persisted) : 0;
  }

  keys(): TopicKey[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }

  getLastRefresh(): number | null {
    return this.lastRefresh;
  }

  /**
   * Shallow copy of the store. Entries are frozen, so sharing them is safe.
   */
  toPersisted(): PersistedCache {
    return {
      entries: Object.fromEntries(this.entries),
      lastRefresh: this.lastRefresh,
    };
  }

  getStats(): CacheStats {
    const now = this.clock();
    let oldest: number | null = null;
    for (const entry of this.entries.values()) {
      oldest = oldest === null ? entry.fetchedAt : Math.min(oldest, entry.fetchedAt);
    }

    return {
      entries: this.entries.size,
      keys: this.keys(),
      lastRefresh: this.lastRefresh === null ? null : new Date(this.lastRefresh).toISOString(),
      oldestEntryAgeMs: oldest === null ? null : now - oldest,
    };
  }

  /**
   * Wait for pending persistence writes (shutdown, tests)
   */
  async flush(): Promise<void> {
    if (this.persistence) {
      await this.persistence.flush();
    }
  }
}
