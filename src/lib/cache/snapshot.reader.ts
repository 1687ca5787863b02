/**
 * Snapshot Reader
 * Cache-first reads with a synchronous produce on miss
 */

import { CacheEntry, ServedSnapshot, Snapshot, TopicKey } from './cache.types';
import { SnapshotStore } from './snapshot.store';
import { withTimeout } from '../utils/timeout';
import { describeError } from '../upstream/upstream.errors';

export class SnapshotUnavailableError extends Error {
  readonly key: TopicKey;

  constructor(key: TopicKey, message: string) {
    super(message);
    this.name = 'SnapshotUnavailableError';
    this.key = key;
  }
}

export interface ReadOptions {
  allowCache: boolean;
}

export interface SnapshotReaderConfig {
  produceTimeoutMs: number;
}

function annotate(entry: CacheEntry): ServedSnapshot {
  return {
    ...entry.payload,
    served_from_cache: true,
    cached_at: new Date(entry.fetchedAt).toISOString(),
  };
}

export class SnapshotReader {
  private store: SnapshotStore;
  private config: SnapshotReaderConfig;
  private inFlight = new Map<TopicKey, Promise<CacheEntry>>();

  constructor(store: SnapshotStore, config: SnapshotReaderConfig) {
    this.store = store;
    this.config = config;
  }

  /**
   * Serve the cached snapshot for a key, or produce, store and serve a fresh one
   */
  async read(key: TopicKey, produce: () => Promise<Snapshot>, options: ReadOptions): Promise<ServedSnapshot> {
    if (options.allowCache) {
      const cached = this.peek(key);
      if (cached) {
        return cached;
      }
    }

    const entry = await this.produceOnce(key, produce);
    return { ...entry.payload, served_from_cache: false };
  }

  /**
   * Cache-only read
   */
  peek(key: TopicKey): ServedSnapshot | undefined {
    const entry = this.store.get(key);
    return entry ? annotate(entry) : undefined;
  }

  /**
   * Concurrent misses for one key share a single produce call
   */
  private produceOnce(key: TopicKey, produce: () => Promise<Snapshot>): Promise<CacheEntry> {
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    // produce starts on a later tick, after the request is registered
    const request: Promise<CacheEntry> = Promise.resolve()
      .then(() => withTimeout(produce(), this.config.produceTimeoutMs, `Producing ${key}`))
      .then((payload) => this.store.set(key, payload))
      .catch((error: unknown) => {
        console.error(`❌ Failed to produce ${key}:`, describeError(error));
        throw new SnapshotUnavailableError(key, `Snapshot ${key} is not available: ${describeError(error)}`);
      })
      .finally(() => {
        if (this.inFlight.get(key) === request) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, request);
    return request;
  }
}
