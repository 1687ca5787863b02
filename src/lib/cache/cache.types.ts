/**
 * Cache Types
 * Type definitions for the snapshot cache
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Opaque payload produced for one topic. The cache transports, timestamps and
 * persists it without looking inside.
 */
export type Snapshot = JsonObject;

/**
 * Normalized "domain:param:param" identifier of one cacheable unit
 */
export type TopicKey = string;

/**
 * Committed cache entry. Frozen once stored.
 */
export interface CacheEntry<T extends Snapshot = Snapshot> {
  readonly payload: T;
  readonly fetchedAt: number; // epoch ms
}

/**
 * Whole-store copy handed to persistence
 */
export interface PersistedCache {
  entries: Record<TopicKey, CacheEntry>;
  lastRefresh: number | null;
}

/**
 * Persistence adapter contract. Implementations never reject.
 */
export interface ICachePersistence {
  restore(): Promise<PersistedCache | null>;
  persist(snapshot: PersistedCache): Promise<void>;
  flush(): Promise<void>;
}

/**
 * Annotations attached to every snapshot returned to a caller
 */
export type SnapshotAnnotations = {
  served_from_cache: boolean;
  cached_at?: string;
};

export type ServedSnapshot = Snapshot & SnapshotAnnotations;

export interface CacheStats {
  entries: number;
  keys: TopicKey[];
  lastRefresh: string | null;
  oldestEntryAgeMs: number | null;
}
