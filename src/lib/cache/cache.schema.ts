/**
 * Persisted cache file schema
 */

import { z } from 'zod';
import { CacheEntry, JsonObject, JsonValue, PersistedCache } from './cache.types';

export const CACHE_FILE_VERSION = 1;

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

export const cacheFileSchema = z.object({
  version: z.literal(CACHE_FILE_VERSION).optional(),
  last_refresh: z.string().datetime().nullable(),
  entries: z.record(
    z.object({
      payload: jsonObjectSchema,
      fetched_at: z.string().datetime(),
    })
  ),
});

export type CacheFile = z.infer<typeof cacheFileSchema>;

export function toCacheFile(snapshot: PersistedCache): CacheFile {
  const entries: CacheFile['entries'] = {};
  for (const [key, entry] of Object.entries(snapshot.entries)) {
    entries[key] = {
      payload: entry.payload,
      fetched_at: new Date(entry.fetchedAt).toISOString(),
    };
  }

  return {
    version: CACHE_FILE_VERSION,
    last_refresh: snapshot.lastRefresh === null ? null : new Date(snapshot.lastRefresh).toISOString(),
    entries,
  };
}

export function fromCacheFile(file: CacheFile): PersistedCache {
  const entries: Record<string, CacheEntry> = {};
  for (const [key, entry] of Object.entries(file.entries)) {
    entries[key] = {
      payload: entry.payload,
      fetchedAt: Date.parse(entry.fetched_at),
    };
  }

  return {
    entries,
    lastRefresh: file.last_refresh === null ? null : Date.parse(file.last_refresh),
  };
}
