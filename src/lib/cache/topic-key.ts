/**
 * Topic key helpers
 */

import { TopicKey } from './cache.types';

const SEPARATOR = ':';

/**
 * Build a topic key from a domain and its parameters.
 * Segments are trimmed and lower-cased so "Wheat" and "wheat " share an entry.
 */
export function buildTopicKey(domain: string, ...params: Array<string | number>): TopicKey {
  const segments = [domain, ...params].map((segment) => String(segment).trim().toLowerCase());

  if (segments.some((segment) => segment.length === 0)) {
    throw new Error(`Invalid topic key segments: ${JSON.stringify([domain, ...params])}`);
  }

  return segments.join(SEPARATOR);
}
