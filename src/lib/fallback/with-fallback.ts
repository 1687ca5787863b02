/**
 * Partial-fallback composition for snapshot producers
 */

import { DataSource } from './fallback.types';
import { describeError } from '../upstream/upstream.errors';

export interface Sourced<T> {
  value: T;
  source: DataSource;
}

/**
 * Run one upstream sub-call. Never rejects: a failure is logged and replaced
 * by the fallback value, so sibling sub-calls in the same snapshot are unaffected.
 */
export async function withFallback<T>(
  label: string,
  call: () => Promise<T>,
  fallback: () => T
): Promise<Sourced<T>> {
  try {
    return { value: await call(), source: 'live' };
  } catch (error: unknown) {
    console.warn(`⚠️ ${label} fallback: ${describeError(error)}`);
    return { value: fallback(), source: 'fallback' };
  }
}
