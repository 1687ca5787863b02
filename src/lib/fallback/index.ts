/**
 * Fallback barrel export
 */

export * from './fallback.provider';
export { withFallback } from './with-fallback';
export type { Sourced } from './with-fallback';
export type { DataSource } from './fallback.types';
