/**
 * Where a snapshot section came from
 */
export type DataSource = 'live' | 'fallback';
