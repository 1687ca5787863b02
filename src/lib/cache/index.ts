/**
 * Snapshot cache barrel export
 */

export { SnapshotStore } from './snapshot.store';
export type { SnapshotStoreOptions } from './snapshot.store';
export { SnapshotReader, SnapshotUnavailableError } from './snapshot.reader';
export { FileCachePersistence } from './file.persistence';
export { MemoryCachePersistence } from './memory.persistence';
export { buildTopicKey } from './topic-key';
export * from './cache.types';
