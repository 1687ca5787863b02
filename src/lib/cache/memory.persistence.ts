/**
 * In-memory Cache Persistence
 * Keeps the last persisted store copy in memory. Used for memory-only mode and tests.
 */

import { ICachePersistence, PersistedCache } from './cache.types';

export class MemoryCachePersistence implements ICachePersistence {
  private saved: PersistedCache | null;
  private writes = 0;

  constructor(initial: PersistedCache | null = null) {
    this.saved = initial;
  }

  async restore(): Promise<PersistedCache | null> {
    return this.saved;
  }

  async persist(snapshot: PersistedCache): Promise<void> {
    this.saved = snapshot;
    this.writes++;
  }

  async flush(): Promise<void> {
    return;
  }

  get writeCount(): number {
    return this.writes;
  }

  getSaved(): PersistedCache | null {
    return this.saved;
  }
}
