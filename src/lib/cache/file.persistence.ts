/**
 * File-based Cache Persistence
 * Serializes the whole snapshot store to one JSON file and restores it at startup
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ICachePersistence, PersistedCache } from './cache.types';
import { cacheFileSchema, fromCacheFile, toCacheFile } from './cache.schema';
import { describeError, errorCode } from '../upstream/upstream.errors';

export interface FileCachePersistenceConfig {
  filePath: string;
  debounceMs: number; // 0 = write after every update
}

export class FileCachePersistence implements ICachePersistence {
  private config: FileCachePersistenceConfig;
  private pending: PersistedCache | null = null;
  private writeChain: Promise<void> = Promise.resolve();
  private debounceTimer?: NodeJS.Timeout;
  private writes = 0;

  constructor(config: Partial<FileCachePersistenceConfig> & { filePath: string }) {
    this.config = {
      filePath: path.resolve(config.filePath),
      debounceMs: config.debounceMs ?? 0,
    };
  }

  get filePath(): string {
    return this.config.filePath;
  }

  /**
   * Number of completed file writes
   */
  get writeCount(): number {
    return this.writes;
  }

  /**
   * Load the persisted store. Missing, unreadable or invalid files yield null.
   */
  async restore(): Promise<PersistedCache | null> {
    let content: string;
    try {
      content = await fs.readFile(this.config.filePath, 'utf-8');
    } catch (error: unknown) {
      if (errorCode(error) === 'ENOENT') {
        console.log(`ℹ️  No cache file at ${this.config.filePath}, starting cold`);
      } else {
        console.error(`⚠️ Failed to read cache file ${this.config.filePath}:`, describeError(error));
      }
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error: unknown) {
      console.error(`⚠️ Cache file ${this.config.filePath} is not valid JSON:`, describeError(error));
      return null;
    }

    const result = cacheFileSchema.safeParse(parsed);
    if (!result.success) {
      console.error(`⚠️ Cache file ${this.config.filePath} has an unexpected shape:`, result.error.message);
      return null;
    }

    return fromCacheFile(result.data);
  }

  /**
   * Queue a write of the given store copy. Writes never interleave; while one is
   * running, newer copies replace the queued one.
   */
  persist(snapshot: PersistedCache): Promise<void> {
    this.pending = snapshot;

    if (this.config.debounceMs > 0) {
      if (this.debounceTimer) {
        clearTimeout(this.debounceTimer);
      }
      this.debounceTimer = setTimeout(() => {
        this.debounceTimer = undefined;
        void this.enqueueWrite();
      }, this.config.debounceMs);
      return Promise.resolve();
    }

    return this.enqueueWrite();
  }

  /**
   * Force any debounced write and wait until the file is up to date
   */
  flush(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = undefined;
      return this.enqueueWrite();
    }
    return this.writeChain;
  }

  private enqueueWrite(): Promise<void> {
    this.writeChain = this.writeChain.then(() => this.writePending());
    return this.writeChain;
  }

  private async writePending(): Promise<void> {
    const snapshot = this.pending;
    if (!snapshot) {
      return;
    }
    this.pending = null;

    const filePath = this.config.filePath;
    const tempPath = `${filePath}.${process.pid}.tmp`;

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      // Write atomically using temporary file then rename
      await fs.writeFile(tempPath, JSON.stringify(toCacheFile(snapshot), null, 2), 'utf-8');
      await fs.rename(tempPath, filePath);
      this.writes++;
    } catch (error: unknown) {
      console.error(`⚠️ Failed to persist cache to ${filePath}:`, describeError(error));
      await this.removeTempFile(tempPath);
    }
  }

  private async removeTempFile(tempPath: string): Promise<void> {
    try {
      await fs.unlink(tempPath);
    } catch (error: unknown) {
      if (errorCode(error) !== 'ENOENT') {
        console.error(`Failed to remove temporary cache file ${tempPath}:`, describeError(error));
      }
    }
  }
}
