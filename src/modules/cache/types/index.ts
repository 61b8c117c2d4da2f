/**
 * Audio Cache Types
 */

export interface AudioCacheEntry {
  readonly audio: Buffer;
  readonly size: number; // bytes
  readonly createdAt: number;
}

export interface AudioCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
  totalBytes: number;
}

/**
 * Cache capability used by the synthesis coordinator.
 * Asynchronous so a networked store can implement it without touching callers.
 */
export interface AudioCache {
  readonly capacity: number;

  /** Returns the entry and marks it most recently used */
  get(key: string): Promise<AudioCacheEntry | undefined>;

  /**
   * Inserts an entry, evicting the least recently used one when full.
   * An existing key keeps its stored value and only has its recency refreshed.
   */
  put(key: string, audio: Buffer): Promise<AudioCacheEntry>;

  evict(key: string): Promise<boolean>;

  size(): Promise<number>;

  clear(): Promise<void>;

  getStats(): AudioCacheStats;
}
