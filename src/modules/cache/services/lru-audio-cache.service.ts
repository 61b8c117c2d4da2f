/**
 * In-process LRU Audio Cache
 *
 * Map iteration order is insertion order, so the first key is always the
 * least recently used one: reads and re-puts move a key to the end by
 * deleting and re-inserting it.
 */

import { logger } from '@/shared/utils';
import { AudioCache, AudioCacheEntry, AudioCacheStats } from '../types';
import { CacheConfig, validateCacheConfig } from '../config';

export class LruAudioCache implements AudioCache {
  private readonly entries = new Map<string, AudioCacheEntry>();
  readonly capacity: number;

  // Metrics
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(config: CacheConfig) {
    validateCacheConfig(config);
    this.capacity = config.capacity;
  }

  async get(key: string): Promise<AudioCacheEntry | undefined> {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    this.hits++;
    this.touch(key, entry);
    return entry;
  }

  async put(key: string, audio: Buffer): Promise<AudioCacheEntry> {
    const existing = this.entries.get(key);
    if (existing) {
      this.touch(key, existing);
      return existing;
    }

    while (this.entries.size >= this.capacity) {
      this.evictLeastRecentlyUsed();
    }

    // Own copy so later writes to the caller's buffer cannot change the entry
    const stored = Buffer.from(audio);
    const entry: AudioCacheEntry = Object.freeze({
      audio: stored,
      size: stored.byteLength,
      createdAt: Date.now(),
    });

    this.entries.set(key, entry);
    return entry;
  }

  async evict(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async size(): Promise<number> {
    return this.entries.size;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  /**
   * Keys from least to most recently used
   */
  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  getStats(): AudioCacheStats {
    let totalBytes = 0;
    for (const entry of this.entries.values()) {
      totalBytes += entry.size;
    }

    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      totalBytes,
    };
  }

  private touch(key: string, entry: AudioCacheEntry): void {
    this.entries.delete(key);
    this.entries.set(key, entry);
  }

  private evictLeastRecentlyUsed(): void {
    const oldest = this.entries.keys().next();
    if (oldest.done) {
      return;
    }

    this.entries.delete(oldest.value);
    this.evictions++;
    logger.debug('Audio cache entry evicted', {
      size: this.entries.size,
      capacity: this.capacity,
    });
  }
}
