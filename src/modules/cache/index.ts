/**
 * Cache Module Exports
 */

export { LruAudioCache } from './services';
export { cacheConfig } from './config';
export type { CacheConfig } from './config';
export type { AudioCache, AudioCacheEntry, AudioCacheStats } from './types';
