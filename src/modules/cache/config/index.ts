export { cacheConfig, validateCacheConfig } from './cache.config';
export type { CacheConfig } from './cache.config';
