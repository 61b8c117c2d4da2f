/**
 * Audio Cache Configuration
 */

import { parseIntEnv } from '@/shared/utils/env';

export interface CacheConfig {
  capacity: number;
}

export const cacheConfig: Readonly<CacheConfig> = Object.freeze({
  capacity: parseIntEnv(process.env.TTS_CACHE_CAPACITY, 100),
});

export function validateCacheConfig(config: CacheConfig): void {
  if (!Number.isInteger(config.capacity) || config.capacity < 1) {
    throw new Error('TTS_CACHE_CAPACITY must be a positive integer');
  }
}
