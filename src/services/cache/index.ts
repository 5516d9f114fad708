/**
 * Result cache factory.
 */

import { logger } from '../../utils/logger.js';
import type { ResultCacheProvider } from './types.js';
import { MemoryResultCache, type MemoryResultCacheOptions } from './memory.js';

export function createResultCache(options: MemoryResultCacheOptions = {}): ResultCacheProvider {
  const cache = new MemoryResultCache(options);
  logger.info(
    `Result cache ready (${cache.getType()}, max ${cache.stats().maxEntries} entries, ` +
      `TTL ${cache.stats().ttlSeconds}s)`
  );
  return cache;
}

export { MemoryResultCache, cacheKey } from './memory.js';
export type { ResultCacheProvider } from './types.js';
