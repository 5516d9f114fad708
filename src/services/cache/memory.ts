/**
 * In-Memory Result Cache
 *
 * Map insertion order doubles as the LRU order: a touched key is deleted and
 * re-inserted at the end, so the first key is always the eviction candidate.
 * Every operation is synchronous and therefore atomic on the event loop.
 */

import { createHash } from 'crypto';
import type { CacheEntry, CacheValue, ResultCacheStats } from '../../types/models.js';
import { systemClock, type Clock } from '../../types/utils.js';
import { logger } from '../../utils/logger.js';
import type { ResultCacheProvider } from './types.js';

export interface MemoryResultCacheOptions {
  maxEntries?: number;
  ttlSeconds?: number;
  clock?: Clock;
}

export class MemoryResultCache implements ResultCacheProvider {
  private cache = new Map<string, CacheEntry>();
  private readonly maxEntries: number;
  private readonly ttlSeconds: number;
  private readonly clock: Clock;
  private hits = 0;
  private misses = 0;

  constructor(options: MemoryResultCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
    this.ttlSeconds = options.ttlSeconds ?? 3600;
    this.clock = options.clock ?? systemClock;
  }

  getType(): string {
    return 'memory';
  }

  get(userId: string, question: string): CacheEntry | undefined {
    const key = cacheKey(userId, question);
    const entry = this.cache.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.cache.delete(key);
      this.misses++;
      logger.debug(`[ResultCache] Expired entry dropped: ${key}`);
      return undefined;
    }

    // LRU Promotion
    this.cache.delete(key);
    this.cache.set(key, entry);
    entry.hitCount++;
    this.hits++;

    return { ...entry };
  }

  put(userId: string, question: string, value: CacheValue): void {
    const key = cacheKey(userId, question);

    if (this.cache.has(key)) {
      this.cache.delete(key);
    } else if (this.cache.size >= this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
        logger.debug(`[ResultCache] Evicted least recently used entry: ${oldest.value}`);
      }
    }

    this.cache.set(key, {
      columns: value.columns,
      rows: value.rows,
      explanation: value.explanation,
      sql: value.sql,
      tables: value.tables,
      createdAt: new Date(this.clock()),
      hitCount: 0,
    });
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): ResultCacheStats {
    return {
      entries: this.cache.size,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      ttlSeconds: this.ttlSeconds,
    };
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.clock() - entry.createdAt.getTime() > this.ttlSeconds * 1000;
  }
}

/**
 * SHA-256 over an unambiguous encoding of the raw user id and question.
 * The question is not normalized: differently worded questions are
 * different entries.
 */
export function cacheKey(userId: string, question: string): string {
  return createHash('sha256').update(JSON.stringify([userId, question])).digest('hex');
}
