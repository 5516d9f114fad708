/**
 * Result Cache Interface Definitions
 */

import type { CacheEntry, CacheValue, ResultCacheStats } from '../../types/models.js';

export interface ResultCacheProvider {
  /**
   * Cached response for (userId, question), or undefined on miss or expiry.
   * A hit bumps the entry's hit count and marks it most recently used.
   */
  get(userId: string, question: string): CacheEntry | undefined;

  /**
   * Store a response, evicting the least recently used entry at capacity.
   */
  put(userId: string, question: string, value: CacheValue): void;

  /**
   * Drop every entry and reset counters.
   */
  clear(): void;

  stats(): ResultCacheStats;

  /**
   * Returns 'memory' for diagnostics.
   */
  getType(): string;
}
