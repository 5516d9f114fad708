/**
 * Time-bounded cache of the database schema (table → columns).
 */

import type { SchemaMap } from '../types/models.js';
import { systemClock, type Clock } from '../types/utils.js';
import { logger } from '../utils/logger.js';

/**
 * Anything that can produce a fresh schema snapshot.
 */
export interface SchemaSource {
  introspect(): Promise<SchemaMap>;
}

export interface SchemaCacheStats {
  cached: boolean;
  tables: number;
  ageMs: number | null;
  ttlSeconds: number;
  refreshes: number;
}

/**
 * Caches one SchemaMap for `ttlSeconds`. A TTL of 0 disables caching.
 *
 * The cache cannot see DDL on its own: callers must `invalidate()` whenever
 * the set of tables changes.
 */
export class SchemaCache {
  private snapshot: { schema: SchemaMap; storedAt: number } | null = null;
  private inflight: Promise<SchemaMap> | null = null;
  private generation = 0;
  private refreshes = 0;

  constructor(
    private readonly ttlSeconds: number = 3600,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Cached schema if still fresh, otherwise a new introspection.
   * Concurrent misses share one introspection.
   */
  async get(source: SchemaSource): Promise<SchemaMap> {
    if (this.snapshot && this.isFresh(this.snapshot.storedAt)) {
      return this.snapshot.schema;
    }

    if (!this.inflight) {
      this.inflight = this.refresh(source);
    }
    return this.inflight;
  }

  /**
   * Drop the cached snapshot; the next `get` re-introspects.
   */
  invalidate(): void {
    this.snapshot = null;
    this.inflight = null;
    this.generation++;
    logger.info('Schema cache invalidated');
  }

  stats(): SchemaCacheStats {
    return {
      cached: this.snapshot !== null,
      tables: this.snapshot ? Object.keys(this.snapshot.schema).length : 0,
      ageMs: this.snapshot ? this.clock() - this.snapshot.storedAt : null,
      ttlSeconds: this.ttlSeconds,
      refreshes: this.refreshes,
    };
  }

  private isFresh(storedAt: number): boolean {
    return this.clock() - storedAt < this.ttlSeconds * 1000;
  }

  private async refresh(source: SchemaSource): Promise<SchemaMap> {
    const generation = this.generation;
    try {
      const schema = Object.freeze({ ...(await source.introspect()) });
      this.refreshes++;

      // An invalidate() during introspection makes this result stale
      if (generation === this.generation) {
        if (this.ttlSeconds > 0) {
          this.snapshot = { schema, storedAt: this.clock() };
        }
        logger.info(`Cached schema for ${Object.keys(schema).length} tables`);
      }
      return schema;
    } finally {
      if (generation === this.generation) {
        this.inflight = null;
      }
    }
  }
}
