/**
 * Audit trail and query analytics.
 *
 * Every attempt, successful or not, lands in a bounded ring buffer. The
 * dashboard aggregates are computed on demand from that buffer.
 */

import type {
  AuditInput,
  AuditRecord,
  DashboardStats,
  SlowQuery,
  TableCount,
  UserCount,
} from '../types/models.js';
import { systemClock, type Clock } from '../types/utils.js';
import { logger } from '../utils/logger.js';
import { RingBuffer } from '../utils/ring-buffer.js';
import { extractTableReferences } from './table-refs.js';

const HOUR_MS = 60 * 60 * 1000;

export interface DashboardOptions {
  windowHours?: number;
  topN?: number;
}

export class AuditRecorder {
  private readonly buffer: RingBuffer<AuditRecord>;

  constructor(
    maxRecords: number = 10000,
    private readonly clock: Clock = systemClock
  ) {
    this.buffer = new RingBuffer<AuditRecord>(maxRecords);
  }

  get size(): number {
    return this.buffer.size;
  }

  /**
   * Append a record. Never blocks; the oldest record is dropped at capacity.
   */
  record(input: AuditInput): AuditRecord {
    const record: AuditRecord = Object.freeze({
      userId: input.userId,
      question: input.question,
      generatedSql: input.generatedSql,
      status: input.status,
      latencyMs: input.latencyMs,
      rowsReturned: input.rowsReturned,
      error: input.error,
      cached: input.cached ?? false,
      timestamp: input.timestamp ?? new Date(this.clock()),
    });
    this.buffer.push(record);

    logger.debug(
      { userId: record.userId, status: record.status, latencyMs: record.latencyMs },
      'Query audited'
    );
    return record;
  }

  /**
   * The newest `limit` records in insertion order (most recent last).
   */
  recentLogs(limit: number = 100): AuditRecord[] {
    return this.buffer.tail(limit);
  }

  clear(): void {
    this.buffer.clear();
  }

  /**
   * Slowest recorded queries, slowest first.
   */
  slowest(limit: number = 10): SlowQuery[] {
    return [...this.buffer.toArray()]
      .sort((a, b) => b.latencyMs - a.latencyMs)
      .slice(0, Math.max(0, limit))
      .map((record) => ({
        userId: record.userId,
        question: record.question,
        latencyMs: record.latencyMs,
        timestamp: record.timestamp.toISOString(),
      }));
  }

  dashboardStats(options: DashboardOptions = {}): DashboardStats {
    const windowHours = options.windowHours ?? 24;
    const topN = options.topN ?? 5;
    const all = this.buffer.toArray();
    const cutoff = this.clock() - windowHours * HOUR_MS;
    const windowed = all.filter((record) => record.timestamp.getTime() >= cutoff);

    const successful = windowed.filter((record) => record.status === 'success');
    const errors = windowed.length - successful.length;
    const avgLatency =
      successful.length > 0
        ? successful.reduce((sum, record) => sum + record.latencyMs, 0) / successful.length
        : 0;

    return {
      windowHours,
      totalQueries: windowed.length,
      avgLatencyMs: round2(avgLatency),
      errorRatePercent: windowed.length > 0 ? round2((errors / windowed.length) * 100) : 0,
      topTables: this.topTables(all, topN),
      topUsers: this.topUsers(all, topN),
      slowestQueries: this.slowest(topN),
      hourlyTrend: this.hourlyTrend(windowed),
    };
  }

  private topTables(records: AuditRecord[], limit: number): TableCount[] {
    const counts = new Map<string, number>();
    for (const record of records) {
      for (const table of extractTableReferences(record.generatedSql)) {
        counts.set(table, (counts.get(table) ?? 0) + 1);
      }
    }
    return rank(counts, limit).map(([table, count]) => ({ table, count }));
  }

  private topUsers(records: AuditRecord[], limit: number): UserCount[] {
    const counts = new Map<string, number>();
    for (const record of records) {
      counts.set(record.userId, (counts.get(record.userId) ?? 0) + 1);
    }
    return rank(counts, limit).map(([userId, count]) => ({ userId, count }));
  }

  private hourlyTrend(records: AuditRecord[]): Record<string, number> {
    const buckets = new Map<string, number>();
    for (const record of records) {
      const hour = `${record.timestamp.toISOString().slice(0, 13).replace('T', ' ')}:00`;
      buckets.set(hour, (buckets.get(hour) ?? 0) + 1);
    }
    return Object.fromEntries([...buckets.entries()].sort(([a], [b]) => a.localeCompare(b)));
  }
}

/**
 * Highest counts first; ties keep first-seen order.
 */
function rank(counts: Map<string, number>, limit: number): Array<[string, number]> {
  return [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, Math.max(0, limit));
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
