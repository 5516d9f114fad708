/**
 * Wire shapes for API responses (snake_case).
 */

import type { AuditRecord, DashboardStats, QueryResult, SavedQuery, SlowQuery } from '../types/models.js';

export function toQueryResponse(result: QueryResult) {
  return {
    question: result.question,
    generated_sql: result.sql,
    columns: result.columns,
    rows: result.rows,
    explanation: result.explanation,
    latency_ms: result.latencyMs,
    cached: result.cached,
    degraded: result.degraded,
    ...(result.warning ? { warning: result.warning } : {}),
  };
}

export function toAuditLog(record: AuditRecord) {
  return {
    user_id: record.userId,
    question: record.question,
    generated_sql: record.generatedSql,
    status: record.status,
    latency_ms: record.latencyMs,
    rows_returned: record.rowsReturned,
    error: record.error,
    cached: record.cached,
    timestamp: record.timestamp.toISOString(),
  };
}

export function toSlowQuery(query: SlowQuery) {
  return {
    user_id: query.userId,
    question: query.question,
    latency_ms: query.latencyMs,
    timestamp: query.timestamp,
  };
}

export function toDashboard(stats: DashboardStats) {
  return {
    window_hours: stats.windowHours,
    total_queries: stats.totalQueries,
    avg_latency_ms: stats.avgLatencyMs,
    error_rate_percent: stats.errorRatePercent,
    top_tables: stats.topTables,
    top_users: stats.topUsers.map((user) => ({ user_id: user.userId, count: user.count })),
    slowest_queries: stats.slowestQueries.map(toSlowQuery),
    hourly_trend: stats.hourlyTrend,
  };
}

export function toSavedQuery(saved: SavedQuery) {
  return {
    id: saved.id,
    user_id: saved.userId,
    name: saved.name,
    question: saved.question,
    generated_sql: saved.generatedSql,
    created_at: saved.createdAt.toISOString(),
    run_count: saved.runCount,
  };
}
