/**
 * Audit log, analytics and result cache endpoints.
 */

import type { FastifyInstance } from 'fastify';
import { requireAdmin, resolvePrincipal } from './principal.js';
import type { RouteOptions } from './query.js';
import { toAuditLog, toDashboard, toSlowQuery } from './serializers.js';

const LimitQuerySchema = (defaultValue: number) => ({
  type: 'object',
  properties: {
    limit: { type: 'integer', minimum: 1, maximum: 1000, default: defaultValue },
  },
});

export async function adminRoutes(fastify: FastifyInstance, { services }: RouteOptions) {
  // GET /logs - Recent audit records, most recent last
  fastify.get<{ Querystring: { limit: number } }>(
    '/logs',
    {
      schema: {
        description: 'Recent query audit records',
        tags: ['Analytics'],
        querystring: LimitQuerySchema(50),
      },
    },
    async (request) => {
      const logs = services.audit.recentLogs(request.query.limit).map(toAuditLog);
      return { logs, count: logs.length };
    }
  );

  // GET /analytics/dashboard - Aggregates over the audit buffer
  fastify.get<{ Querystring: { hours: number } }>(
    '/analytics/dashboard',
    {
      schema: {
        description: 'Query volume, latency, error rate and top tables/users',
        tags: ['Analytics'],
        querystring: {
          type: 'object',
          properties: {
            hours: { type: 'integer', minimum: 1, maximum: 720, default: 24 },
          },
        },
      },
    },
    async (request) => toDashboard(services.audit.dashboardStats({ windowHours: request.query.hours }))
  );

  // GET /analytics/slowest - Slowest recorded queries
  fastify.get<{ Querystring: { limit: number } }>(
    '/analytics/slowest',
    {
      schema: {
        description: 'Slowest recorded queries, slowest first',
        tags: ['Analytics'],
        querystring: LimitQuerySchema(10),
      },
    },
    async (request) => ({
      queries: services.audit.slowest(request.query.limit).map(toSlowQuery),
    })
  );

  // GET /cache/stats - Result and schema cache statistics
  fastify.get(
    '/cache/stats',
    {
      schema: {
        description: 'Result cache and schema cache statistics',
        tags: ['Cache'],
      },
    },
    async () => {
      const result = services.resultCache.stats();
      const lookups = result.hits + result.misses;
      return {
        result_cache: {
          type: services.resultCache.getType(),
          entries: result.entries,
          max_entries: result.maxEntries,
          hits: result.hits,
          misses: result.misses,
          hit_rate: lookups > 0 ? Math.round((result.hits / lookups) * 10000) / 100 : 0,
          ttl_seconds: result.ttlSeconds,
        },
        schema_cache: services.schemaCache.stats(),
      };
    }
  );

  // POST /cache/clear - Drop every cached result
  fastify.post(
    '/cache/clear',
    {
      schema: {
        description: 'Clear the result cache (admin only)',
        tags: ['Cache'],
      },
    },
    async (request) => {
      requireAdmin(resolvePrincipal(request));
      services.resultCache.clear();
      return { status: 'cleared' };
    }
  );
}
