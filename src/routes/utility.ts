/**
 * Utility endpoints (health, root).
 */

import type { FastifyInstance } from 'fastify';
import type { RouteOptions } from './query.js';

export async function utilityRoutes(fastify: FastifyInstance, { services }: RouteOptions) {
  // GET /health - Database reachability and cache state
  fastify.get('/health', async () => {
    await services.executor.ping();
    return {
      status: 'ok',
      database: {
        session: services.executor.capabilities(),
      },
      schema_cache: services.schemaCache.stats(),
      result_cache: services.resultCache.stats(),
      audit_records: services.audit.size,
    };
  });

  // GET / - Root endpoint
  fastify.get('/', async () => {
    return {
      name: 'querygate',
      version: '1.0.0',
      description: 'Safety and execution gateway for natural-language database queries',
      docs: '/docs',
    };
  });
}
