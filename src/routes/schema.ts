/**
 * Schema endpoints.
 */

import type { FastifyInstance } from 'fastify';
import { requireAdmin, resolvePrincipal } from './principal.js';
import type { RouteOptions } from './query.js';

export async function schemaRoutes(fastify: FastifyInstance, { services }: RouteOptions) {
  // GET /schema - Tables and columns visible to the caller
  fastify.get(
    '/schema',
    {
      schema: {
        description: 'Role-filtered database schema',
        tags: ['Schema'],
      },
    },
    async (request) => {
      const principal = resolvePrincipal(request);
      const schema = await services.pipeline.visibleSchema(principal);
      return {
        tables: schema,
        count: Object.keys(schema).length,
      };
    }
  );

  // POST /schema/invalidate - Force re-introspection after DDL
  fastify.post(
    '/schema/invalidate',
    {
      schema: {
        description: 'Drop the cached schema (admin only)',
        tags: ['Schema'],
      },
    },
    async (request) => {
      requireAdmin(resolvePrincipal(request));
      services.schemaCache.invalidate();
      return { status: 'invalidated' };
    }
  );
}
