/**
 * Saved query endpoints. Users only see their own bookmarks.
 */

import type { FastifyInstance, FastifyReply } from 'fastify';
import { SaveQueryRequestSchema, type Principal, type SavedQuery } from '../types/models.js';
import { resolvePrincipal } from './principal.js';
import type { RouteOptions } from './query.js';
import { toQueryResponse, toSavedQuery } from './serializers.js';

const IdParamsSchema = {
  type: 'object',
  properties: {
    id: { type: 'string', description: 'Saved query identifier' },
  },
  required: ['id'],
};

function notFound(reply: FastifyReply, id: string) {
  return reply.status(404).send({
    error: 'NotFound',
    message: `Saved query '${id}' not found`,
  });
}

export async function savedQueryRoutes(fastify: FastifyInstance, { services }: RouteOptions) {
  const store = services.savedQueries;

  const owned = (principal: Principal, id: string): SavedQuery | null => {
    const saved = store.get(id);
    return saved && saved.userId === principal.id ? saved : null;
  };

  // GET /saved-queries - The caller's saved queries, newest first
  fastify.get<{ Querystring: { limit: number } }>(
    '/saved-queries',
    {
      schema: {
        description: 'List saved queries',
        tags: ['Saved Queries'],
        querystring: {
          type: 'object',
          properties: {
            limit: { type: 'integer', minimum: 1, maximum: 500, default: 50 },
          },
        },
      },
    },
    async (request) => {
      const principal = resolvePrincipal(request);
      const queries = store.listForUser(principal.id, request.query.limit).map(toSavedQuery);
      const stats = store.statsForUser(principal.id);
      return {
        queries,
        count: queries.length,
        stats: {
          total_saved: stats.totalSaved,
          most_used: stats.mostUsed.map(toSavedQuery),
        },
      };
    }
  );

  // POST /saved-queries - Bookmark a question
  fastify.post(
    '/saved-queries',
    {
      schema: {
        description: 'Save a query',
        tags: ['Saved Queries'],
        body: {
          type: 'object',
          properties: {
            name: { type: 'string', minLength: 1 },
            question: { type: 'string', minLength: 1 },
            generated_sql: { type: 'string', minLength: 1 },
          },
          required: ['name', 'question', 'generated_sql'],
        },
      },
    },
    async (request, reply) => {
      const principal = resolvePrincipal(request);
      const body = SaveQueryRequestSchema.parse(request.body);
      const saved = store.save({
        userId: principal.id,
        name: body.name,
        question: body.question,
        generatedSql: body.generated_sql,
      });
      return reply.status(201).send(toSavedQuery(saved));
    }
  );

  // GET /saved-queries/search - Match on name or question
  fastify.get<{ Querystring: { q: string } }>(
    '/saved-queries/search',
    {
      schema: {
        description: 'Search saved queries by name or question',
        tags: ['Saved Queries'],
        querystring: {
          type: 'object',
          properties: {
            q: { type: 'string', minLength: 1 },
          },
          required: ['q'],
        },
      },
    },
    async (request) => {
      const principal = resolvePrincipal(request);
      const queries = store.search(principal.id, request.query.q).map(toSavedQuery);
      return { queries, count: queries.length };
    }
  );

  // GET /saved-queries/:id
  fastify.get<{ Params: { id: string } }>(
    '/saved-queries/:id',
    {
      schema: {
        description: 'Get a saved query',
        tags: ['Saved Queries'],
        params: IdParamsSchema,
      },
    },
    async (request, reply) => {
      const saved = owned(resolvePrincipal(request), request.params.id);
      if (!saved) {
        return notFound(reply, request.params.id);
      }
      return toSavedQuery(saved);
    }
  );

  // POST /saved-queries/:id/run - Re-ask a saved question
  fastify.post<{ Params: { id: string } }>(
    '/saved-queries/:id/run',
    {
      schema: {
        description: 'Run a saved query through the full pipeline',
        tags: ['Saved Queries'],
        params: IdParamsSchema,
      },
    },
    async (request, reply) => {
      const principal = resolvePrincipal(request);
      const saved = owned(principal, request.params.id);
      if (!saved) {
        return notFound(reply, request.params.id);
      }

      const result = await services.pipeline.run({ principal, question: saved.question });
      store.recordRun(saved.id);
      return toQueryResponse(result);
    }
  );

  // DELETE /saved-queries/:id
  fastify.delete<{ Params: { id: string } }>(
    '/saved-queries/:id',
    {
      schema: {
        description: 'Delete a saved query',
        tags: ['Saved Queries'],
        params: IdParamsSchema,
      },
    },
    async (request, reply) => {
      const saved = owned(resolvePrincipal(request), request.params.id);
      if (!saved) {
        return notFound(reply, request.params.id);
      }
      store.delete(saved.id);
      return { deleted: true, id: saved.id };
    }
  );
}
