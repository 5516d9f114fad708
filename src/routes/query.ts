/**
 * Query endpoints: run a natural language question, or dry-run a statement.
 */

import type { FastifyInstance } from 'fastify';
import type { Services } from '../container.js';
import { QueryRequestSchema, ValidateRequestSchema } from '../types/models.js';
import { validate } from '../services/validator.js';
import { resolvePrincipal } from './principal.js';
import { toQueryResponse } from './serializers.js';

export interface RouteOptions {
  services: Services;
}

export async function queryRoutes(fastify: FastifyInstance, { services }: RouteOptions) {
  // POST /query - Main query endpoint
  fastify.post(
    '/query',
    {
      schema: {
        description: 'Answer a natural language question with a validated, read-only query',
        tags: ['Query'],
        body: {
          type: 'object',
          properties: {
            question: { type: 'string', minLength: 1 },
            use_cache: { type: 'boolean', default: true },
          },
          required: ['question'],
        },
      },
    },
    async (request) => {
      const principal = resolvePrincipal(request);
      const body = QueryRequestSchema.parse(request.body);

      const result = await services.pipeline.run({
        principal,
        question: body.question,
        useCache: body.use_cache,
      });
      return toQueryResponse(result);
    }
  );

  // POST /validate - Check a statement against the caller's role without running it
  fastify.post(
    '/validate',
    {
      schema: {
        description: 'Dry-run SQL validation for the caller\'s role',
        tags: ['Query'],
        body: {
          type: 'object',
          properties: {
            sql: { type: 'string', minLength: 1 },
          },
          required: ['sql'],
        },
      },
    },
    async (request) => {
      const principal = resolvePrincipal(request);
      const body = ValidateRequestSchema.parse(request.body);
      const result = validate(body.sql, services.rbac.resolve(principal), services.maxLimit);

      if (!result.ok) {
        return { valid: false, reason: result.reason };
      }
      return {
        valid: true,
        sql: result.statement.sql,
        tables: result.statement.tables,
      };
    }
  );
}
