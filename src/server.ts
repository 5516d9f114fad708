/**
 * Fastify application factory.
 */

import Fastify from 'fastify';
import type { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ZodError } from 'zod';
import type { Config } from './config.js';
import { createServices, type Services } from './container.js';
import { adminRoutes } from './routes/admin.js';
import { queryRoutes } from './routes/query.js';
import { savedQueryRoutes } from './routes/saved-queries.js';
import { schemaRoutes } from './routes/schema.js';
import { utilityRoutes } from './routes/utility.js';
import {
  AuthorizationDenied,
  ExecutionFailed,
  ServiceUnavailable,
  UpstreamGenerationFailed,
  ValidationRejected,
} from './types/errors.js';
import { logger, loggerOptions } from './utils/logger.js';

export interface ServerOptions {
  /** Request logging; off for in-process tests. */
  logger?: boolean;
  /** Serve OpenAPI docs at /docs. */
  docs?: boolean;
}

export async function buildServer(
  services: Services,
  options: ServerOptions = {}
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger === false ? false : loggerOptions,
  });

  /**
   * Register CORS plugin.
   */
  await fastify.register(cors, {
    origin: '*',
  });

  /**
   * Register Swagger documentation.
   */
  if (options.docs !== false) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: 'querygate API',
          description: 'Validated, role-scoped, read-only SQL from natural language questions',
          version: '1.0.0',
        },
      },
    });

    await fastify.register(swaggerUi, {
      routePrefix: '/docs',
    });
  }

  /**
   * Global error handler: one body shape for every failure.
   * Set before the route plugins so their contexts inherit it.
   */
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ValidationRejected) {
      reply.status(400).send({
        error: 'ValidationRejected',
        message: error.message,
        suggestion: 'Rephrase the question so it only reads from tables you can access',
      });
    } else if (error instanceof AuthorizationDenied) {
      reply.status(403).send({
        error: 'AuthorizationDenied',
        message: error.message,
      });
    } else if (error instanceof ExecutionFailed) {
      request.log.error({ detail: error.detail }, 'Query execution failed');
      reply.status(500).send({
        error: 'ExecutionFailed',
        message: services.production ? 'Query execution failed' : error.message,
      });
    } else if (error instanceof UpstreamGenerationFailed) {
      reply.status(502).send({
        error: 'UpstreamGenerationFailed',
        message: 'Language model service unavailable',
        detail: error.message,
      });
    } else if (error instanceof ServiceUnavailable) {
      reply.status(503).send({
        error: 'ServiceUnavailable',
        message: error.message,
      });
    } else if (error instanceof ZodError) {
      reply.status(400).send({
        error: 'ValidationError',
        message: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      });
    } else if (error.validation) {
      reply.status(400).send({
        error: 'ValidationError',
        message: error.message,
      });
    } else if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({
        error: error.name,
        message: error.message,
      });
    } else {
      request.log.error(error);
      reply.status(500).send({
        error: 'InternalServerError',
        message: services.production ? 'An unexpected error occurred' : error.message,
      });
    }
  });

  /**
   * Register route handlers.
   */
  await fastify.register(queryRoutes, { services });
  await fastify.register(schemaRoutes, { services });
  await fastify.register(adminRoutes, { services });
  await fastify.register(savedQueryRoutes, { services });
  await fastify.register(utilityRoutes, { services });

  /**
   * Lifecycle hooks.
   */
  fastify.addHook('onClose', async () => {
    await services.close();
  });

  return fastify;
}

/**
 * Build the services and the server, then listen until SIGINT/SIGTERM.
 */
export async function startServer(config: Config, port: number = config.PORT): Promise<FastifyInstance> {
  logger.info('Starting querygate API server...');
  const services = createServices(config);
  const fastify = await buildServer(services);

  await fastify.listen({ port, host: config.HOST });
  logger.info(`Server running at http://localhost:${port}`);
  logger.info(`API docs at http://localhost:${port}/docs`);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    fastify.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error(`Shutdown failed: ${error}`);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return fastify;
}
