import Fastify, { type FastifyInstance } from 'fastify';
import { logger } from './utils/logger.js';
import { registerRoutes, type RouteServices } from './api/routes.js';

export async function buildServer(services: RouteServices, environment: string): Promise<FastifyInstance> {
  const fastify = Fastify();

  fastify.get('/health', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    environment,
  }));

  fastify.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      logger.warn({ url: request.url, message: error.message }, 'Request validation failed');
      return reply.code(400).send({
        error: 'VALIDATION_ERROR',
        message: error.message,
      });
    }

    logger.error({ error, url: request.url }, 'Request error');
    return reply.code(500).send({
      error: 'INTERNAL_ERROR',
      message: error.message,
    });
  });

  fastify.addHook('onResponse', async (request, reply) => {
    logger.debug(
      { method: request.method, url: request.url, statusCode: reply.statusCode, elapsed: reply.elapsedTime },
      'Request completed'
    );
  });

  await registerRoutes(fastify, services);

  return fastify;
}
