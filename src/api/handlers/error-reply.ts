import type { FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import { isClientError } from '../../utils/errors.js';

export function replyWithError(reply: FastifyReply, error: unknown, context: string) {
  if (isClientError(error)) {
    logger.warn({ code: error.code, message: error.message }, `${context} rejected`);
    return reply.code(400).send({
      error: error.code,
      message: error.message,
      details: error.details,
    });
  }

  logger.error({ error }, `${context} error`);
  return reply.code(500).send({
    error: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : 'Unknown error',
  });
}
