import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import type { ReorganizationService } from '../../services/reorganization/ReorganizationService.js';
import {
  deserializeHierarchy,
  serializeHierarchy,
} from '../../services/serialization/HierarchySerializer.js';
import { replyWithError } from './error-reply.js';

export interface ReorganizeBody {
  hierarchy: Record<string, unknown>;
  plan: Record<string, unknown>;
}

export function createReorganizeHandler(reorganization: ReorganizationService) {
  return async (request: FastifyRequest<{ Body: ReorganizeBody }>, reply: FastifyReply) => {
    try {
      const root = deserializeHierarchy(request.body.hierarchy);
      logger.info({ topLevel: root.children?.length ?? 0 }, 'Reorganization requested');

      const result = reorganization.apply(root, request.body.plan);
      return reply.code(200).send({
        hierarchy: serializeHierarchy(result.root),
        warnings: result.warnings,
      });
    } catch (error) {
      return replyWithError(reply, error, 'Reorganize handler');
    }
  };
}
