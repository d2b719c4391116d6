import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import type { DetectionParser } from '../../services/ingestion/DetectionParser.js';
import type { HierarchyBuilder } from '../../services/structure/HierarchyBuilder.js';
import { serializeHierarchy } from '../../services/serialization/HierarchySerializer.js';
import { replyWithError } from './error-reply.js';

export interface StructureBody {
  detections: unknown[];
}

export function createStructureHandler(parser: DetectionParser, builder: HierarchyBuilder) {
  return async (request: FastifyRequest<{ Body: StructureBody }>, reply: FastifyReply) => {
    try {
      const { detections } = request.body;
      logger.info({ count: detections.length }, 'Structure requested');

      const parsed = parser.parse(detections);
      const built = builder.build(parsed.detections);

      return reply.code(200).send({
        hierarchy: serializeHierarchy(built.root),
        warnings: [...parsed.warnings, ...built.warnings],
      });
    } catch (error) {
      return replyWithError(reply, error, 'Structure handler');
    }
  };
}
