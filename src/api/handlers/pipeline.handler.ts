import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import type { FormStructurePipeline } from '../../services/pipeline/FormStructurePipeline.js';
import type { ReorganizationPlanInput } from '../../services/reorganization/DocumentReorganizer.interface.js';
import { replyWithError } from './error-reply.js';

export interface PipelineBody {
  detections: unknown[];
  reorganization?: ReorganizationPlanInput;
}

export function createPipelineHandler(pipeline: FormStructurePipeline) {
  return async (request: FastifyRequest<{ Body: PipelineBody }>, reply: FastifyReply) => {
    try {
      const { detections, reorganization } = request.body;
      logger.info({ count: detections.length, hasPlan: reorganization !== undefined }, 'Pipeline requested');

      const result = await pipeline.run(detections, { reorganization });
      return reply.code(200).send(result);
    } catch (error) {
      return replyWithError(reply, error, 'Pipeline handler');
    }
  };
}
