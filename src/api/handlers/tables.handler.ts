import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import { parseExtractedTables, type TableProcessor } from '../../services/tables/TableProcessor.js';
import { replyWithError } from './error-reply.js';

export interface ProcessTablesBody {
  tables: Record<string, unknown>;
}

export function createProcessTablesHandler(processor: TableProcessor) {
  return async (request: FastifyRequest<{ Body: ProcessTablesBody }>, reply: FastifyReply) => {
    try {
      const tables = parseExtractedTables(request.body.tables);
      logger.info({ tableCount: Object.keys(tables).length }, 'Table processing requested');

      return reply.code(200).send({ tables: processor.processTables(tables) });
    } catch (error) {
      return replyWithError(reply, error, 'Tables handler');
    }
  };
}
