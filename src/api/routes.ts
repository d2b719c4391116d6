import type { FastifyInstance } from 'fastify';
import { createStructureHandler, type StructureBody } from './handlers/structure.handler.js';
import { createProcessTablesHandler, type ProcessTablesBody } from './handlers/tables.handler.js';
import { createPipelineHandler, type PipelineBody } from './handlers/pipeline.handler.js';
import { createReorganizeHandler, type ReorganizeBody } from './handlers/reorganize.handler.js';
import { errorResponses } from './schemas/common.schema.js';
import {
  structureRequestSchema,
  processTablesRequestSchema,
  pipelineRequestSchema,
  reorganizeRequestSchema,
} from './schemas/structure.schema.js';
import type { DetectionParser } from '../services/ingestion/DetectionParser.js';
import type { HierarchyBuilder } from '../services/structure/HierarchyBuilder.js';
import type { TableProcessor } from '../services/tables/TableProcessor.js';
import type { ReorganizationService } from '../services/reorganization/ReorganizationService.js';
import type { FormStructurePipeline } from '../services/pipeline/FormStructurePipeline.js';

export interface RouteServices {
  parser: DetectionParser;
  builder: HierarchyBuilder;
  processor: TableProcessor;
  reorganization: ReorganizationService;
  pipeline: FormStructurePipeline;
}

export async function registerRoutes(fastify: FastifyInstance, services: RouteServices) {
  fastify.post<{ Body: StructureBody }>('/structure', {
    schema: {
      body: structureRequestSchema,
      response: errorResponses,
    },
    handler: createStructureHandler(services.parser, services.builder),
  });

  fastify.post<{ Body: ProcessTablesBody }>('/tables/process', {
    schema: {
      body: processTablesRequestSchema,
      response: errorResponses,
    },
    handler: createProcessTablesHandler(services.processor),
  });

  fastify.post<{ Body: ReorganizeBody }>('/reorganize', {
    schema: {
      body: reorganizeRequestSchema,
      response: errorResponses,
    },
    handler: createReorganizeHandler(services.reorganization),
  });

  fastify.post<{ Body: PipelineBody }>('/pipeline', {
    schema: {
      body: pipelineRequestSchema,
      response: errorResponses,
    },
    handler: createPipelineHandler(services.pipeline),
  });
}
