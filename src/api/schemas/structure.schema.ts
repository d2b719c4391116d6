import { detectionRecordsSchema } from './common.schema.js';

export const structureRequestSchema = {
  type: 'object',
  properties: {
    detections: detectionRecordsSchema,
  },
  required: ['detections'],
} as const;

export const processTablesRequestSchema = {
  type: 'object',
  properties: {
    tables: { type: 'object' },
  },
  required: ['tables'],
} as const;

export const pipelineRequestSchema = {
  type: 'object',
  properties: {
    detections: detectionRecordsSchema,
    reorganization: {
      type: 'object',
      properties: {
        structure: { type: 'object' },
        cleaned_text: { type: 'object' },
      },
    },
  },
  required: ['detections'],
} as const;

export const reorganizeRequestSchema = {
  type: 'object',
  properties: {
    hierarchy: { type: 'object' },
    plan: { type: 'object' },
  },
  required: ['hierarchy', 'plan'],
} as const;
