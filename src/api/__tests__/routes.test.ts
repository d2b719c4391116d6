import { describe, test, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../server.js';
import { PipelineFactory } from '../../services/pipeline/PipelineFactory.js';
import { silentLogger } from '../../utils/silentLogger.js';
import { FORM_RECORDS, record } from '../../__tests__/fixtures.js';

let fastify: FastifyInstance;

beforeAll(async () => {
  const services = PipelineFactory.create(
    {
      structure: { defaultThreshold: 0.8, centerPointFallback: true, keepContainerText: false },
      tables: { rowTolerancePx: 5, leftMarginPx: 200 },
    },
    silentLogger
  );
  fastify = await buildServer(services, 'test');
  await fastify.ready();
});

afterAll(async () => {
  await fastify.close();
});

describe('GET /health', () => {
  test('reports status and environment', async () => {
    const response = await fastify.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe('ok');
    expect(response.json().environment).toBe('test');
  });
});

describe('POST /structure', () => {
  test('returns the hierarchy and warnings', async () => {
    const response = await fastify.inject({
      method: 'POST',
      url: '/structure',
      payload: {
        detections: [record('s1', 'section', 100, 50, 200, 100), record('f1', 'field', 100, 60, 20, 10, 'Name')],
      },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      hierarchy: {
        type: 'document',
        children: [
          {
            id: 's1',
            type: 'section',
            box: '100 50 200 100',
            confidence: 0.9,
            children: [{ id: 'f1', type: 'field', text: 'Name', box: '100 60 20 10', confidence: 0.9 }],
          },
        ],
      },
      warnings: [],
    });
  });

  test('rejects a body without detections', async () => {
    const response = await fastify.inject({ method: 'POST', url: '/structure', payload: {} });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe('VALIDATION_ERROR');
  });

  test('rejects duplicate detection ids', async () => {
    const response = await fastify.inject({
      method: 'POST',
      url: '/structure',
      payload: { detections: [record('d1', 'field', 0, 0, 10, 10), record('d1', 'field', 50, 50, 10, 10)] },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: 'DUPLICATE_DETECTION',
      message: 'Duplicate detection id: d1',
      details: { detectionId: 'd1' },
    });
  });
});

describe('POST /tables/process', () => {
  test('labels empty cells', async () => {
    const response = await fastify.inject({
      method: 'POST',
      url: '/tables/process',
      payload: {
        tables: {
          t1: {
            text: '',
            confidence: 1,
            detection_id: 't1',
            box: '200 50 400 100',
            parent_id: null,
            fields: [
              { id: 'h1', type: 'field', text: 'State', box: '100 10 50 20', confidence: 1 },
              { id: 'e1', type: 'field', text: '', box: '100 30 50 20', confidence: 1 },
            ],
          },
        },
      },
    });

    expect(response.statusCode).toBe(200);
    const { tables } = response.json();
    expect(tables.t1.table_type).toBe('SingleHeader');
    expect(tables.t1.fields[1].text).toBe('State1');
  });

  test('rejects malformed tables', async () => {
    const response = await fastify.inject({
      method: 'POST',
      url: '/tables/process',
      payload: { tables: { t1: { detection_id: 't1' } } },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe('VALIDATION_ERROR');
  });
});

describe('POST /reorganize', () => {
  test('applies a plan to a saved hierarchy', async () => {
    const response = await fastify.inject({
      method: 'POST',
      url: '/reorganize',
      payload: {
        hierarchy: {
          type: 'document',
          children: [
            { id: 's1', type: 'section', box: '100 100 200 100', confidence: 1 },
            { id: 'f1', type: 'field', text: 'Phone', box: '400 400 40 20', confidence: 1 },
          ],
        },
        plan: { structure: { s1: ['f1'] } },
      },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json().hierarchy.children).toEqual([
      {
        id: 's1',
        type: 'section',
        box: '100 100 200 100',
        confidence: 1,
        children: [{ id: 'f1', type: 'field', text: 'Phone', box: '400 400 40 20', confidence: 1 }],
      },
    ]);
  });

  test('rejects a malformed hierarchy', async () => {
    const response = await fastify.inject({
      method: 'POST',
      url: '/reorganize',
      payload: { hierarchy: { type: 'page' }, plan: {} },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe('STRUCTURE_ERROR');
  });
});

describe('POST /pipeline', () => {
  test('runs every stage', async () => {
    const response = await fastify.inject({
      method: 'POST',
      url: '/pipeline',
      payload: { detections: FORM_RECORDS, reorganization: { cleaned_text: { o1: 'Owner signature' } } },
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.reorganized).toBe(true);
    expect(body.processedTables.t1.fields[2].text).toBe('State1');
    expect(body.finalDocument.children[0].children[1].text).toBe('Owner signature');
  });
});
