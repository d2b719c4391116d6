import { describe, test, expect, vi } from 'vitest';
import { FormStructurePipeline } from '../FormStructurePipeline.js';
import { PipelineFactory } from '../PipelineFactory.js';
import type { DocumentReorganizer } from '../../reorganization/DocumentReorganizer.interface.js';
import type { DetectionService } from '../../recognition/DetectionService.interface.js';
import type { OcrService } from '../../recognition/OcrService.interface.js';
import { printHierarchy } from '../../serialization/HierarchyPrinter.js';
import { CollaboratorError, ConfigurationError } from '../../../utils/errors.js';
import { silentLogger } from '../../../utils/silentLogger.js';
import { FORM_RECORDS, record } from '../../../__tests__/fixtures.js';

const FINAL_OUTLINE = [
  'document',
  '  section',
  '    table',
  '      field: State',
  '      field: Number',
  '      field: State1',
  '      field: 123',
  '    field: Signature',
].join('\n');

describe('FormStructurePipeline.run', () => {
  test('structures a form and labels its empty table cells', async () => {
    const result = await new FormStructurePipeline().run(FORM_RECORDS);

    expect(result.documentId).toMatch(/^form-[0-9a-f-]{36}$/);
    expect(result.processingTime).toMatch(/^\d+ms$/);
    expect(result.reorganized).toBe(false);
    expect(result.warnings).toEqual([]);
    expect(result.extractedTables.t1.fields[2].text).toBe('');
    expect(result.processedTables.t1.fields[2].text).toBe('State1');
    expect(printHierarchy(result.finalDocument)).toBe(FINAL_OUTLINE);
  });

  test('keeps the geometric hierarchy unlabelled', async () => {
    const result = await new FormStructurePipeline().run(FORM_RECORDS);
    expect(printHierarchy(result.hierarchy)).toBe(FINAL_OUTLINE.replace('field: State1', 'field'));
  });

  test('collects warnings from every stage', async () => {
    const records = [...FORM_RECORDS, record('flat', 'field', 10, 10, 0, 5), { detection_id: 'bad' }];
    const result = await new FormStructurePipeline().run(records, {
      reorganization: { structure: { s1: ['ghost'] } },
    });

    expect(result.warnings.map(w => w.code)).toEqual(['MALFORMED_DETECTION', 'DEGENERATE_BOX', 'UNKNOWN_REFERENCE']);
  });

  test('applies a supplied reorganization plan', async () => {
    const result = await new FormStructurePipeline().run(FORM_RECORDS, {
      reorganization: { cleaned_text: { o1: 'Owner signature' } },
    });

    expect(result.reorganized).toBe(true);
    expect(printHierarchy(result.finalDocument)).toBe(
      FINAL_OUTLINE.replace('Signature', 'Owner signature')
    );
  });

  test('asks the reorganizer when no plan is supplied', async () => {
    const reorganizer: DocumentReorganizer = {
      reorganize: vi.fn().mockResolvedValue({ cleaned_text: { h2: { cleaned: 'Plate number' } } }),
    };
    const result = await new FormStructurePipeline({ reorganizer }).run(FORM_RECORDS);

    expect(reorganizer.reorganize).toHaveBeenCalledTimes(1);
    expect(result.reorganized).toBe(true);
    expect(result.finalDocument.children?.[0].children?.[0].children?.[1].text).toBe('Plate number');
  });

  test('skips the reorganizer on request', async () => {
    const reorganizer: DocumentReorganizer = { reorganize: vi.fn() };
    const result = await new FormStructurePipeline({ reorganizer }).run(FORM_RECORDS, { skipReorganization: true });

    expect(reorganizer.reorganize).not.toHaveBeenCalled();
    expect(result.reorganized).toBe(false);
  });

  test('wraps reorganizer failures', async () => {
    const reorganizer: DocumentReorganizer = {
      reorganize: vi.fn().mockRejectedValue(new Error('quota exceeded')),
    };
    await expect(new FormStructurePipeline({ reorganizer }).run(FORM_RECORDS)).rejects.toThrow(CollaboratorError);
  });
});

describe('FormStructurePipeline.processImage', () => {
  const image = Buffer.from('not really a png');

  test('needs detection and OCR services', async () => {
    await expect(new FormStructurePipeline().processImage(image)).rejects.toThrow(ConfigurationError);
  });

  test('runs detection and OCR before structuring', async () => {
    const detectionService: DetectionService = {
      detect: vi.fn().mockResolvedValue(FORM_RECORDS.map(r => ({ ...r, text: '' }))),
    };
    const ocrService: OcrService = {
      recognize: vi.fn().mockResolvedValue(FORM_RECORDS),
    };

    const result = await new FormStructurePipeline({ detectionService, ocrService }).processImage(image);

    expect(detectionService.detect).toHaveBeenCalledWith(image);
    expect(ocrService.recognize).toHaveBeenCalledTimes(1);
    expect(printHierarchy(result.finalDocument)).toBe(FINAL_OUTLINE);
  });

  test('wraps collaborator failures', async () => {
    const detectionService: DetectionService = { detect: vi.fn().mockRejectedValue(new Error('model offline')) };
    const ocrService: OcrService = { recognize: vi.fn() };

    await expect(
      new FormStructurePipeline({ detectionService, ocrService }).processImage(image)
    ).rejects.toThrow(CollaboratorError);
    expect(ocrService.recognize).not.toHaveBeenCalled();
  });
});

describe('PipelineFactory', () => {
  test('builds components from configuration', async () => {
    const components = PipelineFactory.create(
      {
        structure: { defaultThreshold: 0.8, centerPointFallback: true, keepContainerText: true },
        tables: { rowTolerancePx: 5, leftMarginPx: 200 },
      },
      silentLogger
    );

    const result = await components.pipeline.run(FORM_RECORDS);
    expect(result.finalDocument.children?.[0].text).toBe('Vehicle details');
  });

  test('the pipeline runs the same stage instances it exposes', async () => {
    const components = PipelineFactory.create(
      {
        structure: { defaultThreshold: 0.8, centerPointFallback: true, keepContainerText: false },
        tables: { rowTolerancePx: 5, leftMarginPx: 200 },
      },
      silentLogger
    );
    const parse = vi.spyOn(components.parser, 'parse');
    const build = vi.spyOn(components.builder, 'build');
    const processTables = vi.spyOn(components.processor, 'processTables');
    const apply = vi.spyOn(components.reorganization, 'apply');

    await components.pipeline.run(FORM_RECORDS, { reorganization: {} });

    expect(parse).toHaveBeenCalledTimes(1);
    expect(build).toHaveBeenCalledTimes(1);
    expect(processTables).toHaveBeenCalledTimes(1);
    expect(apply).toHaveBeenCalledTimes(1);
  });
});
