import type { Logger } from 'pino';
import { z } from 'zod';
import { silentLogger } from '../../utils/silentLogger.js';
import { ValidationError } from '../../utils/errors.js';
import { DETECTION_CLASSES, type Detection } from '../../domain/detections/Detection.js';
import type { StructureWarning } from '../structure/types.js';

const numeric = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number().finite());

export const detectionRecordSchema = z.object({
  detection_id: z.string().min(1),
  class: z.enum(DETECTION_CLASSES),
  x: numeric,
  y: numeric,
  width: numeric,
  height: numeric,
  confidence: numeric.pipe(z.number().min(0).max(1)),
  text: z
    .string()
    .nullish()
    .transform(text => text ?? ''),
  filename: z.string().optional(),
});

export type DetectionRecord = z.input<typeof detectionRecordSchema>;

export interface ParsedDetections {
  detections: Detection[];
  warnings: StructureWarning[];
}

/**
 * Boundary validation for detector/OCR output. A bad record is reported and
 * skipped so one broken crop does not cost the page.
 */
export class DetectionParser {
  constructor(private logger: Logger = silentLogger) {}

  parse(input: unknown): ParsedDetections {
    if (!Array.isArray(input)) {
      throw new ValidationError('Detections must be an array');
    }

    const detections: Detection[] = [];
    const warnings: StructureWarning[] = [];

    input.forEach((record: unknown, index: number) => {
      const result = detectionRecordSchema.safeParse(record);
      if (!result.success) {
        const problems = result.error.issues.map(issue => `${issue.path.join('.') || 'record'}: ${issue.message}`);
        const detectionId = this.peekId(record);
        warnings.push({
          code: 'MALFORMED_DETECTION',
          index,
          detectionId,
          message: `Detection at index ${index} is malformed (${problems.join('; ')})`,
        });
        this.logger.warn({ index, detectionId, problems }, 'Skipping malformed detection');
        return;
      }

      const parsed = result.data;
      const detection: Detection = {
        id: parsed.detection_id,
        class: parsed.class,
        box: { x: parsed.x, y: parsed.y, width: parsed.width, height: parsed.height },
        confidence: parsed.confidence,
        text: parsed.text,
        ...(parsed.filename !== undefined && { filename: parsed.filename }),
      };
      detections.push(detection);
    });

    this.logger.debug({ accepted: detections.length, rejected: warnings.length }, 'Parsed detections');
    return { detections, warnings };
  }

  private peekId(record: unknown): string | undefined {
    if (typeof record === 'object' && record !== null && 'detection_id' in record) {
      const id = record.detection_id;
      return typeof id === 'string' ? id : undefined;
    }
    return undefined;
  }
}
