import { readFileSync } from 'fs';
import { z, ZodError } from 'zod';
import { DETECTION_CLASSES } from '../../domain/detections/Detection.js';
import type { ContainmentRule } from '../../domain/containment/rules.js';
import { ConfigurationError } from '../../utils/errors.js';

const detectionClassSchema = z.enum(DETECTION_CLASSES);
const ratioSchema = z.number().min(0).max(1);
const pixelsSchema = z.number().nonnegative();

const containmentTestSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('tableSpan'),
    minVerticalRatio: ratioSchema,
    minHorizontalRatio: ratioSchema,
    spanMarginPx: pixelsSchema,
  }),
  z.object({
    kind: z.literal('overlap'),
    minRatio: ratioSchema,
    proximityPx: pixelsSchema.optional(),
    allowCenterPoint: z.boolean().optional(),
  }),
  z.object({
    kind: z.literal('glyphAlignment'),
    maxCenterOffsetPx: pixelsSchema,
    leftBufferPx: pixelsSchema,
  }),
]);

export const containmentRulesSchema = z
  .array(
    z.object({
      name: z.string().min(1),
      element: z.array(detectionClassSchema).min(1),
      container: z.union([z.literal('any'), z.array(detectionClassSchema).min(1)]),
      test: containmentTestSchema,
    })
  )
  .min(1);

export function parseContainmentRules(raw: unknown): ContainmentRule[] {
  try {
    return containmentRulesSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(
        'Invalid containment rule table',
        error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    throw error;
  }
}

/** Reads a recalibrated rule table; it replaces the built-in one entirely. */
export function loadContainmentRules(path: string): ContainmentRule[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read containment rules from ${path}`, error);
  }
  return parseContainmentRules(raw);
}
