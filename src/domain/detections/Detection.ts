import type { BoundingBox } from '../geometry/BoundingBox.js';

export const DETECTION_CLASSES = [
  'section',
  'table',
  'field',
  'checkbox_context',
  'checkbox_option',
  'checkbox',
  'title',
] as const;

export type DetectionClass = (typeof DETECTION_CLASSES)[number];

/**
 * One classified region returned by the upstream detector, with the text OCR
 * produced for its snippet. Only `text` may change after parsing.
 */
export interface Detection {
  readonly id: string;
  readonly class: DetectionClass;
  readonly box: BoundingBox;
  readonly confidence: number;
  text: string;
  readonly filename?: string;
}

/** Classes whose own OCR text is usually a noisy crop of a header. */
export const CONTAINER_CLASSES: ReadonlySet<DetectionClass> = new Set(['section', 'table']);
