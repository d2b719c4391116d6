import type { DetectionClass } from '../detections/Detection.js';

/**
 * Table rows sit under their section header rather than inside it, so a table
 * is matched on overlap along each axis plus a vertical margin around the
 * container instead of on covered area.
 */
export interface TableSpanTest {
  kind: 'tableSpan';
  minVerticalRatio: number;
  minHorizontalRatio: number;
  spanMarginPx: number;
}

export interface OverlapTest {
  kind: 'overlap';
  /** Exclusive lower bound on overlapArea / elementArea. */
  minRatio: number;
  /** When set, the boxes must also be vertically close within this many pixels. */
  proximityPx?: number;
  /** Accept the element when its center point lies inside the container. */
  allowCenterPoint?: boolean;
}

/** Checkbox glyphs precede their label on the same line. */
export interface GlyphAlignmentTest {
  kind: 'glyphAlignment';
  maxCenterOffsetPx: number;
  leftBufferPx: number;
}

export type ContainmentTest = TableSpanTest | OverlapTest | GlyphAlignmentTest;

export interface ContainmentRule {
  name: string;
  element: readonly DetectionClass[];
  container: readonly DetectionClass[] | 'any';
  test: ContainmentTest;
}

export const DEFAULT_OVERLAP_THRESHOLD = 0.8;

/** Ordered: the first rule matching the class pair decides. */
export const DEFAULT_CONTAINMENT_RULES: readonly ContainmentRule[] = [
  {
    name: 'table-in-container',
    element: ['table'],
    container: 'any',
    test: { kind: 'tableSpan', minVerticalRatio: 0.3, minHorizontalRatio: 0.2, spanMarginPx: 100 },
  },
  {
    name: 'cell-in-table',
    element: ['field', 'checkbox', 'checkbox_option', 'checkbox_context'],
    container: ['table'],
    test: { kind: 'overlap', minRatio: 0.5, allowCenterPoint: true },
  },
  {
    name: 'checkbox-in-context',
    element: ['checkbox', 'checkbox_option'],
    container: ['checkbox_context'],
    test: { kind: 'overlap', minRatio: 0.1, proximityPx: 100 },
  },
  {
    name: 'option-in-context',
    element: ['checkbox_option'],
    container: ['checkbox_context'],
    test: { kind: 'overlap', minRatio: 0.2, proximityPx: 120 },
  },
  {
    name: 'checkbox-in-option',
    element: ['checkbox'],
    container: ['checkbox_option'],
    test: { kind: 'overlap', minRatio: 0.05, proximityPx: 80 },
  },
  {
    name: 'context-in-section',
    element: ['checkbox_context'],
    container: ['section'],
    test: { kind: 'overlap', minRatio: 0.3, proximityPx: 150 },
  },
];

/** Drop-in replacement for `checkbox-in-option` matching on line alignment. */
export const CHECKBOX_ALIGNMENT_TEST: GlyphAlignmentTest = {
  kind: 'glyphAlignment',
  maxCenterOffsetPx: 20,
  leftBufferPx: 30,
};

export function findContainmentRule(
  rules: readonly ContainmentRule[],
  elementClass: DetectionClass,
  containerClass: DetectionClass
): ContainmentRule | undefined {
  return rules.find(
    rule =>
      rule.element.includes(elementClass) &&
      (rule.container === 'any' || rule.container.includes(containerClass))
  );
}
