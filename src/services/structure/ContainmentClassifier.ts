import type { Detection } from '../../domain/detections/Detection.js';
import {
  area,
  bottom,
  containsPoint,
  horizontalOverlap,
  left,
  overlapRatio,
  right,
  top,
  verticalOverlap,
  verticallyClose,
} from '../../domain/geometry/BoundingBox.js';
import {
  DEFAULT_CONTAINMENT_RULES,
  DEFAULT_OVERLAP_THRESHOLD,
  findContainmentRule,
  type ContainmentRule,
  type GlyphAlignmentTest,
  type OverlapTest,
  type TableSpanTest,
} from '../../domain/containment/rules.js';

export type Placeable = Pick<Detection, 'class' | 'box'>;

export interface ContainmentOptions {
  rules?: readonly ContainmentRule[];
  defaultThreshold?: number;
  /** Turns off the center-point acceptance of rules that allow it. */
  centerPointFallback?: boolean;
}

export class ContainmentClassifier {
  private rules: readonly ContainmentRule[];
  private defaultThreshold: number;
  private centerPointFallback: boolean;

  constructor(options: ContainmentOptions = {}) {
    this.rules = options.rules ?? DEFAULT_CONTAINMENT_RULES;
    this.defaultThreshold = options.defaultThreshold ?? DEFAULT_OVERLAP_THRESHOLD;
    this.centerPointFallback = options.centerPointFallback ?? true;
  }

  contains(element: Placeable, container: Placeable, threshold: number = this.defaultThreshold): boolean {
    const elementArea = area(element.box);
    const containerArea = area(container.box);
    if (elementArea <= 0 || containerArea <= 0) return false;
    // A container is never smaller than what it holds.
    if (elementArea > containerArea) return false;

    const rule = findContainmentRule(this.rules, element.class, container.class);
    if (!rule) {
      return overlapRatio(element.box, container.box) > threshold;
    }

    switch (rule.test.kind) {
      case 'tableSpan':
        return this.matchesTableSpan(element, container, rule.test);
      case 'overlap':
        return this.matchesOverlap(element, container, rule.test);
      case 'glyphAlignment':
        return this.matchesAlignment(element, container, rule.test);
    }
  }

  private matchesTableSpan(element: Placeable, container: Placeable, test: TableSpanTest): boolean {
    const verticalRatio = verticalOverlap(element.box, container.box) / element.box.height;
    const horizontalRatio =
      horizontalOverlap(element.box, container.box) / Math.min(element.box.width, container.box.width);
    const withinSpan =
      top(element.box) >= top(container.box) - test.spanMarginPx &&
      bottom(element.box) <= bottom(container.box) + test.spanMarginPx;

    return verticalRatio >= test.minVerticalRatio && horizontalRatio >= test.minHorizontalRatio && withinSpan;
  }

  private matchesOverlap(element: Placeable, container: Placeable, test: OverlapTest): boolean {
    const overlapping = overlapRatio(element.box, container.box) > test.minRatio;
    const close =
      test.proximityPx === undefined || verticallyClose(element.box, container.box, test.proximityPx);

    if (overlapping && close) return true;

    return (
      this.centerPointFallback &&
      test.allowCenterPoint === true &&
      containsPoint(container.box, element.box.x, element.box.y)
    );
  }

  private matchesAlignment(element: Placeable, container: Placeable, test: GlyphAlignmentTest): boolean {
    const aligned = Math.abs(element.box.y - container.box.y) < test.maxCenterOffsetPx;
    const precedesLabel = right(element.box) < left(container.box) + test.leftBufferPx;
    return aligned && precedesLabel;
  }
}
