import type { Logger } from 'pino';
import { silentLogger } from '../../utils/silentLogger.js';
import { DuplicateDetectionError } from '../../utils/errors.js';
import { CONTAINER_CLASSES, type Detection } from '../../domain/detections/Detection.js';
import { area, hasPositiveExtent } from '../../domain/geometry/BoundingBox.js';
import { ContainmentClassifier } from './ContainmentClassifier.js';
import { appendChild, pruneEmptyChildren, sortChildren } from './tree.js';
import type { DocumentNode, HierarchyNode, HierarchyResult, StructureWarning } from './types.js';

export interface HierarchyBuilderOptions {
  classifier?: ContainmentClassifier;
  /** Keep the OCR text of section and table nodes. */
  keepContainerText?: boolean;
  logger?: Logger;
}

interface PlacedDetection {
  detection: Detection;
  node: HierarchyNode;
  area: number;
}

/**
 * Nests detections largest first: every detection is attached under the
 * smallest already placed detection that contains it, or under the root.
 */
export class HierarchyBuilder {
  private classifier: ContainmentClassifier;
  private keepContainerText: boolean;
  private logger: Logger;

  constructor(options: HierarchyBuilderOptions = {}) {
    this.classifier = options.classifier ?? new ContainmentClassifier();
    this.keepContainerText = options.keepContainerText ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  build(detections: readonly Detection[]): HierarchyResult {
    this.assertUniqueIds(detections);

    const warnings: StructureWarning[] = [];
    const accepted: Detection[] = [];

    for (const detection of detections) {
      if (!hasPositiveExtent(detection.box)) {
        const warning: StructureWarning = {
          code: 'DEGENERATE_BOX',
          detectionId: detection.id,
          message: `Detection ${detection.id} has a non-positive width or height and was skipped`,
        };
        warnings.push(warning);
        this.logger.warn({ detectionId: detection.id, box: detection.box }, 'Skipping degenerate detection');
        continue;
      }
      accepted.push(detection);
    }

    this.logger.debug({ counts: this.countByClass(accepted) }, 'Building hierarchy');

    const sorted = accepted
      .map(detection => ({ detection, area: area(detection.box) }))
      .sort((a, b) => b.area - a.area);

    const root: DocumentNode = { type: 'document' };
    const placed: PlacedDetection[] = [];

    for (const { detection, area: detectionArea } of sorted) {
      const node = this.toNode(detection);
      const container = this.findSmallestContainer(detection, placed);

      appendChild(container?.node ?? root, node);
      placed.push({ detection, node, area: detectionArea });
    }

    sortChildren(root);
    pruneEmptyChildren(root);

    this.logger.info(
      { placed: placed.length, skipped: warnings.length, topLevel: root.children?.length ?? 0 },
      'Hierarchy built'
    );

    return { root, warnings };
  }

  private assertUniqueIds(detections: readonly Detection[]): void {
    const seen = new Set<string>();
    for (const detection of detections) {
      if (seen.has(detection.id)) {
        this.logger.error({ detectionId: detection.id }, 'Duplicate detection id');
        throw new DuplicateDetectionError(detection.id);
      }
      seen.add(detection.id);
    }
  }

  private findSmallestContainer(detection: Detection, placed: PlacedDetection[]): PlacedDetection | undefined {
    let best: PlacedDetection | undefined;
    for (const candidate of placed) {
      if (best && candidate.area >= best.area) continue;
      if (this.classifier.contains(detection, candidate.detection)) {
        best = candidate;
      }
    }
    return best;
  }

  private toNode(detection: Detection): HierarchyNode {
    const node: HierarchyNode = {
      id: detection.id,
      type: detection.class,
      box: { ...detection.box },
      confidence: detection.confidence,
    };

    if (this.keepContainerText || !CONTAINER_CLASSES.has(detection.class)) {
      node.text = detection.text;
    }
    if (detection.filename !== undefined) {
      node.filename = detection.filename;
    }
    return node;
  }

  private countByClass(detections: Detection[]): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const detection of detections) {
      counts[detection.class] = (counts[detection.class] || 0) + 1;
    }
    return counts;
  }
}
