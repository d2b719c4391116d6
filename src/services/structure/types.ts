import type { DetectionClass } from '../../domain/detections/Detection.js';
import type { BoundingBox } from '../../domain/geometry/BoundingBox.js';

export interface HierarchyNode {
  id: string;
  type: DetectionClass;
  /** Absent on section and table nodes unless container text is kept. */
  text?: string;
  box: BoundingBox;
  confidence: number;
  filename?: string;
  /** Absent, never empty, on leaves. */
  children?: HierarchyNode[];
}

export interface DocumentNode {
  type: 'document';
  children?: HierarchyNode[];
}

export type TreeNode = DocumentNode | HierarchyNode;

export type StructureWarningCode =
  | 'MALFORMED_DETECTION'
  | 'DEGENERATE_BOX'
  | 'UNKNOWN_REFERENCE'
  | 'INVALID_MOVE';

export interface StructureWarning {
  code: StructureWarningCode;
  message: string;
  detectionId?: string;
  index?: number;
}

export interface HierarchyResult {
  root: DocumentNode;
  warnings: StructureWarning[];
}
