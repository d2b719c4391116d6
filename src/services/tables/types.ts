import type { DetectionClass } from '../../domain/detections/Detection.js';
import type { BoundingBox } from '../../domain/geometry/BoundingBox.js';

export type TableType = 'SingleHeader' | 'TwoAxis' | 'NumberedRows';

export interface TableField {
  id: string;
  type: DetectionClass;
  text: string;
  box: string;
  confidence: number;
}

export interface ExtractedTable {
  text: string;
  confidence: number;
  detection_id: string;
  box: string;
  fields: TableField[];
  /** Id of the enclosing node, null for tables directly under the document. */
  parent_id: string | null;
}

export interface ProcessedTable extends ExtractedTable {
  table_type: TableType;
}

export type ExtractedTables = Record<string, ExtractedTable>;
export type ProcessedTables = Record<string, ProcessedTable>;

export interface TableCell {
  id: string;
  type: DetectionClass;
  text: string;
  box: BoundingBox;
}

export interface TableRow {
  /** Center y of the cell that opened the row. */
  y: number;
  cells: TableCell[];
}
