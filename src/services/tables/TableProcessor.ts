import type { Logger } from 'pino';
import { z, ZodError } from 'zod';
import { silentLogger } from '../../utils/silentLogger.js';
import { ValidationError } from '../../utils/errors.js';
import { DETECTION_CLASSES } from '../../domain/detections/Detection.js';
import { parseBox } from '../serialization/HierarchySerializer.js';
import { cloneTree, walkTree } from '../structure/tree.js';
import type { DocumentNode, HierarchyNode, StructureWarning } from '../structure/types.js';
import { TableLayoutEngine } from './TableLayoutEngine.js';
import type { ExtractedTable, ExtractedTables, ProcessedTable, ProcessedTables, TableCell } from './types.js';

const tableFieldSchema = z.object({
  id: z.string().min(1),
  type: z.enum(DETECTION_CLASSES),
  text: z
    .string()
    .nullish()
    .transform(text => text ?? ''),
  box: z.string(),
  confidence: z.number().min(0).max(1),
});

export const extractedTablesSchema = z.record(
  z.object({
    text: z.string().default(''),
    confidence: z.number().min(0).max(1),
    detection_id: z.string().min(1),
    box: z.string(),
    fields: z.array(tableFieldSchema),
    parent_id: z.string().nullable().default(null),
  })
);

export function parseExtractedTables(raw: unknown): ExtractedTables {
  try {
    return extractedTablesSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ValidationError(
        'Invalid extracted tables',
        error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    throw error;
  }
}

export interface MergeResult {
  root: DocumentNode;
  warnings: StructureWarning[];
}

export class TableProcessor {
  constructor(
    private engine: TableLayoutEngine = new TableLayoutEngine(),
    private logger: Logger = silentLogger
  ) {}

  /** Labels empty cells of every table; the input tables are left untouched. */
  processTables(extracted: ExtractedTables): ProcessedTables {
    const processed: ProcessedTables = {};

    for (const [tableId, table] of Object.entries(extracted)) {
      processed[tableId] = this.processTable(tableId, table);
    }

    this.logger.info({ tableCount: Object.keys(processed).length }, 'Table parsing complete');
    return processed;
  }

  processTable(tableId: string, table: ExtractedTable): ProcessedTable {
    const copy = structuredClone(table);
    const cells = this.toCells(tableId, copy);
    const tableType = this.engine.inferTableType(cells);
    const context = this.engine.synthesizeContext(cells, tableType);

    let filled = 0;
    for (const field of copy.fields) {
      const label = context.get(field.id);
      if (label !== undefined && field.text.trim() === '') {
        field.text = label;
        filled++;
      }
    }

    this.logger.debug({ tableId, tableType, filled }, 'Processed table');
    return { ...copy, table_type: tableType };
  }

  /** Copies processed field texts into the matching table subtrees of a new tree. */
  mergeProcessedTables(root: DocumentNode, processed: ProcessedTables): MergeResult {
    const merged = cloneTree(root);
    const warnings: StructureWarning[] = [];
    const tableNodes = new Map<string, HierarchyNode>();

    walkTree(merged, node => {
      if (node.type === 'table') tableNodes.set(node.id, node);
    });

    for (const [tableId, table] of Object.entries(processed)) {
      const tableNode = tableNodes.get(tableId);
      if (!tableNode) {
        warnings.push({
          code: 'UNKNOWN_REFERENCE',
          detectionId: tableId,
          message: `Processed table ${tableId} is not in the document`,
        });
        this.logger.warn({ tableId }, 'Processed table not found in hierarchy');
        continue;
      }

      const texts = new Map(table.fields.map(field => [field.id, field.text]));
      walkTree(tableNode, node => {
        const text = texts.get(node.id);
        if (text !== undefined) node.text = text;
      });
    }

    return { root: merged, warnings };
  }

  private toCells(tableId: string, table: ExtractedTable): TableCell[] {
    const cells: TableCell[] = [];
    for (const field of table.fields) {
      try {
        cells.push({ id: field.id, type: field.type, text: field.text, box: parseBox(field.box) });
      } catch (error) {
        this.logger.warn({ tableId, fieldId: field.id, error }, 'Skipping table field with unreadable box');
      }
    }
    return cells;
  }
}
