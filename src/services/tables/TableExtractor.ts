import type { Logger } from 'pino';
import { silentLogger } from '../../utils/silentLogger.js';
import type { DetectionClass } from '../../domain/detections/Detection.js';
import { formatBox } from '../serialization/HierarchySerializer.js';
import { walkTree } from '../structure/tree.js';
import type { DocumentNode, HierarchyNode } from '../structure/types.js';
import type { ExtractedTable, ExtractedTables, TableField } from './types.js';

const TABLE_FIELD_CLASSES: ReadonlySet<DetectionClass> = new Set(['field', 'checkbox_context', 'title']);

export class TableExtractor {
  constructor(private logger: Logger = silentLogger) {}

  extractTables(root: DocumentNode): ExtractedTables {
    const tables: ExtractedTables = {};

    walkTree(root, (node, parent) => {
      if (node.type !== 'table') return;

      const table: ExtractedTable = {
        text: node.text ?? '',
        confidence: node.confidence,
        detection_id: node.id,
        box: formatBox(node.box),
        fields: this.collectFields(node),
        parent_id: parent.type === 'document' ? null : parent.id,
      };
      tables[node.id] = table;
    });

    this.logger.debug({ tableCount: Object.keys(tables).length }, 'Extracted tables');
    return tables;
  }

  /** Fields of a nested table belong to that table only. */
  private collectFields(table: HierarchyNode, fields: TableField[] = []): TableField[] {
    for (const node of table.children ?? []) {
      if (node.type === 'table') continue;
      if (TABLE_FIELD_CLASSES.has(node.type)) {
        fields.push({
          id: node.id,
          type: node.type,
          text: node.text ?? '',
          box: formatBox(node.box),
          confidence: node.confidence,
        });
      }
      this.collectFields(node, fields);
    }
    return fields;
  }
}
