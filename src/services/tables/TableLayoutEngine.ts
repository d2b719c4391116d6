import type { Logger } from 'pino';
import { silentLogger } from '../../utils/silentLogger.js';
import type { TableCell, TableRow, TableType } from './types.js';

export const UNKNOWN_FIELD_LABEL = 'Unknown field';

const ROW_NUMBER_PATTERN = /^\d+\.?$/;

export interface TableLayoutOptions {
  /** Cells whose center y is within this band of a row's anchor join that row. */
  rowTolerancePx?: number;
  /** Only cells centered left of this x can label a row. */
  leftMarginPx?: number;
  unknownLabel?: string;
  logger?: Logger;
}

interface ColumnHeader {
  x: number;
  text: string;
}

interface TableAnalysis {
  rows: TableRow[];
  /** -1 when no row holds any text. */
  headerIndex: number;
}

const isEmpty = (text: string): boolean => text.trim() === '';

/**
 * Positional inference over one table: decides which axis carries the
 * headers, then names every empty cell after its column header and row label.
 */
export class TableLayoutEngine {
  private rowTolerancePx: number;
  private leftMarginPx: number;
  private unknownLabel: string;
  private logger: Logger;

  constructor(options: TableLayoutOptions = {}) {
    this.rowTolerancePx = options.rowTolerancePx ?? 5;
    this.leftMarginPx = options.leftMarginPx ?? 200;
    this.unknownLabel = options.unknownLabel ?? UNKNOWN_FIELD_LABEL;
    this.logger = options.logger ?? silentLogger;
  }

  /** Title cells are never row members. */
  groupRows(cells: readonly TableCell[]): TableRow[] {
    const rows: TableRow[] = [];
    const ordered = cells
      .filter(cell => cell.type !== 'title')
      .sort((a, b) => a.box.y - b.box.y || a.box.x - b.box.x);

    for (const cell of ordered) {
      const row = rows.find(candidate => Math.abs(cell.box.y - candidate.y) < this.rowTolerancePx);
      if (row) {
        row.cells.push(cell);
      } else {
        rows.push({ y: cell.box.y, cells: [cell] });
      }
    }

    rows.sort((a, b) => a.y - b.y);
    for (const row of rows) {
      row.cells.sort((a, b) => a.box.x - b.box.x);
    }
    return rows;
  }

  inferTableType(cells: readonly TableCell[]): TableType {
    const { rows, headerIndex } = this.analyze(cells);
    if (headerIndex === -1) return 'SingleHeader';

    const dataLabels = rows
      .slice(headerIndex + 1)
      .map(row => this.rowLabel(row))
      .filter((label): label is string => label !== undefined);

    if (dataLabels.length > 0 && dataLabels.every(label => ROW_NUMBER_PATTERN.test(label))) {
      return 'NumberedRows';
    }

    const headerLabel = this.rowLabel(rows[headerIndex]);
    const labelColumn = new Set(headerLabel === undefined ? dataLabels : [headerLabel, ...dataLabels]);
    if (labelColumn.size > 1) {
      return 'TwoAxis';
    }

    return 'SingleHeader';
  }

  /** Returns a label for every empty cell, keyed by cell id. */
  synthesizeContext(cells: readonly TableCell[], tableType: TableType): Map<string, string> {
    const context = new Map<string, string>();
    const { rows, headerIndex } = this.analyze(cells);

    if (headerIndex === -1) {
      this.logger.debug({ cellCount: cells.length }, 'No header row, skipping context synthesis');
      return context;
    }

    const columnHeaders: ColumnHeader[] = rows[headerIndex].cells
      .filter(cell => !isEmpty(cell.text))
      .map(cell => ({ x: cell.box.x, text: cell.text.trim() }));

    for (const row of rows.slice(0, headerIndex + 1)) {
      for (const cell of row.cells) {
        if (isEmpty(cell.text)) context.set(cell.id, this.unknownLabel);
      }
    }

    const dataRows = rows.slice(headerIndex + 1);
    const labels = this.resolveRowLabels(dataRows, tableType);

    dataRows.forEach((row, index) => {
      const rowIndex = index + 1;
      const label = labels[index];

      for (const cell of row.cells) {
        if (!isEmpty(cell.text)) continue;
        const column = this.nearestColumn(columnHeaders, cell.box.x);
        context.set(cell.id, this.formatContext(tableType, column, label, rowIndex));
      }
    });

    this.logger.debug({ tableType, labelled: context.size }, 'Synthesized table context');
    return context;
  }

  private formatContext(
    tableType: TableType,
    column: ColumnHeader | undefined,
    label: string | undefined,
    rowIndex: number
  ): string {
    if (!column) return this.unknownLabel;

    switch (tableType) {
      case 'SingleHeader':
        return label === undefined ? `${column.text}${rowIndex}` : `${label} - ${column.text}`;
      case 'NumberedRows': {
        const rowNumber =
          label !== undefined && ROW_NUMBER_PATTERN.test(label) ? label.replace(/\.$/, '') : String(rowIndex);
        return `${column.text}${rowNumber}`;
      }
      case 'TwoAxis':
        return label === undefined ? this.unknownLabel : `${label} ${column.text}`;
    }
  }

  /** TwoAxis rows without a label borrow the one of the nearest labelled row. */
  private resolveRowLabels(dataRows: TableRow[], tableType: TableType): Array<string | undefined> {
    const own = dataRows.map(row => this.rowLabel(row));
    if (tableType !== 'TwoAxis') return own;

    return dataRows.map((row, index) => {
      const label = own[index];
      if (label !== undefined) return label;

      let nearest: string | undefined;
      let nearestDistance = Infinity;
      dataRows.forEach((candidate, candidateIndex) => {
        const candidateLabel = own[candidateIndex];
        if (candidateLabel === undefined) return;
        const distance = Math.abs(candidate.y - row.y);
        if (distance < nearestDistance) {
          nearestDistance = distance;
          nearest = candidateLabel;
        }
      });
      return nearest;
    });
  }

  private rowLabel(row: TableRow): string | undefined {
    let leftmost: TableCell | undefined;
    for (const cell of row.cells) {
      if (isEmpty(cell.text) || cell.box.x >= this.leftMarginPx) continue;
      if (!leftmost || cell.box.x < leftmost.box.x) leftmost = cell;
    }
    return leftmost?.text.trim();
  }

  private nearestColumn(headers: ColumnHeader[], x: number): ColumnHeader | undefined {
    let nearest: ColumnHeader | undefined;
    for (const header of headers) {
      if (!nearest || Math.abs(header.x - x) < Math.abs(nearest.x - x)) nearest = header;
    }
    return nearest;
  }

  private analyze(cells: readonly TableCell[]): TableAnalysis {
    const rows = this.groupRows(cells);
    const headerIndex = rows.findIndex(row => row.cells.some(cell => !isEmpty(cell.text)));
    return { rows, headerIndex };
  }
}
