import type { Detection, DetectionClass } from '../domain/detections/Detection.js';
import type { DetectionRecord } from '../services/ingestion/DetectionParser.js';
import type { TableCell } from '../services/tables/types.js';

export function detection(
  id: string,
  cls: DetectionClass,
  x: number,
  y: number,
  width: number,
  height: number,
  text: string = ''
): Detection {
  return { id, class: cls, box: { x, y, width, height }, confidence: 0.9, text };
}

export function record(
  id: string,
  cls: DetectionClass,
  x: number,
  y: number,
  width: number,
  height: number,
  text: string = ''
): DetectionRecord {
  return { detection_id: id, class: cls, x, y, width, height, confidence: 0.9, text };
}

export function cell(id: string, text: string, x: number, y: number, type: DetectionClass = 'field'): TableCell {
  return { id, type, text, box: { x, y, width: 50, height: 20 } };
}

/** A section holding a two-row table with one empty cell, plus a field below the table. */
export const FORM_RECORDS: DetectionRecord[] = [
  record('s1', 'section', 300, 200, 600, 400, 'Vehicle details'),
  record('t1', 'table', 300, 250, 500, 200, 'Registration'),
  record('h1', 'field', 100, 170, 60, 20, 'State'),
  record('h2', 'field', 250, 170, 60, 20, 'Number'),
  record('d1', 'field', 100, 200, 60, 20, ''),
  record('d2', 'field', 250, 200, 60, 20, '123'),
  record('o1', 'field', 300, 380, 100, 20, 'Signature'),
];
