import type { BoundingBox } from '../../domain/geometry/BoundingBox.js';
import type { DetectionClass } from '../../domain/detections/Detection.js';
import { z } from 'zod';
import { DETECTION_CLASSES } from '../../domain/detections/Detection.js';
import { StructureError, ValidationError } from '../../utils/errors.js';
import type { DocumentNode, HierarchyNode } from '../structure/types.js';

export interface SerializedNode {
  id: string;
  type: DetectionClass;
  text?: string;
  box: string;
  confidence: number;
  filename?: string;
  children?: SerializedNode[];
}

export interface SerializedDocument {
  type: 'document';
  children?: SerializedNode[];
}

/** `"x y width height"`, center based. */
export function formatBox(box: BoundingBox): string {
  return `${box.x} ${box.y} ${box.width} ${box.height}`;
}

export function parseBox(value: string): BoundingBox {
  const parts = value.trim().split(/\s+/).map(Number);
  if (parts.length !== 4 || parts.some(part => !Number.isFinite(part))) {
    throw new ValidationError(`Invalid box "${value}": expected four numbers`);
  }
  const [x, y, width, height] = parts;
  return { x, y, width, height };
}

function serializeNode(node: HierarchyNode): SerializedNode {
  const serialized: SerializedNode = {
    id: node.id,
    type: node.type,
    box: formatBox(node.box),
    confidence: node.confidence,
  };
  if (node.text !== undefined) serialized.text = node.text;
  if (node.filename !== undefined) serialized.filename = node.filename;
  if (node.children && node.children.length > 0) {
    serialized.children = node.children.map(serializeNode);
  }
  return serialized;
}

export function serializeHierarchy(root: DocumentNode): SerializedDocument {
  const document: SerializedDocument = { type: 'document' };
  if (root.children && root.children.length > 0) {
    document.children = root.children.map(serializeNode);
  }
  return document;
}

const serializedNodeSchema: z.ZodType<SerializedNode> = z.lazy(() =>
  z.object({
    id: z.string().min(1),
    type: z.enum(DETECTION_CLASSES),
    text: z.string().optional(),
    box: z.string(),
    confidence: z.number(),
    filename: z.string().optional(),
    children: z.array(serializedNodeSchema).optional(),
  })
);

const serializedDocumentSchema = z.object({
  type: z.literal('document'),
  children: z.array(serializedNodeSchema).optional(),
});

function deserializeNode(node: SerializedNode): HierarchyNode {
  let box: BoundingBox;
  try {
    box = parseBox(node.box);
  } catch {
    throw new StructureError(`Node ${node.id} has an unreadable box`, { id: node.id, box: node.box });
  }

  const restored: HierarchyNode = { id: node.id, type: node.type, box, confidence: node.confidence };
  if (node.text !== undefined) restored.text = node.text;
  if (node.filename !== undefined) restored.filename = node.filename;
  if (node.children && node.children.length > 0) {
    restored.children = node.children.map(deserializeNode);
  }
  return restored;
}

/** Reads back a serialized hierarchy; the root must be a document node. */
export function deserializeHierarchy(raw: unknown): DocumentNode {
  const result = serializedDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new StructureError(
      'Malformed hierarchy',
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const root: DocumentNode = { type: 'document' };
  if (result.data.children && result.data.children.length > 0) {
    root.children = result.data.children.map(deserializeNode);
  }
  return root;
}
