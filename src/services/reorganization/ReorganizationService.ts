import type { Logger } from 'pino';
import { z, ZodError } from 'zod';
import { silentLogger } from '../../utils/silentLogger.js';
import { ValidationError } from '../../utils/errors.js';
import { cloneTree, indexTree, pruneEmptyChildren, sortChildren, walkTree, appendChild } from '../structure/tree.js';
import type { DocumentNode, HierarchyNode, StructureWarning, TreeNode } from '../structure/types.js';
import type { ReorganizationPlan } from './DocumentReorganizer.interface.js';

const cleanedTextSchema = z.union([
  z.string(),
  z.object({ cleaned: z.string() }).transform(value => value.cleaned),
]);

export const reorganizationPlanSchema = z.object({
  structure: z.record(z.array(z.string())).default({}),
  cleaned_text: z.record(cleanedTextSchema).default({}),
});

export interface ReorganizationResult {
  root: DocumentNode;
  warnings: StructureWarning[];
}

export function parseReorganizationPlan(raw: unknown): ReorganizationPlan {
  try {
    return reorganizationPlanSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ValidationError(
        'Invalid reorganization plan',
        error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    throw error;
  }
}

function isWithin(subtree: HierarchyNode, target: HierarchyNode): boolean {
  if (subtree === target) return true;
  let found = false;
  walkTree(subtree, node => {
    if (node === target) found = true;
  });
  return found;
}

/**
 * Applies an externally produced grouping on top of the geometric tree. The
 * geometric tree is kept for everything the plan does not mention.
 */
export class ReorganizationService {
  constructor(private logger: Logger = silentLogger) {}

  apply(root: DocumentNode, rawPlan: unknown): ReorganizationResult {
    const plan = parseReorganizationPlan(rawPlan);
    const tree = cloneTree(root);
    const index = indexTree(tree);
    const warnings: StructureWarning[] = [];

    const warn = (warning: StructureWarning): void => {
      warnings.push(warning);
      this.logger.warn({ detectionId: warning.detectionId, code: warning.code }, warning.message);
    };

    let moved = 0;
    for (const [sectionId, elementIds] of Object.entries(plan.structure)) {
      const section = index.get(sectionId)?.node;
      if (!section) {
        warn({ code: 'UNKNOWN_REFERENCE', detectionId: sectionId, message: `Unknown section ${sectionId}` });
        continue;
      }
      if (section.type !== 'section') {
        warn({
          code: 'INVALID_MOVE',
          detectionId: sectionId,
          message: `${sectionId} is a ${section.type}, not a section`,
        });
        continue;
      }

      for (const elementId of elementIds) {
        const entry = index.get(elementId);
        if (!entry) {
          warn({ code: 'UNKNOWN_REFERENCE', detectionId: elementId, message: `Unknown element ${elementId}` });
          continue;
        }
        if (entry.parent === section) continue;
        if (isWithin(entry.node, section)) {
          warn({
            code: 'INVALID_MOVE',
            detectionId: elementId,
            message: `Moving ${elementId} under ${sectionId} would create a cycle`,
          });
          continue;
        }

        this.detach(entry.parent, entry.node);
        appendChild(section, entry.node);
        index.set(elementId, { node: entry.node, parent: section });
        moved++;
      }
    }

    let cleaned = 0;
    for (const [id, text] of Object.entries(plan.cleaned_text)) {
      const node = index.get(id)?.node;
      if (!node) {
        warn({ code: 'UNKNOWN_REFERENCE', detectionId: id, message: `Cleaned text for unknown element ${id}` });
        continue;
      }
      node.text = text;
      cleaned++;
    }

    sortChildren(tree);
    pruneEmptyChildren(tree);

    this.logger.info({ moved, cleaned, warnings: warnings.length }, 'Reorganization applied');
    return { root: tree, warnings };
  }

  private detach(parent: TreeNode, node: HierarchyNode): void {
    if (!parent.children) return;
    parent.children = parent.children.filter(child => child !== node);
  }
}
