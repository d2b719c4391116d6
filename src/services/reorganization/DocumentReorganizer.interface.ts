import type { z } from 'zod';
import type { SerializedDocument } from '../serialization/HierarchySerializer.js';
import type { reorganizationPlanSchema } from './ReorganizationService.js';

export type ReorganizationPlanInput = z.input<typeof reorganizationPlanSchema>;
export type ReorganizationPlan = z.output<typeof reorganizationPlanSchema>;

/**
 * External reorganizer, typically a language model: regroups elements under
 * sections and proposes cleaned text. Its answer is validated before use.
 */
export interface DocumentReorganizer {
  reorganize(hierarchy: SerializedDocument): Promise<ReorganizationPlanInput>;
}
