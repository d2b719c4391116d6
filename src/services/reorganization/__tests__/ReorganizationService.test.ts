import { describe, test, expect } from 'vitest';
import { ReorganizationService } from '../ReorganizationService.js';
import { HierarchyBuilder } from '../../structure/HierarchyBuilder.js';
import { indexTree } from '../../structure/tree.js';
import type { TreeNode } from '../../structure/types.js';
import { ValidationError } from '../../../utils/errors.js';
import { detection } from '../../../__tests__/fixtures.js';

const childIds = (node: TreeNode | undefined): string[] => (node?.children ?? []).map(child => child.id);

const { root } = new HierarchyBuilder().build([
  detection('s1', 'section', 100, 100, 200, 100),
  detection('s2', 'section', 100, 400, 200, 100),
  detection('f1', 'field', 100, 100, 40, 20, 'Name:'),
  detection('f2', 'field', 400, 400, 40, 20, 'Phone'),
]);

const service = new ReorganizationService();

describe('ReorganizationService', () => {
  test('moves listed elements under their section', () => {
    const { root: reorganized, warnings } = service.apply(root, { structure: { s2: ['f2'] } });

    expect(warnings).toEqual([]);
    expect(childIds(reorganized)).toEqual(['s1', 's2']);
    expect(childIds(indexTree(reorganized).get('s2')?.node)).toEqual(['f2']);
  });

  test('does not modify the input tree', () => {
    service.apply(root, { structure: { s2: ['f2'] } });
    expect(childIds(root)).toEqual(['s1', 's2', 'f2']);
  });

  test('replaces text in either accepted form', () => {
    const { root: reorganized } = service.apply(root, {
      cleaned_text: { f1: { cleaned: 'Full name' }, s2: 'Contact' },
    });

    const index = indexTree(reorganized);
    expect(index.get('f1')?.node.text).toBe('Full name');
    expect(index.get('s2')?.node.text).toBe('Contact');
  });

  test('skips unknown ids with a warning', () => {
    const { root: reorganized, warnings } = service.apply(root, {
      structure: { s2: ['f2', 'ghost'], s9: ['f1'] },
      cleaned_text: { nobody: 'x' },
    });

    expect(warnings.map(w => [w.code, w.detectionId])).toEqual([
      ['UNKNOWN_REFERENCE', 'ghost'],
      ['UNKNOWN_REFERENCE', 's9'],
      ['UNKNOWN_REFERENCE', 'nobody'],
    ]);
    expect(childIds(indexTree(reorganized).get('s2')?.node)).toEqual(['f2']);
  });

  test('only sections can receive elements', () => {
    const { warnings } = service.apply(root, { structure: { f1: ['f2'] } });
    expect(warnings.map(w => w.code)).toEqual(['INVALID_MOVE']);
  });

  test('refuses moves that would create a cycle', () => {
    const { root: reorganized, warnings } = service.apply(root, {
      structure: { s1: ['s2'], s2: ['s1'] },
    });

    expect(warnings.map(w => [w.code, w.detectionId])).toEqual([['INVALID_MOVE', 's1']]);
    expect(childIds(reorganized)).toEqual(['s1', 'f2']);
    expect(childIds(indexTree(reorganized).get('s1')?.node)).toEqual(['f1', 's2']);
  });

  test('rejects a malformed plan', () => {
    expect(() => service.apply(root, { structure: { s1: 'f1' } })).toThrow(ValidationError);
  });
});
