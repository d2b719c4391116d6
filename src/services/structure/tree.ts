import type { DocumentNode, HierarchyNode, TreeNode } from './types.js';

export function appendChild(parent: TreeNode, child: HierarchyNode): void {
  if (parent.children) {
    parent.children.push(child);
  } else {
    parent.children = [child];
  }
}

const readingOrder = (a: HierarchyNode, b: HierarchyNode): number =>
  a.box.y - b.box.y || a.box.x - b.box.x;

/** Top to bottom, then left to right, at every level. */
export function sortChildren(node: TreeNode): void {
  if (!node.children) return;
  node.children.sort(readingOrder);
  for (const child of node.children) {
    sortChildren(child);
  }
}

export function pruneEmptyChildren(node: TreeNode): void {
  if (!node.children) return;
  if (node.children.length === 0) {
    delete node.children;
    return;
  }
  for (const child of node.children) {
    pruneEmptyChildren(child);
  }
}

export function walkTree(
  node: TreeNode,
  visit: (node: HierarchyNode, parent: TreeNode, depth: number) => void,
  depth: number = 0
): void {
  for (const child of node.children ?? []) {
    visit(child, node, depth);
    walkTree(child, visit, depth + 1);
  }
}

export function cloneTree(root: DocumentNode): DocumentNode {
  return structuredClone(root);
}

export function indexTree(root: DocumentNode): Map<string, { node: HierarchyNode; parent: TreeNode }> {
  const index = new Map<string, { node: HierarchyNode; parent: TreeNode }>();
  walkTree(root, (node, parent) => {
    index.set(node.id, { node, parent });
  });
  return index;
}
