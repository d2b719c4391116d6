export interface PrintableNode {
  type: string;
  text?: string;
  children?: PrintableNode[];
}

function printNode(node: PrintableNode, depth: number, lines: string[]): void {
  const text = node.text ? `: ${node.text.trim()}` : '';
  lines.push(`${'  '.repeat(depth)}${node.type}${text}`);
  for (const child of node.children ?? []) {
    printNode(child, depth + 1, lines);
  }
}

/** Indented outline, one node per line; works on built and serialized trees alike. */
export function printHierarchy(root: PrintableNode): string {
  const lines: string[] = [];
  printNode(root, 0, lines);
  return lines.join('\n');
}
