/**
 * Box-drawing rendering of tree sink output for terminals
 */

import type { TreeNode } from './treeSink.js';

export const BOX = {
  branch: '├── ',
  last: '└── ',
  pipe: '│   ',
  space: '    ',
} as const;

interface PendingNode {
  node: TreeNode;
  prefix: string;
  isLast: boolean;
}

/**
 * Render nodes as lines; roots carry no connector
 */
export function renderTreeLines(roots: readonly TreeNode[]): string[] {
  const lines: string[] = [];
  const stack: Array<PendingNode | { root: TreeNode }> = [];

  for (let i = roots.length - 1; i >= 0; i--) {
    stack.push({ root: roots[i] });
  }

  const pushChildren = (node: TreeNode, prefix: string): void => {
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push({ node: node.children[i], prefix, isLast: i === node.children.length - 1 });
    }
  };

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) {
      break;
    }
    if ('root' in entry) {
      lines.push(entry.root.label);
      pushChildren(entry.root, '');
      continue;
    }
    const { node, prefix, isLast } = entry;
    lines.push(`${prefix}${isLast ? BOX.last : BOX.branch}${node.label}`);
    pushChildren(node, prefix + (isLast ? BOX.space : BOX.pipe));
  }

  return lines;
}
