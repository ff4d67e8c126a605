/**
 * Tree Sink: builds a parent/child node tree that a tree widget can bind to
 */

import { formatLabel } from '../core/formatter.js';
import { createStructuralError } from '../core/errors.js';
import type { PresentationSink, ViewerRecord } from '../core/types.js';

export interface TreeNode {
  label: string;
  record: ViewerRecord;
  children: TreeNode[];
}

export class TreeSink implements PresentationSink {
  readonly roots: TreeNode[] = [];
  private readonly parents: TreeNode[][] = [this.roots];

  private get current(): TreeNode[] {
    return this.parents[this.parents.length - 1];
  }

  append(record: ViewerRecord): void {
    this.current.push({ label: formatLabel(record), record, children: [] });
  }

  beginChild(): void {
    const siblings = this.current;
    const last = siblings[siblings.length - 1];
    if (!last) {
      throw createStructuralError('beginChild called before any record was appended');
    }
    this.parents.push(last.children);
  }

  endChild(): void {
    if (this.parents.length <= 1) {
      throw createStructuralError('endChild called without a matching beginChild');
    }
    this.parents.pop();
  }
}

/**
 * Plain `{ label, children }` form of a tree, e.g. for JSON output
 */
export interface LabelTree {
  label: string;
  children?: LabelTree[];
}

export function toLabelTree(nodes: readonly TreeNode[]): LabelTree[] {
  return nodes.map((node) =>
    node.children.length > 0 ? { label: node.label, children: toLabelTree(node.children) } : { label: node.label }
  );
}
