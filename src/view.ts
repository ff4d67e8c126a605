/**
 * One-call views of a dataset: text lines, a node tree, or a drawn tree
 */

import { resolveOptions } from './core/options.js';
import type { DicomDataSet } from './core/types.js';
import { walkDataSet, type WalkOptions } from './core/walker.js';
import { LineCollector } from './sinks/textSink.js';
import { renderTreeLines } from './sinks/treeRenderer.js';
import { TreeSink, type TreeNode } from './sinks/treeSink.js';

/**
 * Text records, one string per line
 */
export function renderLines(dataset: DicomDataSet, options: WalkOptions = {}): string[] {
  const collector = new LineCollector(resolveOptions(options));
  walkDataSet(dataset, collector, options);
  return collector.lines;
}

export function buildTree(dataset: DicomDataSet, options: WalkOptions = {}): TreeNode[] {
  const sink = new TreeSink();
  walkDataSet(dataset, sink, options);
  return sink.roots;
}

/**
 * The node tree drawn with box characters
 */
export function renderTree(dataset: DicomDataSet, options: WalkOptions = {}): string[] {
  return renderTreeLines(buildTree(dataset, options));
}
