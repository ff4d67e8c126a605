/**
 * Tree Walker: depth-first traversal of a dataset into presentation records
 *
 * Uses an explicit work stack rather than recursion, so nesting depth is
 * bounded by `maxDepth` and not by the call stack.
 */

import { isBinary, isBulkSampleTag } from './binaryClassifier.js';
import { RenderError } from './errors.js';
import { renderValue, UNRENDERABLE_VALUE } from './formatter.js';
import { resolveOptions, type ResolvedViewerOptions, type ViewerOptions } from './options.js';
import type {
  DicomDataSet,
  DicomElement,
  ElementRecord,
  NameResolver,
  PresentationSink,
  RecordStatus,
} from './types.js';
import { assertDataSet } from './validate.js';
import { createNameResolver } from '../utils/dictionary.js';
import { formatTag } from '../utils/tagUtils.js';

export interface WalkOptions extends ViewerOptions {
  /** Name lookup for elements that carry no name; defaults to "Unknown" for every tag */
  resolveName?: NameResolver;
  /** Called for each element whose value could not be rendered */
  onRenderError?: (error: RenderError, element: DicomElement) => void;
}

type WalkTask =
  | { kind: 'dataset'; dataset: DicomDataSet; depth: number }
  | { kind: 'element'; element: DicomElement; depth: number }
  | { kind: 'item'; dataset: DicomDataSet; index: number; depth: number }
  | { kind: 'close' };

interface WalkContext {
  sink: PresentationSink;
  options: ResolvedViewerOptions;
  resolveName: NameResolver;
  onRenderError?: (error: RenderError, element: DicomElement) => void;
}

function toRenderError(error: unknown, element: DicomElement): RenderError {
  if (error instanceof RenderError) {
    return error;
  }
  const cause = error instanceof Error ? error : undefined;
  return new RenderError(cause ? cause.message : String(error), formatTag(element.tag), cause);
}

function elementRecord(element: DicomElement, depth: number, context: WalkContext): ElementRecord {
  let value: string;
  let status: RecordStatus;

  try {
    value = renderValue(element, context.options);
    if (element.value.kind === 'sequence') {
      status = 'sequence';
    } else {
      status = isBinary(element, context.options) ? 'binary' : 'value';
    }
  } catch (error) {
    const renderError = toRenderError(error, element);
    context.onRenderError?.(renderError, element);
    value = UNRENDERABLE_VALUE;
    status = 'error';
  }

  return {
    kind: 'element',
    depth,
    tag: element.tag,
    name: element.name ?? context.resolveName(element.tag),
    vr: element.vr,
    value,
    status,
  };
}

function processElement(element: DicomElement, depth: number, stack: WalkTask[], context: WalkContext): void {
  const { sink, options } = context;

  if (options.omitPixelData && isBulkSampleTag(element.tag)) {
    return;
  }

  sink.append(elementRecord(element, depth, context));

  if (element.value.kind !== 'sequence') {
    return;
  }

  // Items pop in order; the close pops after the last item
  const items = element.value.items;
  stack.push({ kind: 'close' });
  for (let i = items.length - 1; i >= 0; i--) {
    stack.push({ kind: 'item', dataset: items[i], index: i + options.itemIndexBase, depth: depth + 1 });
  }
  sink.beginChild();
}

/**
 * Walk a dataset and send one record per element (plus item boundaries) to the sink.
 *
 * @param dataset - Root dataset; validated in full before any record is emitted
 * @param sink - Receiver of the records
 * @param options - Viewer options plus walk hooks
 * @throws StructuralError if the input is not a dataset tree or nests too deep
 * @throws OptionsError if an option is out of range
 */
export function walkDataSet(dataset: DicomDataSet, sink: PresentationSink, options: WalkOptions = {}): void {
  const { resolveName, onRenderError, ...viewerOptions } = options;
  const resolved = resolveOptions(viewerOptions);
  assertDataSet(dataset, resolved.maxDepth);

  const context: WalkContext = {
    sink,
    options: resolved,
    resolveName: resolveName ?? createNameResolver(),
    onRenderError,
  };

  const stack: WalkTask[] = [{ kind: 'dataset', dataset, depth: resolved.depth }];
  while (stack.length > 0) {
    const task = stack.pop();
    if (!task) {
      break;
    }

    switch (task.kind) {
      case 'dataset':
        for (let i = task.dataset.elements.length - 1; i >= 0; i--) {
          stack.push({ kind: 'element', element: task.dataset.elements[i], depth: task.depth });
        }
        break;
      case 'element':
        processElement(task.element, task.depth, stack, context);
        break;
      case 'item':
        sink.append({ kind: 'item', depth: task.depth, index: task.index, size: task.dataset.elements.length });
        stack.push({ kind: 'close' });
        stack.push({ kind: 'dataset', dataset: task.dataset, depth: task.depth + 1 });
        sink.beginChild();
        break;
      case 'close':
        sink.endChild();
        break;
    }
  }
}
