/**
 * Structure Validator: checks a whole dataset tree before anything is emitted
 *
 * Value items of an unexpected type are not structural problems; the
 * formatter reports those per element.
 */

import { createStructuralError } from './errors.js';
import type { DicomDataSet, ValueKind } from './types.js';
import { isTag } from '../utils/tagUtils.js';

export const SEQUENCE_VR = 'SQ';

const VALUE_KINDS: ReadonlySet<string> = new Set<ValueKind>(['scalar', 'multi', 'bytes', 'sequence']);

interface PendingDataSet {
  node: unknown;
  path: string;
  /** Sequence nesting level of this dataset */
  level: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function checkValue(value: unknown, vr: string, path: string): unknown[] | undefined {
  if (!isRecord(value) || typeof value.kind !== 'string' || !VALUE_KINDS.has(value.kind)) {
    throw createStructuralError('Element value has no known kind', path);
  }

  const isSequence = value.kind === 'sequence';
  if (vr === SEQUENCE_VR && !isSequence) {
    throw createStructuralError('Sequence element must hold a sequence value', path);
  }
  if (vr !== SEQUENCE_VR && isSequence) {
    throw createStructuralError(`Element with VR ${vr} cannot hold a sequence value`, path);
  }

  switch (value.kind) {
    case 'sequence':
      if (!Array.isArray(value.items)) {
        throw createStructuralError('Sequence value must hold an items array', path);
      }
      return value.items;
    case 'multi':
      if (!Array.isArray(value.values)) {
        throw createStructuralError('Multi value must hold a values array', path);
      }
      return undefined;
    case 'bytes':
      if (typeof value.length !== 'number' || value.length < 0) {
        throw createStructuralError('Bytes value must carry a non-negative length', path);
      }
      if (value.bytes !== null && !(value.bytes instanceof Uint8Array)) {
        throw createStructuralError('Bytes value must hold a Uint8Array or null', path);
      }
      return undefined;
    default:
      if (!('value' in value)) {
        throw createStructuralError('Scalar value is missing', path);
      }
      return undefined;
  }
}

/**
 * Throw StructuralError unless `input` is a well-formed dataset tree no
 * deeper than `maxDepth` sequence levels.
 */
export function assertDataSet(input: unknown, maxDepth = 256): asserts input is DicomDataSet {
  const stack: PendingDataSet[] = [{ node: input, path: 'dataset', level: 0 }];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) {
      break;
    }
    const { node, path, level } = current;

    if (level > maxDepth) {
      throw createStructuralError(`Sequence nesting exceeds the maximum depth of ${maxDepth}`, path);
    }
    if (!isRecord(node) || !Array.isArray(node.elements)) {
      throw createStructuralError('Not a dataset: expected an object with an elements array', path);
    }

    node.elements.forEach((element: unknown, index: number) => {
      const elementPath = `${path}.elements[${index}]`;
      if (!isRecord(element)) {
        throw createStructuralError('Element must be an object', elementPath);
      }
      if (!isTag(element.tag)) {
        throw createStructuralError('Element tag must hold 16-bit group and element numbers', elementPath);
      }
      if (typeof element.vr !== 'string') {
        throw createStructuralError('Element VR must be a string', elementPath);
      }
      if (element.name !== undefined && typeof element.name !== 'string') {
        throw createStructuralError('Element name must be a string', elementPath);
      }

      const items = checkValue(element.value, element.vr, `${elementPath}.value`);
      items?.forEach((item, itemIndex) => {
        stack.push({ node: item, path: `${elementPath}.value.items[${itemIndex}]`, level: level + 1 });
      });
    });
  }
}

export function isDataSet(input: unknown, maxDepth = 256): input is DicomDataSet {
  try {
    assertDataSet(input, maxDepth);
    return true;
  } catch {
    return false;
  }
}
