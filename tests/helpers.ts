import type { DicomDataSet, DicomElement, ElementValue, PresentationSink, ValueItem, ViewerRecord } from '../src/core/types.js';
import { createTag } from '../src/utils/tagUtils.js';

export function element(group: number, elementNumber: number, vr: string, value: ElementValue): DicomElement {
  return { tag: createTag(group, elementNumber), vr, value };
}

export function scalar(group: number, elementNumber: number, vr: string, value: ValueItem): DicomElement {
  return element(group, elementNumber, vr, { kind: 'scalar', value });
}

export function multi(group: number, elementNumber: number, vr: string, values: ValueItem[]): DicomElement {
  return element(group, elementNumber, vr, { kind: 'multi', values });
}

export function bytes(group: number, elementNumber: number, vr: string, data: Uint8Array): DicomElement {
  return element(group, elementNumber, vr, { kind: 'bytes', bytes: data, length: data.length });
}

export function sequence(group: number, elementNumber: number, items: DicomDataSet[]): DicomElement {
  return element(group, elementNumber, 'SQ', { kind: 'sequence', items });
}

export function dataset(...elements: DicomElement[]): DicomDataSet {
  return { elements };
}

/**
 * Dataset with `levels` sequences nested inside one another, one item each
 */
export function nested(levels: number): DicomDataSet {
  let current = dataset(scalar(0x0020, 0x000e, 'UI', '1.2.3'));
  for (let i = 0; i < levels; i++) {
    current = dataset(sequence(0x0008, 0x1115, [current]));
  }
  return current;
}

/**
 * Sink that records every call for order checks
 */
export class RecordingSink implements PresentationSink {
  readonly records: ViewerRecord[] = [];
  readonly events: string[] = [];

  append(record: ViewerRecord): void {
    this.records.push(record);
    this.events.push(record.kind === 'item' ? `item ${record.index}` : `element ${record.value}`);
  }

  beginChild(): void {
    this.events.push('begin');
  }

  endChild(): void {
    this.events.push('end');
  }
}
