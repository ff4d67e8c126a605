/**
 * Type definitions for dcm-inspect
 *
 * The element model handed to the walker by a decoder, and the records the
 * walker hands to a presentation sink.
 */

/**
 * Tag identifier: 16-bit group and element numbers
 */
export interface Tag {
  readonly group: number;
  readonly element: number;
}

/**
 * One value in a scalar or multi-valued element. `null` marks an empty slot.
 */
export type ValueItem = string | number | bigint | null;

export interface ScalarValue {
  readonly kind: 'scalar';
  readonly value: ValueItem;
}

export interface MultiValue {
  readonly kind: 'multi';
  readonly values: readonly ValueItem[];
}

/**
 * Raw payload. `bytes` is null when the decoder only knows where the payload
 * lives (encapsulated pixel data, bulk data URIs).
 */
export interface BytesValue {
  readonly kind: 'bytes';
  readonly bytes: Uint8Array | null;
  readonly length: number;
  readonly uri?: string;
}

export interface SequenceValue {
  readonly kind: 'sequence';
  readonly items: readonly DicomDataSet[];
}

export type ElementValue = ScalarValue | MultiValue | BytesValue | SequenceValue;

export type ValueKind = ElementValue['kind'];

/**
 * DICOM Element structure
 */
export interface DicomElement {
  readonly tag: Tag;
  /** Human-readable name; resolved through the dictionary when absent */
  readonly name?: string;
  readonly vr: string;
  readonly value: ElementValue;
}

/**
 * DICOM Data Set structure: elements in decode order
 */
export interface DicomDataSet {
  readonly elements: readonly DicomElement[];
}

/**
 * Outcome of rendering one element's value
 */
export type RecordStatus = 'value' | 'binary' | 'sequence' | 'error';

export interface ElementRecord {
  readonly kind: 'element';
  readonly depth: number;
  readonly tag: Tag;
  readonly name: string;
  readonly vr: string;
  /** Rendered value field */
  readonly value: string;
  readonly status: RecordStatus;
}

/**
 * Boundary record for one item of a sequence
 */
export interface ItemRecord {
  readonly kind: 'item';
  readonly depth: number;
  readonly index: number;
  /** Number of elements in the item's dataset */
  readonly size: number;
}

export type ViewerRecord = ElementRecord | ItemRecord;

/**
 * Resolves a tag to its display name
 */
export type NameResolver = (tag: Tag) => string;

/**
 * Ordered, append-only receiver of walk records.
 * `beginChild` nests what follows under the last appended record;
 * `endChild` closes that nesting.
 */
export interface PresentationSink {
  append(record: ViewerRecord): void;
  beginChild(): void;
  endChild(): void;
}
