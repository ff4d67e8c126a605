/**
 * Binary Classifier: decides which element values are opaque payloads
 *
 * VR wins when it names a payload type; otherwise long values are checked
 * for non-printable characters. The heuristic can be wrong in both
 * directions, and it never throws.
 */

import type { DicomElement, ElementValue, Tag, ValueItem } from './types.js';
import { withDefaults, type ResolvedViewerOptions } from './options.js';

/**
 * VRs that carry binary or large opaque data
 */
export const BINARY_VRS: ReadonlySet<string> = new Set([
  'OB',
  'OD',
  'OF',
  'OL',
  'OV',
  'OW',
  'UN',
  // Dictionary spellings for pixel/overlay/waveform samples whose VR depends on context
  'OB or OW',
  'US or OW',
  'US or SS or OW',
]);

/**
 * Tags whose value is bulk sample data whatever the VR says
 * Key = (Group << 16) | Element, as unsigned
 */
const BULK_SAMPLE_TAGS: ReadonlySet<number> = new Set([
  0x7fe00008, // Float Pixel Data
  0x7fe00009, // Double Float Pixel Data
  0x7fe00010, // Pixel Data
  0x54001010, // Waveform Data
]);

export function isBulkSampleTag(tag: Tag): boolean {
  return BULK_SAMPLE_TAGS.has(((tag.group << 16) | tag.element) >>> 0);
}

export function isBinaryVR(vr: string): boolean {
  return BINARY_VRS.has(vr);
}

const utf8 = new TextEncoder();

function itemText(item: ValueItem): string {
  if (item === null) {
    return '';
  }
  switch (typeof item) {
    case 'string':
      return item;
    case 'number':
    case 'bigint':
      return item.toString();
    default:
      throw new TypeError(`Unexpected value item of type ${typeof item}`);
  }
}

/**
 * Plain text of a non-sequence value, used for measuring; bytes and
 * sequences have no text form here
 */
export function valueText(value: ElementValue): string | undefined {
  switch (value.kind) {
    case 'scalar':
      return itemText(value.value);
    case 'multi':
      return value.values.map(itemText).join('\\');
    default:
      return undefined;
  }
}

/**
 * Size of a value in bytes: payload length, or UTF-8 length of its text
 */
export function valueByteLength(value: ElementValue): number {
  if (value.kind === 'bytes') {
    return value.length;
  }
  const text = valueText(value);
  return text === undefined ? 0 : utf8.encode(text).length;
}

/**
 * C0 and C1 controls are non-printable; TAB, LF, FF, CR and ESC are allowed
 * because text VRs carry line breaks and ISO 2022 escape sequences.
 */
function isPrintableCode(code: number): boolean {
  if (code === 0x09 || code === 0x0a || code === 0x0c || code === 0x0d || code === 0x1b) {
    return true;
  }
  if (code < 0x20 || code === 0x7f) {
    return false;
  }
  return !(code >= 0x80 && code <= 0x9f) && code !== 0xfffd;
}

/**
 * Share of non-printable characters in a string, 0 for the empty string
 */
export function nonPrintableRatio(text: string): number {
  let total = 0;
  let nonPrintable = 0;
  for (const char of text) {
    total++;
    const code = char.codePointAt(0) ?? 0;
    if (!isPrintableCode(code)) {
      nonPrintable++;
    }
  }
  return total === 0 ? 0 : nonPrintable / total;
}

function bytesRatio(bytes: Uint8Array): number {
  if (bytes.length === 0) {
    return 0;
  }
  let nonPrintable = 0;
  for (let i = 0; i < bytes.length; i++) {
    if (!isPrintableCode(bytes[i])) {
      nonPrintable++;
    }
  }
  return nonPrintable / bytes.length;
}

/**
 * Return true if the element's value should be shown as a binary placeholder.
 *
 * @param element - Element to inspect
 * @param options - `binaryLengthThreshold` and `maxNonPrintableRatio` are used
 */
export function isBinary(element: DicomElement, options: Partial<ResolvedViewerOptions> = {}): boolean {
  const { binaryLengthThreshold, maxNonPrintableRatio } = withDefaults(options);
  const value = element.value;

  if (value.kind === 'sequence') {
    return false;
  }
  if (isBinaryVR(element.vr) || isBulkSampleTag(element.tag)) {
    return true;
  }

  try {
    const length = valueByteLength(value);
    if (length <= binaryLengthThreshold) {
      return false;
    }
    if (value.kind === 'bytes') {
      return value.bytes === null || bytesRatio(value.bytes) > maxNonPrintableRatio;
    }
    const text = valueText(value) ?? '';
    return nonPrintableRatio(text) > maxNonPrintableRatio;
  } catch {
    // Unmeasurable values are left to the formatter, which reports them
    return false;
  }
}
