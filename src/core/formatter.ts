/**
 * Tag Formatter: turns elements into the fixed record layout
 *
 *   {indent}(GGGG,EEEE) | Name | VR | Value
 *   {indent}[Item N]
 *
 * This layout is the CLI output contract; scripts parse it.
 */

import { isBinary } from './binaryClassifier.js';
import { RenderError } from './errors.js';
import { withDefaults, type ResolvedViewerOptions } from './options.js';
import type { BytesValue, DicomElement, ValueItem, ViewerRecord } from './types.js';
import { formatTag } from '../utils/tagUtils.js';

export const FIELD_SEPARATOR = ' | ';
export const MULTI_VALUE_SEPARATOR = '\\';
export const UNRENDERABLE_VALUE = '<unrenderable value>';

export function binaryPlaceholder(length: number): string {
  return `<binary, ${length} bytes>`;
}

export function sequencePlaceholder(count: number): string {
  return `<sequence, ${count} items>`;
}

function bytesPlaceholder(value: BytesValue): string {
  if (value.bytes === null && value.uri !== undefined) {
    return `<bulk data, ${value.uri}>`;
  }
  return binaryPlaceholder(value.length);
}

function renderItem(item: ValueItem, tag: string): string {
  if (item === null) {
    return '';
  }
  if (typeof item === 'string') {
    return item;
  }
  if (typeof item === 'number' || typeof item === 'bigint') {
    return item.toString();
  }
  throw new RenderError(`Unexpected value of type ${typeof item}`, tag);
}

const utf8 = new TextEncoder();

function renderHex(bytes: Uint8Array): string {
  return Array.from(bytes, (byte) => byte.toString(16).padStart(2, '0')).join(' ');
}

/**
 * Cut text to at most `maxLength` code points and append the ellipsis.
 * Surrogate pairs are never split.
 */
export function truncate(text: string, maxLength: number, ellipsis = '...'): string {
  // Code points never outnumber UTF-16 units
  if (text.length <= maxLength) {
    return text;
  }
  const codePoints = Array.from(text);
  if (codePoints.length <= maxLength) {
    return text;
  }
  return codePoints.slice(0, maxLength).join('') + ellipsis;
}

interface RenderedField {
  text: string;
  /** Placeholders are shown whole, never truncated */
  placeholder: boolean;
}

function renderField(element: DicomElement, options: Partial<ResolvedViewerOptions>): RenderedField {
  const tag = formatTag(element.tag);
  const value = element.value;

  switch (value.kind) {
    case 'sequence':
      return { text: sequencePlaceholder(value.items.length), placeholder: true };
    case 'bytes':
      if (value.bytes === null || isBinary(element, options)) {
        return { text: bytesPlaceholder(value), placeholder: true };
      }
      return { text: renderHex(value.bytes), placeholder: false };
    case 'scalar':
    case 'multi': {
      const text =
        value.kind === 'scalar'
          ? renderItem(value.value, tag)
          : value.values.map((item) => renderItem(item, tag)).join(MULTI_VALUE_SEPARATOR);
      return isBinary(element, options)
        ? { text: binaryPlaceholder(utf8.encode(text).length), placeholder: true }
        : { text, placeholder: false };
    }
    default:
      throw new RenderError('Unsupported value kind', tag);
  }
}

/**
 * Render the value field of an element, before truncation.
 *
 * @throws RenderError when the value has an unexpected shape or type
 */
export function renderFullValue(element: DicomElement, options: Partial<ResolvedViewerOptions> = {}): string {
  return renderField(element, options).text;
}

/**
 * Render the value field of an element for display. Value text is cut to
 * `maxValueLength`; placeholders are kept whole.
 */
export function renderValue(element: DicomElement, options: Partial<ResolvedViewerOptions> = {}): string {
  const { maxValueLength, ellipsis } = withDefaults(options);
  const field = renderField(element, options);
  return field.placeholder ? field.text : truncate(field.text, maxValueLength, ellipsis);
}

/**
 * Record text without indentation; tree sinks use this as the node label
 */
export function formatLabel(record: ViewerRecord): string {
  if (record.kind === 'item') {
    return `[Item ${record.index}]`;
  }
  return [formatTag(record.tag), record.name, record.vr, record.value].join(FIELD_SEPARATOR);
}

/**
 * Record text as one output line, indented by depth
 */
export function formatRecord(record: ViewerRecord, options: Partial<ResolvedViewerOptions> = {}): string {
  const { indentWidth } = withDefaults(options);
  return ' '.repeat(indentWidth * record.depth) + formatLabel(record);
}
