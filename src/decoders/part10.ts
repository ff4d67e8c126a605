/**
 * Part 10 Decoder: DICOM file bytes to the element model
 *
 * Byte-level parsing is done by `dicom-parser`; this adapter turns its
 * element map into tagged values, reading numbers in the transfer syntax's
 * byte order and strings in the dataset's character set.
 */

import dicomParser from 'dicom-parser';
import type { DataSet, Element } from 'dicom-parser';
import { createDecodeError, toError } from '../core/errors.js';
import type { DicomDataSet, DicomElement, ElementValue, ValueItem } from '../core/types.js';
import { SEQUENCE_VR } from '../core/validate.js';
import { loadStandardDictionary, lookupVR, type TagDictionary } from '../utils/dictionary.js';
import { decodeString, SafeDataView } from '../utils/SafeDataView.js';
import { createTag, formatTag, parseTag } from '../utils/tagUtils.js';

export const TRANSFER_SYNTAX = {
  IMPLICIT_VR_LITTLE_ENDIAN: '1.2.840.10008.1.2',
  EXPLICIT_VR_LITTLE_ENDIAN: '1.2.840.10008.1.2.1',
  EXPLICIT_VR_BIG_ENDIAN: '1.2.840.10008.1.2.2',
} as const;

const TAG_TRANSFER_SYNTAX = 'x00020010';
const TAG_SPECIFIC_CHARACTER_SET = 'x00080005';

/** VRs read as raw payload octets */
const PAYLOAD_VRS = new Set(['OB', 'OD', 'OF', 'OL', 'OV', 'OW', 'UN']);

/** String VRs that never hold multiple values */
const SINGLE_VALUED_STRING_VRS = new Set(['LT', 'ST', 'UT', 'UR']);

/** String VRs whose leading spaces are significant */
const KEEP_LEADING_SPACE_VRS = new Set(['LT', 'ST', 'UT']);

type NumberReader = (view: SafeDataView) => number | bigint;

const BINARY_NUMBER_VRS: Record<string, { size: number; read: NumberReader }> = {
  US: { size: 2, read: (view) => view.readUint16() },
  SS: { size: 2, read: (view) => view.readInt16() },
  UL: { size: 4, read: (view) => view.readUint32() },
  SL: { size: 4, read: (view) => view.readInt32() },
  FL: { size: 4, read: (view) => view.readFloat32() },
  FD: { size: 8, read: (view) => view.readFloat64() },
  UV: { size: 8, read: (view) => view.readBigUint64() },
  SV: { size: 8, read: (view) => view.readBigInt64() },
};

export interface Part10DecodeOptions {
  /** Dictionary used for implicit VR lookups (default: bundled standard dictionary) */
  dictionary?: TagDictionary;
  /** Stop before this tag, e.g. "x7fe00010" to skip pixel data */
  untilTag?: string;
  /** Label used in error messages, typically the file path */
  source?: string;
}

interface DecodeContext {
  littleEndian: boolean;
  characterSet: string;
  dictionary: TagDictionary;
}

/**
 * Check for the "DICM" marker after the 128-byte preamble
 */
export function hasPart10Preamble(bytes: Uint8Array): boolean {
  return (
    bytes.length >= 132 &&
    bytes[128] === 0x44 && // D
    bytes[129] === 0x49 && // I
    bytes[130] === 0x43 && // C
    bytes[131] === 0x4d // M
  );
}

/** Shorthands for VR alternatives: "ox" is OB or OW, "xs" is US or SS */
const VR_SHORTHANDS = new Map([
  ['ox', 'OW'],
  ['xs', 'US'],
]);

/**
 * Dictionary VRs like "OB or OW" need one concrete VR for implicit data
 */
export function concreteVR(vr: string): string {
  const shorthand = VR_SHORTHANDS.get(vr);
  if (shorthand) {
    return shorthand;
  }
  const choices = vr.split(/\s+or\s+|\|/);
  return choices.includes('OW') ? 'OW' : choices[0];
}

function vrOf(element: Element, context: DecodeContext): string {
  if (element.vr) {
    return element.vr;
  }
  if (element.items) {
    return SEQUENCE_VR;
  }
  const vr = lookupVR(context.dictionary, parseTag(element.tag));
  return vr ? concreteVR(vr) : 'UN';
}

function valueBytes(dataSet: DataSet, element: Element): Uint8Array {
  return dataSet.byteArray.subarray(element.dataOffset, element.dataOffset + element.length);
}

function collapse(values: ValueItem[]): ElementValue {
  if (values.length === 0) {
    return { kind: 'scalar', value: '' };
  }
  if (values.length === 1) {
    return { kind: 'scalar', value: values[0] };
  }
  return { kind: 'multi', values };
}

function readNumbers(bytes: Uint8Array, size: number, read: NumberReader, littleEndian: boolean): ValueItem[] {
  const view = new SafeDataView(bytes, littleEndian);
  const values: ValueItem[] = [];
  const count = Math.floor(bytes.length / size);
  for (let i = 0; i < count; i++) {
    values.push(read(view));
  }
  return values;
}

function readAttributeTags(bytes: Uint8Array, littleEndian: boolean): ValueItem[] {
  const view = new SafeDataView(bytes, littleEndian);
  const values: ValueItem[] = [];
  while (view.getRemainingBytes() >= 4) {
    values.push(formatTag(createTag(view.readUint16(), view.readUint16())));
  }
  return values;
}

function readStrings(bytes: Uint8Array, vr: string, characterSet: string): ValueItem[] {
  const view = new SafeDataView(bytes);
  const text = view.readString(bytes.length, characterSet);
  if (SINGLE_VALUED_STRING_VRS.has(vr)) {
    return [KEEP_LEADING_SPACE_VRS.has(vr) ? text : text.trimStart()];
  }
  return text.split('\\').map((part) => part.trim().replace(/\0+$/, ''));
}

function convertValue(dataSet: DataSet, element: Element, vr: string, context: DecodeContext): ElementValue {
  if (vr === SEQUENCE_VR) {
    const items = element.items ?? [];
    return {
      kind: 'sequence',
      items: items.map((item) => (item.dataSet ? convertDataSet(item.dataSet, context) : { elements: [] })),
    };
  }

  if (element.encapsulatedPixelData) {
    return { kind: 'bytes', bytes: null, length: element.length };
  }

  const bytes = valueBytes(dataSet, element);

  if (PAYLOAD_VRS.has(vr)) {
    return { kind: 'bytes', bytes, length: bytes.length };
  }
  if (vr === 'AT') {
    return collapse(readAttributeTags(bytes, context.littleEndian));
  }
  const numeric = BINARY_NUMBER_VRS[vr];
  if (numeric) {
    return collapse(readNumbers(bytes, numeric.size, numeric.read, context.littleEndian));
  }
  return collapse(readStrings(bytes, vr, context.characterSet));
}

function convertDataSet(dataSet: DataSet, parent: DecodeContext): DicomDataSet {
  // Nested items may switch character set
  const characterSet = dataSet.elements[TAG_SPECIFIC_CHARACTER_SET]
    ? decodeString(valueBytes(dataSet, dataSet.elements[TAG_SPECIFIC_CHARACTER_SET])).trim()
    : parent.characterSet;
  const context: DecodeContext = { ...parent, characterSet };

  // File order; entries the parser synthesized carry no offset
  const ordered = Object.values(dataSet.elements)
    .filter((element) => Number.isFinite(element.dataOffset))
    .sort((a, b) => a.dataOffset - b.dataOffset);

  const elements: DicomElement[] = [];
  for (const element of ordered) {
    const vr = vrOf(element, context);
    elements.push({
      tag: parseTag(element.tag),
      vr,
      value: convertValue(dataSet, element, vr, context),
    });
  }
  return { elements };
}

/**
 * Decode DICOM bytes into a dataset.
 *
 * Files with the Part 10 preamble are parsed with their own transfer syntax;
 * anything else is read as an implicit VR little endian dataset.
 *
 * @param bytes - File contents
 * @param options - Decode options
 * @throws DecodeError when the bytes cannot be parsed
 */
export function decodePart10(bytes: Uint8Array, options: Part10DecodeOptions = {}): DicomDataSet {
  if (bytes.length < 8) {
    throw createDecodeError('File too small to be a valid DICOM file', options.source, 0);
  }

  const dictionary = options.dictionary ?? loadStandardDictionary();
  const vrCallback = (tag: string): string => {
    const vr = lookupVR(dictionary, parseTag(tag));
    return vr ? concreteVR(vr) : 'UN';
  };

  const part10 = hasPart10Preamble(bytes);

  let dataSet: DataSet;
  try {
    dataSet = dicomParser.parseDicom(bytes, {
      untilTag: options.untilTag,
      vrCallback,
      ...(part10 ? {} : { TransferSyntaxUID: TRANSFER_SYNTAX.IMPLICIT_VR_LITTLE_ENDIAN }),
    });
  } catch (thrown) {
    const error = toError(thrown);
    throw createDecodeError(`Failed to parse DICOM data - ${error.message}`, options.source, undefined, error);
  }

  try {
    const transferSyntax = part10
      ? dataSet.string(TAG_TRANSFER_SYNTAX) ?? TRANSFER_SYNTAX.IMPLICIT_VR_LITTLE_ENDIAN
      : TRANSFER_SYNTAX.IMPLICIT_VR_LITTLE_ENDIAN;

    return convertDataSet(dataSet, {
      littleEndian: transferSyntax !== TRANSFER_SYNTAX.EXPLICIT_VR_BIG_ENDIAN,
      characterSet: '',
      dictionary,
    });
  } catch (thrown) {
    const error = toError(thrown);
    throw createDecodeError(`Failed to read element values - ${error.message}`, options.source, undefined, error);
  }
}
