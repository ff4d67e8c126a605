/**
 * DICOM JSON Decoder: the JSON model (PS3.18 Annex F) to the element model
 *
 * {
 *   "00100010": { "vr": "PN", "Value": [{ "Alphabetic": "DOE^JOHN" }] },
 *   "7FE00010": { "vr": "OW", "BulkDataURI": "https://..." }
 * }
 */

import { z } from 'zod';
import { createDecodeError } from '../core/errors.js';
import type { DicomDataSet, DicomElement, ElementValue, ValueItem } from '../core/types.js';
import { SEQUENCE_VR } from '../core/validate.js';
import { parseTag } from '../utils/tagUtils.js';

const PersonNameSchema = z.object({
  Alphabetic: z.string().optional(),
  Ideographic: z.string().optional(),
  Phonetic: z.string().optional(),
});

const AttributeSchema = z.object({
  vr: z.string().regex(/^[A-Z]{2}$/, 'VR must be two upper-case letters'),
  Value: z.array(z.unknown()).optional(),
  InlineBinary: z.string().optional(),
  BulkDataURI: z.string().optional(),
});

const DataSetSchema = z.record(z.string().regex(/^[0-9A-Fa-f]{8}$/, 'Tag keys must be 8 hex digits'), AttributeSchema);

const ValueItemSchema = z.union([z.string(), z.number(), z.null()]);

type JsonAttribute = z.infer<typeof AttributeSchema>;

interface Frame {
  json: unknown;
  path: string;
  target: DicomElement[];
}

function personName(value: z.infer<typeof PersonNameSchema>): string {
  const groups = [value.Alphabetic ?? '', value.Ideographic ?? '', value.Phonetic ?? ''];
  while (groups.length > 1 && groups[groups.length - 1] === '') {
    groups.pop();
  }
  return groups.join('=');
}

function valueItem(raw: unknown, vr: string, path: string): ValueItem {
  if (vr === 'PN' && typeof raw === 'object' && raw !== null) {
    const parsed = PersonNameSchema.safeParse(raw);
    if (parsed.success) {
      return personName(parsed.data);
    }
  }
  const parsed = ValueItemSchema.safeParse(raw);
  if (!parsed.success) {
    throw createDecodeError(`Unsupported value for VR ${vr}`, path);
  }
  return parsed.data;
}

function bytesValue(attribute: JsonAttribute, path: string): ElementValue {
  if (attribute.InlineBinary !== undefined) {
    if (!/^[A-Za-z0-9+/]*={0,2}$/.test(attribute.InlineBinary)) {
      throw createDecodeError('InlineBinary is not valid base64', path);
    }
    const bytes = new Uint8Array(Buffer.from(attribute.InlineBinary, 'base64'));
    return { kind: 'bytes', bytes, length: bytes.length };
  }
  return { kind: 'bytes', bytes: null, length: 0, uri: attribute.BulkDataURI };
}

function scalarValue(attribute: JsonAttribute, path: string): ElementValue {
  const items = (attribute.Value ?? []).map((raw, index) => valueItem(raw, attribute.vr, `${path}.Value[${index}]`));
  if (items.length === 0) {
    return { kind: 'scalar', value: '' };
  }
  return items.length === 1 ? { kind: 'scalar', value: items[0] } : { kind: 'multi', values: items };
}

/**
 * Decode a DICOM JSON document (text or already-parsed) into a dataset.
 *
 * @throws DecodeError on invalid JSON or a document outside the JSON model
 */
export function decodeDicomJson(input: unknown, source?: string): DicomDataSet {
  let document: unknown = input;
  if (typeof input === 'string') {
    try {
      document = JSON.parse(input);
    } catch (error) {
      throw createDecodeError(
        `Invalid JSON - ${error instanceof Error ? error.message : 'Unknown error'}`,
        source,
        undefined,
        error instanceof Error ? error : undefined
      );
    }
  }

  // A single-instance array (as returned by QIDO/WADO metadata) is accepted too
  if (Array.isArray(document)) {
    if (document.length !== 1) {
      throw createDecodeError(`Expected one dataset, found ${document.length}`, source);
    }
    document = document[0];
  }

  const root: DicomElement[] = [];
  const stack: Frame[] = [{ json: document, path: source ?? 'document', target: root }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) {
      break;
    }

    const parsed = DataSetSchema.safeParse(frame.json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = [frame.path, ...(issue?.path ?? [])].join('.');
      throw createDecodeError(`Not a DICOM JSON dataset - ${issue?.message ?? 'invalid'}`, where);
    }

    for (const [key, attribute] of Object.entries(parsed.data)) {
      const path = `${frame.path}.${key}`;
      const tag = parseTag(key);

      if (attribute.vr === SEQUENCE_VR) {
        const items: DicomDataSet[] = [];
        (attribute.Value ?? []).forEach((itemJson, index) => {
          const elements: DicomElement[] = [];
          items.push({ elements });
          stack.push({ json: itemJson, path: `${path}.Value[${index}]`, target: elements });
        });
        frame.target.push({ tag, vr: attribute.vr, value: { kind: 'sequence', items } });
        continue;
      }

      const value =
        attribute.InlineBinary !== undefined || attribute.BulkDataURI !== undefined
          ? bytesValue(attribute, path)
          : scalarValue(attribute, path);
      frame.target.push({ tag, vr: attribute.vr, value });
    }
  }

  return { elements: root };
}
