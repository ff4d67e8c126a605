/**
 * Dictionary: Tag name and VR lookup
 *
 * The standard dictionary comes from `dcmjs` (`data.DicomMetaDictionary.dictionary`),
 * keyed "(GGGG,EEEE)" with keyword names. Display names are the keyword split
 * into words; `data/names.json` holds the names that splitting cannot produce
 * ("Patient's Name", "Image Position (Patient)").
 * Repeating groups use "xx" for the low byte of the group, e.g. "(60xx,3000)".
 */

import * as fs from 'fs';
import { createRequire } from 'module';
import { z } from 'zod';
import { createDecodeError } from '../core/errors.js';
import type { NameResolver, Tag } from '../core/types.js';
import { isPrivateTag, tagKey } from './tagUtils.js';

/** Name used for tags the dictionary does not know */
export const UNKNOWN_NAME = 'Unknown';

const DictionaryEntrySchema = z.object({
  name: z.string(),
  vr: z.string(),
  keyword: z.string().optional(),
});

export type DictionaryEntry = z.infer<typeof DictionaryEntrySchema>;

export interface TagDictionary {
  lookup(tag: Tag): DictionaryEntry | undefined;
  readonly size: number;
}

/**
 * Build a dictionary from "GGGGEEEE" keyed entries
 */
export function createDictionary(entries: Record<string, DictionaryEntry>): TagDictionary {
  const table = new Map<string, DictionaryEntry>();
  for (const [key, entry] of Object.entries(entries)) {
    table.set(key.toUpperCase(), entry);
  }

  return {
    size: table.size,
    lookup(tag: Tag): DictionaryEntry | undefined {
      const key = tagKey(tag);
      const exact = table.get(key);
      if (exact) {
        return exact;
      }
      // Repeating groups (curves, overlays)
      return table.get(`${key.slice(0, 2)}XX${key.slice(4)}`);
    },
  };
}

export const EMPTY_DICTIONARY: TagDictionary = createDictionary({});

const LOWER_CASE_WORDS = new Set(['of', 'to', 'per', 'in', 'and', 'for', 'by', 'on', 'at', 'from', 'with', 'or']);

/**
 * Spell a dictionary keyword as words: "SOPClassUID" -> "SOP Class UID",
 * "NumberOfFrames" -> "Number of Frames"
 */
export function displayName(keyword: string): string {
  const words = keyword
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .replace(/([A-Z]) Ds\b/g, '$1Ds')
    .split(' ');
  return words
    .map((word, i) => (i > 0 && LOWER_CASE_WORDS.has(word.toLowerCase()) ? word.toLowerCase() : word))
    .join(' ');
}

// Standard tags only; private dictionary entries carry a creator string in the key
const STANDARD_KEY = /^\(([0-9A-Fa-fx]{4}),([0-9A-Fa-fx]{4})\)$/;

const SourceEntrySchema = z.object({
  vr: z.string(),
  name: z.string(),
});

const NamesFileSchema = z.record(z.string(), z.string());

const NAMES_URL = new URL('../../data/names.json', import.meta.url);

const requireModule = createRequire(import.meta.url);

function field(value: unknown, key: string): unknown {
  if ((typeof value === 'object' && value !== null) || typeof value === 'function') {
    return Reflect.get(value, key);
  }
  return undefined;
}

function readSourceDictionary(): unknown {
  let exported: unknown;
  try {
    exported = requireModule('dcmjs');
  } catch (error) {
    throw createDecodeError(
      `Failed to load tag dictionary - ${error instanceof Error ? error.message : 'Unknown error'}`,
      'dcmjs',
      undefined,
      error instanceof Error ? error : undefined
    );
  }
  const data = field(exported, 'data') ?? field(field(exported, 'default'), 'data');
  return field(field(data, 'DicomMetaDictionary'), 'dictionary');
}

function readDisplayNames(): Record<string, string> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(NAMES_URL, 'utf-8'));
  } catch (error) {
    throw createDecodeError(
      `Failed to read tag names - ${error instanceof Error ? error.message : 'Unknown error'}`,
      NAMES_URL.pathname,
      undefined,
      error instanceof Error ? error : undefined
    );
  }
  const parsed = NamesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw createDecodeError(`Malformed tag names - ${parsed.error.issues[0]?.message}`, NAMES_URL.pathname);
  }
  return parsed.data;
}

let standardDictionary: TagDictionary | undefined;

/**
 * Load the standard dictionary (built once, then cached)
 */
export function loadStandardDictionary(): TagDictionary {
  if (standardDictionary) {
    return standardDictionary;
  }

  const source = z.record(z.string(), z.unknown()).safeParse(readSourceDictionary());
  if (!source.success) {
    throw createDecodeError('Malformed tag dictionary - dcmjs exposes no DicomMetaDictionary.dictionary', 'dcmjs');
  }
  const names = readDisplayNames();

  const entries: Record<string, DictionaryEntry> = {};
  for (const [key, value] of Object.entries(source.data)) {
    const match = STANDARD_KEY.exec(key);
    const entry = SourceEntrySchema.safeParse(value);
    if (!match || !entry.success) {
      continue;
    }
    const tag = `${match[1]}${match[2]}`.toUpperCase();
    entries[tag] = {
      name: names[tag] ?? displayName(entry.data.name),
      vr: entry.data.vr,
      keyword: entry.data.name,
    };
  }
  if (Object.keys(entries).length === 0) {
    throw createDecodeError('Malformed tag dictionary - no standard entries', 'dcmjs');
  }

  standardDictionary = createDictionary(entries);
  return standardDictionary;
}

/**
 * Turn a dictionary into a name resolver with the usual fallbacks for
 * group lengths and private tags
 */
export function createNameResolver(dictionary: TagDictionary = EMPTY_DICTIONARY): NameResolver {
  return (tag: Tag): string => {
    const entry = dictionary.lookup(tag);
    if (entry) {
      return entry.name;
    }
    if (tag.element === 0x0000) {
      return 'Group Length';
    }
    if (isPrivateTag(tag)) {
      return tag.element >= 0x0010 && tag.element <= 0x00ff ? 'Private Creator' : 'Private tag data';
    }
    return UNKNOWN_NAME;
  };
}

/**
 * VR for implicit-VR data; undefined when the dictionary has no entry
 */
export function lookupVR(dictionary: TagDictionary, tag: Tag): string | undefined {
  return dictionary.lookup(tag)?.vr;
}
