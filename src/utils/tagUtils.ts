/**
 * Tag Utilities: Tag construction, parsing and display formats
 */

import { createStructuralError } from '../core/errors.js';
import type { Tag } from '../core/types.js';

/**
 * Hex string cache for fast tag formatting (module-level for reuse)
 */
const hexCache: string[] = [];
for (let i = 0; i < 65536; i++) {
  hexCache[i] = i.toString(16).toUpperCase().padStart(4, '0');
}

function isUint16(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 0xffff;
}

/**
 * Create a tag from its group and element numbers
 */
export function createTag(group: number, element: number): Tag {
  if (!isUint16(group) || !isUint16(element)) {
    throw createStructuralError(`Invalid tag numbers: group=${group}, element=${element}`);
  }
  return Object.freeze({ group, element });
}

export function isTag(value: unknown): value is Tag {
  return (
    typeof value === 'object' &&
    value !== null &&
    'group' in value &&
    'element' in value &&
    isUint16(value.group) &&
    isUint16(value.element)
  );
}

/**
 * Normalize tag format to x-prefixed format (e.g., "x00100010")
 */
export function normalizeTag(tag: string): string {
  const cleanTag = tag.replace(/^x/i, '').replace(/,/g, '').replace(/[()]/g, '');
  if (cleanTag.length === 8) {
    return `x${cleanTag.toLowerCase()}`;
  }
  return tag.startsWith('x') ? tag : `x${cleanTag}`;
}

/**
 * Parse any of "x00100010", "00100010", "0010,0010" or "(0010,0010)"
 */
export function parseTag(tag: string): Tag {
  const cleanTag = normalizeTag(tag.trim()).slice(1);
  if (!/^[0-9a-f]{8}$/i.test(cleanTag)) {
    throw createStructuralError(`Invalid tag string: ${tag}`);
  }
  return createTag(parseInt(cleanTag.slice(0, 4), 16), parseInt(cleanTag.slice(4, 8), 16));
}

/**
 * Canonical display form: "(0010,0010)", upper-case hex
 */
export function formatTag(tag: Tag): string {
  return `(${hexCache[tag.group]},${hexCache[tag.element]})`;
}

/**
 * Dictionary key form: "00100010", upper-case hex
 */
export function tagKey(tag: Tag): string {
  return `${hexCache[tag.group]}${hexCache[tag.element]}`;
}

/**
 * Private tags live in odd groups (excluding the reserved groups 0001-0007 and FFFF)
 */
export function isPrivateTag(tag: Tag): boolean {
  return tag.group % 2 === 1 && tag.group > 0x0007 && tag.group !== 0xffff;
}
