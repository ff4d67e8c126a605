import { describe, expect, it } from 'vitest';
import { StructuralError } from '../src/core/errors.js';
import {
  createTag,
  formatTag,
  isPrivateTag,
  isTag,
  normalizeTag,
  parseTag,
  tagKey,
} from '../src/utils/tagUtils.js';

describe('tag utilities', () => {
  it('normalizes tags into x-prefixed format', () => {
    expect(normalizeTag('0010,0010')).toBe('x00100010');
    expect(normalizeTag('x0020000D')).toBe('x0020000d');
    expect(normalizeTag('(0018,0050)')).toBe('x00180050');
  });

  it('parses every accepted spelling to the same tag', () => {
    for (const spelling of ['x00100020', '00100020', '0010,0020', '(0010,0020)', ' (0010,0020) ']) {
      expect(parseTag(spelling)).toEqual({ group: 0x0010, element: 0x0020 });
    }
    expect(parseTag('7FE00010')).toEqual({ group: 0x7fe0, element: 0x0010 });
  });

  it('rejects malformed tag strings', () => {
    expect(() => parseTag('0010')).toThrow(StructuralError);
    expect(() => parseTag('GGGGEEEE')).toThrow('Invalid tag string: GGGGEEEE');
  });

  it('rejects numbers outside 16 bits', () => {
    expect(() => createTag(0x10000, 0)).toThrow(StructuralError);
    expect(() => createTag(0x0010, -1)).toThrow(StructuralError);
    expect(() => createTag(1.5, 0)).toThrow(StructuralError);
  });

  it('formats tags as upper-case hex', () => {
    const tag = createTag(0x7fe0, 0x0010);
    expect(formatTag(tag)).toBe('(7FE0,0010)');
    expect(tagKey(tag)).toBe('7FE00010');
    expect(formatTag(createTag(0x0020, 0x000d))).toBe('(0020,000D)');
  });

  it('detects private tags', () => {
    expect(isPrivateTag(createTag(0x0009, 0x0010))).toBe(true);
    expect(isPrivateTag(createTag(0x0029, 0x1001))).toBe(true);
    expect(isPrivateTag(createTag(0x0010, 0x0010))).toBe(false);
    expect(isPrivateTag(createTag(0x0003, 0x0010))).toBe(false);
    expect(isPrivateTag(createTag(0xffff, 0x0010))).toBe(false);
  });

  it('checks tag shape', () => {
    expect(isTag({ group: 0x0010, element: 0x0010 })).toBe(true);
    expect(isTag({ group: 0x10000, element: 0 })).toBe(false);
    expect(isTag('00100010')).toBe(false);
  });
});
