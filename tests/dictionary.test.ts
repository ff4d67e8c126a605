import { describe, expect, it } from 'vitest';
import {
  createDictionary,
  createNameResolver,
  displayName,
  EMPTY_DICTIONARY,
  loadStandardDictionary,
  lookupVR,
  UNKNOWN_NAME,
} from '../src/utils/dictionary.js';
import { createTag, parseTag } from '../src/utils/tagUtils.js';

describe('standard dictionary', () => {
  const dictionary = loadStandardDictionary();

  it('resolves known tags', () => {
    expect(dictionary.lookup(parseTag('x00100010'))?.name).toBe("Patient's Name");
    expect(dictionary.lookup(parseTag('7FE00010'))?.name).toBe('Pixel Data');
    expect(lookupVR(dictionary, parseTag('00100020'))).toBe('LO');
    expect(lookupVR(dictionary, parseTag('00081032'))).toBe('SQ');
  });

  it('covers tags beyond the common patient and image modules', () => {
    expect(dictionary.lookup(parseTag('00180024'))).toMatchObject({ name: 'Sequence Name', vr: 'SH' });
    expect(dictionary.lookup(parseTag('0018A001'))).toMatchObject({
      name: 'Contributing Equipment Sequence',
      vr: 'SQ',
      keyword: 'ContributingEquipmentSequence',
    });
    expect(dictionary.lookup(parseTag('00200032'))?.name).toBe('Image Position (Patient)');
  });

  it('resolves repeating groups', () => {
    expect(dictionary.lookup(createTag(0x6000, 0x3000))?.name).toBe('Overlay Data');
    expect(dictionary.lookup(createTag(0x6002, 0x3000))?.name).toBe('Overlay Data');
  });

  it('is loaded once', () => {
    expect(loadStandardDictionary()).toBe(dictionary);
    expect(dictionary.size).toBeGreaterThan(3000);
  });
});

describe('displayName', () => {
  it('splits keywords into words', () => {
    expect(displayName('SOPClassUID')).toBe('SOP Class UID');
    expect(displayName('NumberOfFrames')).toBe('Number of Frames');
    expect(displayName('OtherPatientIDs')).toBe('Other Patient IDs');
    expect(displayName('InStackPositionNumber')).toBe('In Stack Position Number');
  });
});

describe('name resolver', () => {
  it('falls back to Unknown for tags the dictionary lacks', () => {
    const resolve = createNameResolver(createDictionary({}));
    expect(resolve(createTag(0x0008, 0x0008))).toBe(UNKNOWN_NAME);
    expect(resolve(createTag(0x9998, 0x9999))).toBe('Unknown');
  });

  it('names group lengths and private tags', () => {
    const resolve = createNameResolver(EMPTY_DICTIONARY);
    expect(resolve(createTag(0x0028, 0x0000))).toBe('Group Length');
    expect(resolve(createTag(0x0009, 0x0010))).toBe('Private Creator');
    expect(resolve(createTag(0x0009, 0x1001))).toBe('Private tag data');
  });

  it('prefers dictionary names, matching keys case-insensitively', () => {
    const resolve = createNameResolver(
      createDictionary({ '0020000d': { name: 'Study Instance UID', vr: 'UI' } })
    );
    expect(resolve(createTag(0x0020, 0x000d))).toBe('Study Instance UID');
  });
});
