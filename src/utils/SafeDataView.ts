/**
 * SafeDataView: Safe byte reading wrapper
 *
 * Provides bounds-checked reads over one element's value bytes.
 */

/**
 * DataView wrapper for safe byte reading
 */
export class SafeDataView {
  private readonly view: DataView;
  private offset: number;
  private readonly littleEndian: boolean;

  constructor(bytes: Uint8Array, littleEndian: boolean = true) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.offset = 0;
    this.littleEndian = littleEndian;
  }

  getRemainingBytes(): number {
    return this.view.byteLength - this.offset;
  }

  private claim(size: number): number {
    if (this.offset + size > this.view.byteLength) {
      throw new Error(`Read beyond buffer at offset ${this.offset}`);
    }
    const at = this.offset;
    this.offset += size;
    return at;
  }

  readUint16(): number {
    return this.view.getUint16(this.claim(2), this.littleEndian);
  }

  readInt16(): number {
    return this.view.getInt16(this.claim(2), this.littleEndian);
  }

  readUint32(): number {
    return this.view.getUint32(this.claim(4), this.littleEndian);
  }

  readInt32(): number {
    return this.view.getInt32(this.claim(4), this.littleEndian);
  }

  readFloat32(): number {
    return this.view.getFloat32(this.claim(4), this.littleEndian);
  }

  readFloat64(): number {
    return this.view.getFloat64(this.claim(8), this.littleEndian);
  }

  readBigUint64(): bigint {
    return this.view.getBigUint64(this.claim(8), this.littleEndian);
  }

  readBigInt64(): bigint {
    return this.view.getBigInt64(this.claim(8), this.littleEndian);
  }

  readBytes(length: number): Uint8Array {
    const at = this.claim(length);
    return new Uint8Array(this.view.buffer, this.view.byteOffset + at, length);
  }

  /**
   * Read a string and drop trailing NUL and space padding
   */
  readString(length: number, characterSet: string = ''): string {
    const bytes = this.readBytes(length);
    let end = bytes.length;
    while (end > 0 && (bytes[end - 1] === 0 || bytes[end - 1] === 32)) {
      end--;
    }
    return decodeString(bytes.subarray(0, end), characterSet);
  }
}

/**
 * Specific Character Set (0008,0005) terms mapped to WHATWG encoding labels
 */
const CHARACTER_SETS: Record<string, string> = {
  'ISO_IR 6': 'latin1',
  'ISO_IR 100': 'latin1',
  'ISO_IR 101': 'iso-8859-2',
  'ISO_IR 109': 'iso-8859-3',
  'ISO_IR 110': 'iso-8859-4',
  'ISO_IR 144': 'iso-8859-5',
  'ISO_IR 127': 'iso-8859-6',
  'ISO_IR 126': 'iso-8859-7',
  'ISO_IR 138': 'iso-8859-8',
  'ISO_IR 148': 'windows-1254',
  'ISO_IR 166': 'windows-874',
  'ISO_IR 13': 'shift_jis',
  'ISO_IR 192': 'utf-8',
  GB18030: 'gb18030',
  GBK: 'gbk',
};

/**
 * Pick the decoder label for a (possibly multi-valued) Specific Character Set.
 * Code extensions (ISO 2022) fall back to their first term.
 */
export function encodingForCharacterSet(characterSet: string): string {
  const terms = characterSet
    .split('\\')
    .map((term) => term.trim().replace('ISO 2022 IR', 'ISO_IR'))
    .filter((term) => term.length > 0);
  for (const term of terms) {
    const label = CHARACTER_SETS[term];
    if (label) {
      return label;
    }
  }
  return 'latin1';
}

/**
 * Decode string based on DICOM character set
 */
export function decodeString(bytes: Uint8Array, characterSet: string = ''): string {
  return new TextDecoder(encodingForCharacterSet(characterSet)).decode(bytes);
}
