import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { ByteReader, ByteWriter, bytesEqual, concatBytes } from '../bytes.js';

const fail = (message: string, offset: number): Error => new Error(`${message}@${offset}`);

describe('varints', () => {
  it('writes unsigned LEB128', () => {
    expect([...new ByteWriter().writeVarint(0).toBytes()]).toEqual([0x00]);
    expect([...new ByteWriter().writeVarint(127).toBytes()]).toEqual([0x7f]);
    expect([...new ByteWriter().writeVarint(128).toBytes()]).toEqual([0x80, 0x01]);
    expect([...new ByteWriter().writeVarint(300).toBytes()]).toEqual([0xac, 0x02]);
  });

  it('reads back any safe integer', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: Number.MAX_SAFE_INTEGER }), (value) => {
        const bytes = new ByteWriter(4).writeVarint(value).toBytes();
        expect(bytes.length).toBeLessThanOrEqual(8);
        const reader = new ByteReader(bytes, fail);
        expect(reader.readVarint()).toBe(value);
        expect(reader.done).toBe(true);
      }),
    );
  });

  it('rejects negative and fractional values', () => {
    expect(() => new ByteWriter().writeVarint(-1)).toThrow(RangeError);
    expect(() => new ByteWriter().writeVarint(1.5)).toThrow(RangeError);
  });

  it('reports truncated and overlong varints through the error factory', () => {
    expect(() => new ByteReader(Uint8Array.of(0x80), fail).readVarint()).toThrow('Truncated varint@0');
    expect(() => new ByteReader(new Uint8Array(9).fill(0x80), fail).readVarint()).toThrow(
      'Varint too long@0',
    );
  });
});

describe('ByteReader', () => {
  it('reads little-endian integers and length-prefixed payloads', () => {
    const bytes = new ByteWriter(2)
      .writeUint8(7)
      .writeUint32(0x01020304)
      .writeLengthPrefixed(Uint8Array.of(9, 8))
      .toBytes();
    expect([...bytes]).toEqual([7, 0x04, 0x03, 0x02, 0x01, 2, 9, 8]);

    const reader = new ByteReader(bytes, fail);
    expect(reader.readUint8()).toBe(7);
    expect(reader.readUint32()).toBe(0x01020304);
    expect([...reader.readLengthPrefixed()]).toEqual([9, 8]);
    expect(reader.done).toBe(true);
  });

  it('refuses to read past the end', () => {
    const reader = new ByteReader(Uint8Array.of(5, 1), fail);
    expect(() => reader.readLengthPrefixed()).toThrow('Unexpected end of data reading 5-byte payload@1');
  });
});

describe('byte helpers', () => {
  it('compares and concatenates', () => {
    expect(bytesEqual(Uint8Array.of(1, 2), Uint8Array.of(1, 2))).toBe(true);
    expect(bytesEqual(Uint8Array.of(1, 2), Uint8Array.of(1, 3))).toBe(false);
    expect(bytesEqual(Uint8Array.of(1), Uint8Array.of(1, 0))).toBe(false);
    expect([...concatBytes([Uint8Array.of(1), new Uint8Array(0), Uint8Array.of(2, 3)])]).toEqual([1, 2, 3]);
  });
});
