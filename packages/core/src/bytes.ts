// ============================================================================
// @phrasebank/core — Byte Buffers & Varints
// ============================================================================
//
// Unsigned LEB128 varints: 7 bits per byte, low group first, high bit set on
// every byte but the last. Values are limited to Number.MAX_SAFE_INTEGER, so
// arithmetic stays in doubles rather than 32-bit bitwise operators.
// ============================================================================

const MAX_VARINT_BYTES = 8;

/** Compare two byte sequences for exact equality. */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a === b) return true;
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  let total = 0;
  for (const part of parts) total += part.length;
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Growable byte buffer with little-endian fixed-width and varint writers.
 */
export class ByteWriter {
  private buffer: Uint8Array;
  private view: DataView;
  private length = 0;

  constructor(initialCapacity = 256) {
    this.buffer = new Uint8Array(initialCapacity);
    this.view = new DataView(this.buffer.buffer);
  }

  get byteLength(): number {
    return this.length;
  }

  writeUint8(value: number): this {
    this.ensure(1);
    this.buffer[this.length++] = value & 0xff;
    return this;
  }

  writeUint32(value: number): this {
    this.ensure(4);
    this.view.setUint32(this.length, value >>> 0, true);
    this.length += 4;
    return this;
  }

  writeVarint(value: number): this {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`Varint value out of range: ${value}`);
    }
    let rest = value;
    while (rest >= 0x80) {
      this.writeUint8((rest % 128) | 0x80);
      rest = Math.floor(rest / 128);
    }
    return this.writeUint8(rest);
  }

  writeBytes(bytes: Uint8Array): this {
    this.ensure(bytes.length);
    this.buffer.set(bytes, this.length);
    this.length += bytes.length;
    return this;
  }

  /** Varint length followed by the bytes. */
  writeLengthPrefixed(bytes: Uint8Array): this {
    return this.writeVarint(bytes.length).writeBytes(bytes);
  }

  /** Copy of the written bytes. */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }

  private ensure(extra: number): void {
    const needed = this.length + extra;
    if (needed <= this.buffer.length) return;
    let capacity = this.buffer.length * 2;
    while (capacity < needed) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.length));
    this.buffer = next;
    this.view = new DataView(next.buffer);
  }
}

/** Builds the error a reader throws on malformed input. */
export type ReadErrorFactory = (message: string, offset: number) => Error;

/**
 * Cursor over a byte array. Every read past the end or malformed varint is
 * reported through the caller's error factory, so stream and storage readers
 * raise their own error types.
 */
export class ByteReader {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;
  private readonly fail: ReadErrorFactory;
  offset: number;

  constructor(bytes: Uint8Array, fail: ReadErrorFactory, offset = 0) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.fail = fail;
    this.offset = offset;
  }

  get done(): boolean {
    return this.offset >= this.bytes.length;
  }

  readUint8(): number {
    this.require(1, 'byte');
    return this.bytes[this.offset++];
  }

  readUint32(): number {
    this.require(4, 'uint32');
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readVarint(): number {
    const start = this.offset;
    let value = 0;
    let scale = 1;
    for (let i = 0; i < MAX_VARINT_BYTES; i++) {
      if (this.offset >= this.bytes.length) {
        throw this.fail('Truncated varint', start);
      }
      const byte = this.bytes[this.offset++];
      value += (byte & 0x7f) * scale;
      if ((byte & 0x80) === 0) {
        if (!Number.isSafeInteger(value)) {
          throw this.fail('Varint exceeds safe integer range', start);
        }
        return value;
      }
      scale *= 128;
    }
    throw this.fail('Varint too long', start);
  }

  /** Subarray view of the next `length` bytes. */
  readBytes(length: number): Uint8Array {
    this.require(length, `${length}-byte payload`);
    const out = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    return out;
  }

  readLengthPrefixed(): Uint8Array {
    return this.readBytes(this.readVarint());
  }

  private require(length: number, what: string): void {
    if (this.offset + length > this.bytes.length) {
      throw this.fail(`Unexpected end of data reading ${what}`, this.offset);
    }
  }
}
