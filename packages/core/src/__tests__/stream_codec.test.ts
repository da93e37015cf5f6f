import { describe, expect, it } from 'vitest';
import { StreamFormatError } from '../errors.js';
import { highestReferencedId, parseStream, serializeStream } from '../stream_codec.js';
import type { ReferenceStream } from '../types.js';

const MAGIC = [0x50, 0x42, 0x52, 0x53];

const sample: ReferenceStream = {
  mode: 'grow',
  boundary: 'exclusive',
  tokens: [
    { kind: 'ref', id: 1, terminator: '\r\n' },
    { kind: 'literal', bytes: Uint8Array.of(0x78), terminator: '\n' },
    { kind: 'ref', id: 2, terminator: '' },
  ],
};

describe('serializeStream', () => {
  it('writes header, tags and varint payloads', () => {
    expect([...serializeStream(sample)]).toEqual([
      ...MAGIC,
      1, // version
      0, // flags
      2, // highest id
      0x08, 1, // ref, CRLF
      0x05, 1, 0x78, // literal "x", LF
      0x00, 2, // ref, no terminator
    ]);
  });

  it('sets the strict and inclusive flags', () => {
    const bytes = serializeStream({ mode: 'strict', boundary: 'inclusive', tokens: [] });
    expect([...bytes]).toEqual([...MAGIC, 1, 0x03, 0]);
  });
});

describe('parseStream', () => {
  it('reads back tokens, mode and boundary', () => {
    const { stream, highestId } = parseStream(serializeStream(sample));
    expect(highestId).toBe(2);
    expect(stream.mode).toBe('grow');
    expect(stream.boundary).toBe('exclusive');
    expect(stream.tokens).toEqual(sample.tokens);
  });

  it('reads flags for strict inclusive streams', () => {
    const { stream } = parseStream(Uint8Array.of(...MAGIC, 1, 0x03, 0));
    expect(stream.mode).toBe('strict');
    expect(stream.boundary).toBe('inclusive');
    expect(stream.tokens).toEqual([]);
  });

  it('rejects bad magic and empty input', () => {
    expect(() => parseStream(new Uint8Array(0))).toThrow(StreamFormatError);
    expect(() => parseStream(Uint8Array.of(0x50, 0x4b, 3, 4, 1, 0, 0))).toThrow('bad magic bytes');
  });

  it('rejects other versions', () => {
    expect(() => parseStream(Uint8Array.of(...MAGIC, 2, 0, 0))).toThrow(
      'Unsupported reference stream version: 2 (expected 1) (at byte 4)',
    );
  });

  it('rejects unknown flags, tags and token kinds', () => {
    expect(() => parseStream(Uint8Array.of(...MAGIC, 1, 0x04, 0))).toThrow('Unknown header flags 0x4');
    expect(() => parseStream(Uint8Array.of(...MAGIC, 1, 0, 0, 0x10))).toThrow(
      'Invalid token tag 0x10 (at byte 7)',
    );
    expect(() => parseStream(Uint8Array.of(...MAGIC, 1, 0, 0, 0x02))).toThrow(
      'Unknown token kind 2 (at byte 7)',
    );
  });

  it('rejects truncated tokens', () => {
    const bytes = serializeStream(sample);
    expect(() => parseStream(bytes.subarray(0, bytes.length - 1))).toThrow(StreamFormatError);
    expect(() => parseStream(Uint8Array.of(...MAGIC, 1, 0, 0, 0x01, 5, 0x61))).toThrow(
      'Unexpected end of data reading 5-byte payload (at byte 9)',
    );
  });

  it('rejects id 0 and a header that disagrees with the tokens', () => {
    expect(() => parseStream(Uint8Array.of(...MAGIC, 1, 0, 0, 0x00, 0))).toThrow(
      'Reference to sentence id 0',
    );
    const bytes = serializeStream(sample);
    bytes[6] = 3;
    expect(() => parseStream(bytes)).toThrow('Header declares highest id 3 but tokens reference 2');
  });
});

describe('highestReferencedId', () => {
  it('is 0 without references', () => {
    expect(highestReferencedId([{ kind: 'literal', bytes: new Uint8Array(0), terminator: '' }])).toBe(0);
    expect(highestReferencedId(sample.tokens)).toBe(2);
  });
});
