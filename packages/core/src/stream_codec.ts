// ============================================================================
// @phrasebank/core — Reference Stream File Format
// ============================================================================
//
// Layout (all multi-byte integers are unsigned LEB128 varints):
//
//   [Magic 'PBRS': 4 bytes] [Version: 1 byte] [Flags: 1 byte] [HighestId: varint]
//   [Token]*
//
//   Flags:  bit 0 = strict mode, bit 1 = inclusive boundary
//   Token:  [Tag: 1 byte] then
//             Reference → [id: varint]
//             Literal   → [length: varint] [bytes]
//   Tag:    bits 0-1 = kind (0 Reference, 1 Literal)
//           bits 2-3 = terminator (0 none, 1 LF, 2 CRLF, 3 CR)
//           bits 4-7 = zero
//
// HighestId is the largest id any Reference carries (0 when there are none),
// so a decoder can detect a too-small dictionary before resolving tokens.
// ============================================================================

import { ByteReader, ByteWriter } from './bytes.js';
import { StreamFormatError } from './errors.js';
import type { ReferenceStream, ReferenceToken, Terminator } from './types.js';

export const STREAM_MAGIC = Uint8Array.of(0x50, 0x42, 0x52, 0x53); // 'PBRS'
export const STREAM_VERSION = 1;

const FLAG_STRICT = 0x01;
const FLAG_INCLUSIVE = 0x02;

const KIND_REF = 0;
const KIND_LITERAL = 1;

const TERMINATOR_CODES: Record<Terminator, number> = {
  '': 0,
  '\n': 1,
  '\r\n': 2,
  '\r': 3,
};

const TERMINATORS_BY_CODE: readonly Terminator[] = ['', '\n', '\r\n', '\r'];

export interface ParsedStream {
  stream: ReferenceStream;
  highestId: number;
}

/** Largest referenced id, or 0 for a stream without references. */
export function highestReferencedId(tokens: readonly ReferenceToken[]): number {
  let highest = 0;
  for (const token of tokens) {
    if (token.kind === 'ref' && token.id > highest) highest = token.id;
  }
  return highest;
}

/**
 * Serialize a reference stream to its binary file form.
 */
export function serializeStream(stream: ReferenceStream): Uint8Array {
  const writer = new ByteWriter(64 + stream.tokens.length * 3);
  let flags = 0;
  if (stream.mode === 'strict') flags |= FLAG_STRICT;
  if (stream.boundary === 'inclusive') flags |= FLAG_INCLUSIVE;

  writer
    .writeBytes(STREAM_MAGIC)
    .writeUint8(STREAM_VERSION)
    .writeUint8(flags)
    .writeVarint(highestReferencedId(stream.tokens));

  for (const token of stream.tokens) {
    const terminatorCode = TERMINATOR_CODES[token.terminator] << 2;
    if (token.kind === 'ref') {
      writer.writeUint8(KIND_REF | terminatorCode).writeVarint(token.id);
    } else {
      writer.writeUint8(KIND_LITERAL | terminatorCode).writeLengthPrefixed(token.bytes);
    }
  }

  return writer.toBytes();
}

/**
 * Parse a binary reference stream.
 *
 * @throws {StreamFormatError} On a bad header, unknown tag bits, truncated
 *   tokens or a header id that disagrees with the tokens.
 */
export function parseStream(bytes: Uint8Array): ParsedStream {
  const reader = new ByteReader(bytes, (message, offset) => new StreamFormatError(message, offset));

  for (let i = 0; i < STREAM_MAGIC.length; i++) {
    if (reader.done || reader.readUint8() !== STREAM_MAGIC[i]) {
      throw new StreamFormatError('Not a phrasebank reference stream (bad magic bytes)', 0);
    }
  }

  const version = reader.readUint8();
  if (version !== STREAM_VERSION) {
    throw new StreamFormatError(
      `Unsupported reference stream version: ${version} (expected ${STREAM_VERSION})`,
      4,
    );
  }

  const flags = reader.readUint8();
  if ((flags & ~(FLAG_STRICT | FLAG_INCLUSIVE)) !== 0) {
    throw new StreamFormatError(`Unknown header flags 0x${flags.toString(16)}`, 5);
  }
  const declaredHighest = reader.readVarint();

  const tokens: ReferenceToken[] = [];
  while (!reader.done) {
    const tagOffset = reader.offset;
    const tag = reader.readUint8();
    if ((tag & 0xf0) !== 0) {
      throw new StreamFormatError(`Invalid token tag 0x${tag.toString(16)}`, tagOffset);
    }
    const terminator = TERMINATORS_BY_CODE[(tag >> 2) & 0x03];
    const kind = tag & 0x03;

    if (kind === KIND_REF) {
      const id = reader.readVarint();
      if (id < 1) {
        throw new StreamFormatError('Reference to sentence id 0', tagOffset);
      }
      tokens.push({ kind: 'ref', id, terminator });
    } else if (kind === KIND_LITERAL) {
      tokens.push({ kind: 'literal', bytes: reader.readLengthPrefixed(), terminator });
    } else {
      throw new StreamFormatError(`Unknown token kind ${kind}`, tagOffset);
    }
  }

  const highestId = highestReferencedId(tokens);
  if (highestId !== declaredHighest) {
    throw new StreamFormatError(
      `Header declares highest id ${declaredHighest} but tokens reference ${highestId}`,
    );
  }

  return {
    stream: {
      mode: flags & FLAG_STRICT ? 'strict' : 'grow',
      boundary: flags & FLAG_INCLUSIVE ? 'inclusive' : 'exclusive',
      tokens,
    },
    highestId,
  };
}
