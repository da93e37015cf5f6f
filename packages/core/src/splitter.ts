// ============================================================================
// @phrasebank/core — Sentence Splitter
// ============================================================================
//
// Boundary rule: a sentence unit ends at CRLF, LF, or a lone CR. The
// terminator is reported next to the body, never inside it. The last unit has
// an empty terminator only when the input does not end with one, so
// `joinUnits(splitSentences(x))` is byte-identical to `x` for every input.
// Nothing is trimmed, folded or re-encoded.
// ============================================================================

import { concatBytes } from './bytes.js';
import type { BoundaryRule, SentenceUnit, Terminator } from './types.js';

const LF = 0x0a;
const CR = 0x0d;

const TERMINATOR_BYTES: Record<Terminator, Uint8Array> = {
  '': new Uint8Array(0),
  '\n': Uint8Array.of(LF),
  '\r\n': Uint8Array.of(CR, LF),
  '\r': Uint8Array.of(CR),
};

export function terminatorBytes(terminator: Terminator): Uint8Array {
  return TERMINATOR_BYTES[terminator];
}

/**
 * Split bytes into sentence units.
 *
 * @example
 * ```ts
 * splitSentences(utf8('TONIGHT\r\nTODAY\n\nlast'));
 * // → [{ body: 'TONIGHT', terminator: '\r\n' }, { body: 'TODAY', terminator: '\n' },
 * //    { body: '', terminator: '\n' }, { body: 'last', terminator: '' }]
 * ```
 */
export function splitSentences(input: Uint8Array): SentenceUnit[] {
  const units: SentenceUnit[] = [];
  let start = 0;
  let i = 0;

  while (i < input.length) {
    const byte = input[i];
    if (byte === LF) {
      units.push({ body: input.subarray(start, i), terminator: '\n' });
      i += 1;
      start = i;
    } else if (byte === CR) {
      if (i + 1 < input.length && input[i + 1] === LF) {
        units.push({ body: input.subarray(start, i), terminator: '\r\n' });
        i += 2;
      } else {
        units.push({ body: input.subarray(start, i), terminator: '\r' });
        i += 1;
      }
      start = i;
    } else {
      i++;
    }
  }

  if (start < input.length) {
    units.push({ body: input.subarray(start), terminator: '' });
  }

  return units;
}

/** Inverse of {@link splitSentences}. */
export function joinUnits(units: readonly SentenceUnit[]): Uint8Array {
  const parts: Uint8Array[] = [];
  for (const unit of units) {
    parts.push(unit.body, TERMINATOR_BYTES[unit.terminator]);
  }
  return concatBytes(parts);
}

/**
 * The bytes a unit is stored under, and the terminator its token must carry.
 */
export function sentenceKey(
  unit: SentenceUnit,
  boundary: BoundaryRule,
): { key: Uint8Array; terminator: Terminator } {
  if (boundary === 'exclusive' || unit.terminator === '') {
    return { key: unit.body, terminator: unit.terminator };
  }
  return {
    key: concatBytes([unit.body, TERMINATOR_BYTES[unit.terminator]]),
    terminator: '',
  };
}
