// ============================================================================
// @phrasebank/core — Reference Stream Decoder
// ============================================================================

import { concatBytes } from './bytes.js';
import { UnresolvedReferenceError } from './errors.js';
import { timer } from './logger.js';
import { terminatorBytes } from './splitter.js';
import type { ReferenceStream, ReferenceToken, SentenceLookup } from './types.js';

/**
 * Reconstruct the original bytes of a reference stream.
 *
 * References resolve through `dictionary.get()`; literals are copied
 * verbatim; each token's terminator is re-attached.
 *
 * @throws {UnresolvedReferenceError} When a referenced id is missing. The
 *   output is never produced partially or with a substitute.
 */
export function decodeStream(
  stream: ReferenceStream | readonly ReferenceToken[],
  dictionary: SentenceLookup,
): Uint8Array {
  const t = timer('decode');
  const tokens = isTokenList(stream) ? stream : stream.tokens;
  const parts: Uint8Array[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.kind === 'ref') {
      const bytes = dictionary.get(token.id);
      if (bytes === undefined) {
        throw new UnresolvedReferenceError(token.id, i);
      }
      parts.push(bytes);
    } else {
      parts.push(token.bytes);
    }
    parts.push(terminatorBytes(token.terminator));
  }

  const output = concatBytes(parts);
  t.endWith({ tokens: tokens.length, outputBytes: output.length });
  return output;
}

function isTokenList(
  stream: ReferenceStream | readonly ReferenceToken[],
): stream is readonly ReferenceToken[] {
  return Array.isArray(stream);
}
