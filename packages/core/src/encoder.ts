// ============================================================================
// @phrasebank/core — Reference Stream Encoder
// ============================================================================

import { timer } from './logger.js';
import { sentenceKey, splitSentences } from './splitter.js';
import type {
  BoundaryRule,
  EncodeMode,
  EncodeResult,
  ReferenceToken,
  SentenceDictionary,
} from './types.js';

export interface EncodeOptions {
  mode: EncodeMode;
  boundary: BoundaryRule;
}

/**
 * Encode text into a reference stream against a dictionary.
 *
 * In `grow` mode every non-empty sentence goes through `insertOrGet` (hits
 * count as occurrences) and the whole encode commits as one transaction. In
 * `strict` mode sentences are only looked up; misses become literals and the
 * dictionary is left exactly as it was. Blank units are always empty literals.
 */
export function encodeSentences(
  input: Uint8Array,
  dictionary: SentenceDictionary,
  options: EncodeOptions,
): EncodeResult {
  const t = timer('encode');
  const sizeBefore = dictionary.size;
  const units = splitSentences(input);

  const run = (): ReferenceToken[] => {
    const tokens: ReferenceToken[] = [];
    for (const unit of units) {
      const { key, terminator } = sentenceKey(unit, options.boundary);
      if (key.length === 0) {
        tokens.push({ kind: 'literal', bytes: key, terminator });
        continue;
      }

      const id =
        options.mode === 'grow' ? dictionary.insertOrGet(key) : dictionary.lookup(key);
      if (id === undefined) {
        tokens.push({ kind: 'literal', bytes: key, terminator });
      } else {
        tokens.push({ kind: 'ref', id, terminator });
      }
    }
    return tokens;
  };

  const tokens = options.mode === 'grow' ? dictionary.transaction(run) : run();

  let references = 0;
  for (const token of tokens) {
    if (token.kind === 'ref') references++;
  }

  const stats = {
    units: units.length,
    references,
    literals: tokens.length - references,
    newSentences: dictionary.size - sizeBefore,
    inputBytes: input.length,
  };
  t.endWith({ mode: options.mode, ...stats });

  return {
    stream: { mode: options.mode, boundary: options.boundary, tokens },
    stats,
  };
}
