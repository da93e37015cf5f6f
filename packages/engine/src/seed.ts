// ============================================================================
// @phrasebank/engine — Corpus Seeding
// ============================================================================

import {
  type BoundaryRule,
  type SentenceDictionary,
  logger,
  sentenceKey,
  splitSentences,
} from '@phrasebank/core';
import { readInputFile } from './files.js';
import type { SeedStats } from './types.js';

/**
 * Insert every sentence of every file into the dictionary, in file order and
 * then line order.
 *
 * All files are read before the dictionary is touched: one unreadable file
 * aborts the seed with no mutation. Each file then commits as its own
 * transaction. Blank units are counted but never stored. Seeding the same
 * corpus twice assigns no new ids and doubles the occurrence counts.
 *
 * @throws {FileNotFoundError | UnreadableInputError}
 */
export function seedCorpus(
  dictionary: SentenceDictionary,
  files: readonly string[],
  boundary: BoundaryRule = 'exclusive',
): SeedStats {
  const t = logger.timer('seed');
  const corpus = files.map((filePath) => ({ filePath, bytes: readInputFile(filePath, 'seed') }));

  const stats: SeedStats = {
    files: corpus.length,
    units: 0,
    blankUnits: 0,
    newSentences: 0,
    knownSentences: 0,
    bytesRead: 0,
  };

  for (const { filePath, bytes } of corpus) {
    const units = splitSentences(bytes);
    dictionary.transaction(() => {
      for (const unit of units) {
        const { key } = sentenceKey(unit, boundary);
        if (key.length === 0) {
          stats.blankUnits++;
          continue;
        }
        const sizeBefore = dictionary.size;
        dictionary.insertOrGet(key);
        if (dictionary.size > sizeBefore) {
          stats.newSentences++;
        } else {
          stats.knownSentences++;
        }
      }
    });
    stats.units += units.length;
    stats.bytesRead += bytes.length;
    logger.debug('Seeded file', { path: filePath, units: units.length, bytes: bytes.length });
  }

  t.endWith({ ...stats });
  return stats;
}
