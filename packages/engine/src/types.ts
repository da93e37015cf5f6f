// ============================================================================
// @phrasebank/engine — Type Definitions
// ============================================================================

import type { BoundaryRule, EncodeMode } from '@phrasebank/core';

/**
 * Settings fixed for the life of a dictionary and persisted in its snapshot.
 */
export interface DictionarySettings {
  hashAlgorithm: string;
  boundary: BoundaryRule;
  /** Set by the first encode; null until then. */
  encodeMode: EncodeMode | null;
}

/** Files making up one dictionary directory. */
export interface DictionaryPaths {
  dir: string;
  snapshot: string;
  wal: string;
  lock: string;
}

export interface SeedStats {
  files: number;
  units: number;
  /** Blank units: counted, never stored. */
  blankUnits: number;
  newSentences: number;
  knownSentences: number;
  bytesRead: number;
}

export interface FileEncodeStats {
  inputPath: string;
  outputPath: string;
  mode: EncodeMode;
  inputBytes: number;
  outputBytes: number;
  units: number;
  references: number;
  literals: number;
  newSentences: number;
}
