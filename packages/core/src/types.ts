// ============================================================================
// @phrasebank/core — Type Definitions
// ============================================================================

// ---- Splitting ----

/** Line terminator that ended a sentence unit. `''` only for a final unterminated unit. */
export type Terminator = '' | '\n' | '\r\n' | '\r';

/** One splitter-delimited segment of input. `body` excludes the terminator. */
export interface SentenceUnit {
  body: Uint8Array;
  terminator: Terminator;
}

/**
 * Where the terminator lives.
 * - `exclusive`: the dictionary stores the body; the terminator rides in the token.
 * - `inclusive`: the dictionary stores body + terminator; tokens carry none.
 */
export type BoundaryRule = 'exclusive' | 'inclusive';

// ---- Dictionary ----

/** A stored sentence. `id` and `rawBytes` never change once assigned. */
export interface SentenceEntry {
  readonly id: number;
  readonly rawBytes: Uint8Array;
  readonly contentHash: string;
  occurrenceCount: number;
}

/** Computes the fixed-width content hash used to bucket sentences. */
export interface ContentHasher {
  /** Name recorded alongside a persisted dictionary. */
  readonly algorithm: string;
  hash(bytes: Uint8Array): string;
}

/** Read side of a dictionary: enough to decode a stream. */
export interface SentenceLookup {
  lookup(bytes: Uint8Array): number | undefined;
  get(id: number): Uint8Array | undefined;
}

/**
 * Content-addressed sentence dictionary.
 *
 * Equality is always decided on bytes; the hash only selects a bucket.
 */
export interface SentenceDictionary extends SentenceLookup {
  readonly hasher: ContentHasher;
  readonly size: number;
  insertOrGet(bytes: Uint8Array): number;
  entry(id: number): SentenceEntry | undefined;
  entries(): IterableIterator<SentenceEntry>;
  /** Run `fn` as one atomic mutation. Nested calls join the outer transaction. */
  transaction<T>(fn: () => T): T;
  stats(): DictionaryStats;
}

export interface DictionaryStats {
  entries: number;
  totalOccurrences: number;
  buckets: number;
  /** Buckets holding more than one distinct sentence. */
  sharedBuckets: number;
  /** Hash hits without a byte match observed since the dictionary was opened. */
  collisions: number;
  nextId: number;
}

/** A single mutation, in the order it happened inside a transaction. */
export type DictionaryChange =
  | { type: 'put'; entry: SentenceEntry }
  | { type: 'occurrence'; id: number; delta: number };

// ---- Reference stream ----

/**
 * - `grow`: unknown sentences are inserted and referenced.
 * - `strict`: unknown sentences become literals; the dictionary is untouched.
 */
export type EncodeMode = 'grow' | 'strict';

export type ReferenceToken =
  | { kind: 'ref'; id: number; terminator: Terminator }
  | { kind: 'literal'; bytes: Uint8Array; terminator: Terminator };

export interface ReferenceStream {
  mode: EncodeMode;
  boundary: BoundaryRule;
  tokens: ReferenceToken[];
}

export interface EncodeStats {
  units: number;
  references: number;
  literals: number;
  /** Sentences the encode added to the dictionary (grow mode only). */
  newSentences: number;
  inputBytes: number;
}

export interface EncodeResult {
  stream: ReferenceStream;
  stats: EncodeStats;
}
