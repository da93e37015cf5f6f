// ============================================================================
// @phrasebank/core — Sentence Dictionary
// ============================================================================
//
// Content-addressed store of sentence bytes. Each distinct byte sequence gets
// one integer id on first insertion; ids start at 1, grow by one and are never
// reused. A hash only selects a bucket: every access compares full bytes, so
// two sentences sharing a hash are two entries in one bucket.
//
// Mutations run inside transactions. The base class keeps everything in
// memory; subclasses override `commit()` to make a transaction durable. If
// the body or the commit throws, the in-memory state is rolled back.
// ============================================================================

import { bytesEqual } from './bytes.js';
import { DatabaseCorruptionError } from './errors.js';
import { DEFAULT_HASH_ALGORITHM, createHasher } from './hashing.js';
import { debug } from './logger.js';
import type {
  ContentHasher,
  DictionaryChange,
  DictionaryStats,
  SentenceDictionary,
  SentenceEntry,
} from './types.js';

export interface MemoryDictionaryOptions {
  /** Defaults to SHA-256. */
  hasher?: ContentHasher;
}

/** Result of {@link MemoryDictionary.verify}. */
export interface VerifyReport {
  entries: number;
  /** Ids whose stored hash differs from a fresh hash of their bytes. */
  hashMismatches: number[];
  /** Pairs of ids holding identical bytes. */
  duplicates: Array<[number, number]>;
  ok: boolean;
}

/**
 * In-memory sentence dictionary.
 *
 * @example
 * ```ts
 * const dict = new MemoryDictionary();
 * const id1 = dict.insertOrGet(utf8('TONIGHT')); // → 1
 * const id2 = dict.insertOrGet(utf8('TODAY'));   // → 2
 * const id3 = dict.insertOrGet(utf8('TONIGHT')); // → 1 (occurrenceCount 2)
 * ```
 */
export class MemoryDictionary implements SentenceDictionary {
  readonly hasher: ContentHasher;
  private buckets = new Map<string, SentenceEntry[]>();
  private byId = new Map<number, SentenceEntry>();
  private nextIdValue = 1;
  private collisionCount = 0;
  private pending: DictionaryChange[] | null = null;

  constructor(options: MemoryDictionaryOptions = {}) {
    this.hasher = options.hasher ?? createHasher(DEFAULT_HASH_ALGORITHM);
  }

  get size(): number {
    return this.byId.size;
  }

  /** The id the next new sentence will receive. */
  get nextId(): number {
    return this.nextIdValue;
  }

  lookup(bytes: Uint8Array): number | undefined {
    return this.find(bytes, this.hasher.hash(bytes))?.id;
  }

  insertOrGet(bytes: Uint8Array): number {
    return this.transaction(() => {
      const contentHash = this.hasher.hash(bytes);
      const existing = this.find(bytes, contentHash);
      if (existing) {
        existing.occurrenceCount++;
        this.record({ type: 'occurrence', id: existing.id, delta: 1 });
        return existing.id;
      }

      const entry: SentenceEntry = {
        id: this.nextIdValue,
        rawBytes: bytes.slice(),
        contentHash,
        occurrenceCount: 1,
      };
      this.nextIdValue++;
      this.index(entry);
      this.record({ type: 'put', entry });
      return entry.id;
    });
  }

  /**
   * Stored bytes for `id`. The returned array is the dictionary's own copy
   * and must not be modified.
   */
  get(id: number): Uint8Array | undefined {
    return this.byId.get(id)?.rawBytes;
  }

  entry(id: number): SentenceEntry | undefined {
    const entry = this.byId.get(id);
    return entry ? { ...entry } : undefined;
  }

  /** All entries in id order. */
  *entries(): IterableIterator<SentenceEntry> {
    const ids = [...this.byId.keys()].sort((a, b) => a - b);
    for (const id of ids) {
      const entry = this.byId.get(id);
      if (entry) yield { ...entry };
    }
  }

  transaction<T>(fn: () => T): T {
    if (this.pending) return fn();

    const changes: DictionaryChange[] = [];
    const nextIdBefore = this.nextIdValue;
    this.pending = changes;
    try {
      const result = fn();
      if (changes.length > 0) {
        this.commit(changes);
      }
      return result;
    } catch (err) {
      this.rollback(changes, nextIdBefore);
      throw err;
    } finally {
      this.pending = null;
    }
  }

  stats(): DictionaryStats {
    let totalOccurrences = 0;
    for (const entry of this.byId.values()) totalOccurrences += entry.occurrenceCount;
    let sharedBuckets = 0;
    for (const bucket of this.buckets.values()) {
      if (bucket.length > 1) sharedBuckets++;
    }
    return {
      entries: this.byId.size,
      totalOccurrences,
      buckets: this.buckets.size,
      sharedBuckets,
      collisions: this.collisionCount,
      nextId: this.nextIdValue,
    };
  }

  /**
   * Most frequent sentences, highest count first, ties by ascending id.
   */
  topSentences(limit: number): SentenceEntry[] {
    const sorted = [...this.byId.values()].sort(
      (a, b) => b.occurrenceCount - a.occurrenceCount || a.id - b.id,
    );
    return sorted.slice(0, Math.max(0, limit)).map((entry) => ({ ...entry }));
  }

  /**
   * Recompute every hash and look for the same bytes stored under two ids.
   */
  verify(): VerifyReport {
    const hashMismatches: number[] = [];
    const duplicates: Array<[number, number]> = [];
    const fresh = new Map<string, SentenceEntry[]>();

    for (const entry of this.entries()) {
      const hash = this.hasher.hash(entry.rawBytes);
      if (hash !== entry.contentHash) hashMismatches.push(entry.id);

      const bucket = fresh.get(hash);
      if (!bucket) {
        fresh.set(hash, [entry]);
        continue;
      }
      const twin = bucket.find((other) => bytesEqual(other.rawBytes, entry.rawBytes));
      if (twin) duplicates.push([twin.id, entry.id]);
      bucket.push(entry);
    }

    return {
      entries: this.byId.size,
      hashMismatches,
      duplicates,
      ok: hashMismatches.length === 0 && duplicates.length === 0,
    };
  }

  // ---- Subclass hooks ----

  /**
   * Make a finished transaction durable. Throwing rolls the transaction back.
   */
  protected commit(_changes: readonly DictionaryChange[]): void {}

  /**
   * Load a persisted entry without recording a change.
   * @throws {DatabaseCorruptionError} On a reused id or duplicated content.
   */
  protected restoreEntry(entry: SentenceEntry): void {
    if (!Number.isSafeInteger(entry.id) || entry.id < 1) {
      throw new DatabaseCorruptionError(`invalid sentence id ${entry.id}`);
    }
    if (this.byId.has(entry.id)) {
      throw new DatabaseCorruptionError(`sentence id ${entry.id} is stored twice`);
    }
    const twin = this.buckets
      .get(entry.contentHash)
      ?.find((other) => bytesEqual(other.rawBytes, entry.rawBytes));
    if (twin) {
      throw new DatabaseCorruptionError(
        `identical content stored under ids ${twin.id} and ${entry.id}`,
      );
    }
    this.index({ ...entry });
    if (entry.id >= this.nextIdValue) this.nextIdValue = entry.id + 1;
  }

  protected restoreOccurrences(id: number, delta: number): void {
    const entry = this.byId.get(id);
    if (!entry) {
      throw new DatabaseCorruptionError(`occurrence update for unknown sentence id ${id}`);
    }
    entry.occurrenceCount += delta;
  }

  /** Raise the next id; ids below it stay retired even if never stored. */
  protected restoreNextId(nextId: number): void {
    if (nextId > this.nextIdValue) this.nextIdValue = nextId;
  }

  // ---- Internals ----

  private find(bytes: Uint8Array, contentHash: string): SentenceEntry | undefined {
    const bucket = this.buckets.get(contentHash);
    if (!bucket) return undefined;
    for (const entry of bucket) {
      if (bytesEqual(entry.rawBytes, bytes)) return entry;
    }
    this.collisionCount++;
    debug('hash collision', {
      hash: contentHash,
      candidates: bucket.map((entry) => entry.id),
    });
    return undefined;
  }

  private index(entry: SentenceEntry): void {
    this.byId.set(entry.id, entry);
    const bucket = this.buckets.get(entry.contentHash);
    if (bucket) {
      bucket.push(entry);
    } else {
      this.buckets.set(entry.contentHash, [entry]);
    }
  }

  private unindex(entry: SentenceEntry): void {
    this.byId.delete(entry.id);
    const bucket = this.buckets.get(entry.contentHash);
    if (!bucket) return;
    const remaining = bucket.filter((other) => other.id !== entry.id);
    if (remaining.length > 0) {
      this.buckets.set(entry.contentHash, remaining);
    } else {
      this.buckets.delete(entry.contentHash);
    }
  }

  private record(change: DictionaryChange): void {
    this.pending?.push(change);
  }

  private rollback(changes: readonly DictionaryChange[], nextIdBefore: number): void {
    for (let i = changes.length - 1; i >= 0; i--) {
      const change = changes[i];
      if (change.type === 'put') {
        this.unindex(change.entry);
      } else {
        const entry = this.byId.get(change.id);
        if (entry) entry.occurrenceCount -= change.delta;
      }
    }
    this.nextIdValue = nextIdBefore;
  }
}
