// ============================================================================
// @phrasebank/engine — Persistent Sentence Dictionary
// ============================================================================

import {
  type BoundaryRule,
  ConfigError,
  type ContentHasher,
  DEFAULT_HASH_ALGORITHM,
  type DictionaryChange,
  type EncodeMode,
  type EncodeResult,
  MemoryDictionary,
  ReadOnlyDictionaryError,
  createHasher,
  encodeSentences,
  isHashAlgorithm,
  logger,
} from '@phrasebank/core';
import { seedCorpus } from './seed.js';
import { DictionaryStore } from './storage.js';
import type { Snapshot } from './storage/snapshot.js';
import type { CommittedTransaction, WalRecord } from './storage/wal.js';
import type { DictionaryPaths, DictionarySettings, SeedStats } from './types.js';

export const DEFAULT_COMPACT_THRESHOLD_BYTES = 1024 * 1024;

export interface OpenDictionaryOptions {
  /** Open without the writer lock; every mutation throws. */
  readOnly?: boolean;
  /** Built-in algorithm for a new dictionary; must match an existing one. */
  hashAlgorithm?: string;
  /** Custom hasher; its `algorithm` is recorded and must match on reopen. */
  hasher?: ContentHasher;
  /** Boundary rule for a new dictionary; must match an existing one. */
  boundary?: BoundaryRule;
  /** Log size above which `close()` compacts. */
  compactThresholdBytes?: number;
}

function resolveHasher(settings: DictionarySettings, options: OpenDictionaryOptions): ContentHasher {
  if (options.hasher) {
    if (options.hasher.algorithm !== settings.hashAlgorithm) {
      throw new ConfigError(
        `Dictionary uses hash algorithm "${settings.hashAlgorithm}", not "${options.hasher.algorithm}"`,
        'hashAlgorithm',
      );
    }
    return options.hasher;
  }
  if (!isHashAlgorithm(settings.hashAlgorithm)) {
    throw new ConfigError(
      `Dictionary uses custom hash algorithm "${settings.hashAlgorithm}"; supply a hasher to open it`,
      'hashAlgorithm',
    );
  }
  return createHasher(settings.hashAlgorithm);
}

function checkRecorded<K extends keyof DictionarySettings>(
  settings: DictionarySettings,
  key: K,
  requested: DictionarySettings[K] | undefined,
): void {
  if (requested !== undefined && requested !== settings[key]) {
    throw new ConfigError(
      `Dictionary was created with ${key} "${String(settings[key])}"; cannot open it with "${String(requested)}"`,
      key,
    );
  }
}

/**
 * PersistentDictionary: a {@link MemoryDictionary} whose transactions are
 * durable.
 *
 * Every committed transaction is appended to the write-ahead log and fsynced
 * before the call that made it returns. Opening replays the snapshot and the
 * log; a torn, uncommitted tail is discarded.
 *
 * @example
 * ```ts
 * const dict = PersistentDictionary.open('.phrasebank');
 * const id = dict.insertOrGet(new TextEncoder().encode('TONIGHT'));
 * dict.close();
 *
 * const again = PersistentDictionary.open('.phrasebank', { readOnly: true });
 * again.lookup(new TextEncoder().encode('TONIGHT')); // → id
 * ```
 */
export class PersistentDictionary extends MemoryDictionary {
  readonly readOnly: boolean;
  readonly paths: DictionaryPaths;
  private settingsValue: DictionarySettings;
  private store: DictionaryStore;
  private lastTxId: number;
  private readonly compactThresholdBytes: number;
  private closed = false;
  /** Mode an in-progress first encode will record with its transaction. */
  private pendingEncodeMode: EncodeMode | null = null;

  private constructor(
    store: DictionaryStore,
    snapshot: Snapshot,
    hasher: ContentHasher,
    compactThresholdBytes: number,
  ) {
    super({ hasher });
    this.store = store;
    this.paths = store.paths;
    this.readOnly = store.readOnly;
    this.settingsValue = { ...snapshot.settings };
    this.lastTxId = snapshot.lastTxId;
    this.compactThresholdBytes = compactThresholdBytes;
  }

  /**
   * Open (or, unless read-only, create) the dictionary stored in `dir`.
   *
   * @throws {ConfigError} When a requested setting conflicts with the
   *   recorded one.
   */
  static open(dir: string, options: OpenDictionaryOptions = {}): PersistentDictionary {
    const t = logger.timer('open dictionary');
    const initialSettings: DictionarySettings = {
      hashAlgorithm: options.hasher?.algorithm ?? options.hashAlgorithm ?? DEFAULT_HASH_ALGORITHM,
      boundary: options.boundary ?? 'exclusive',
      encodeMode: null,
    };
    if (!options.hasher) {
      // Rejects unknown names before anything is created on disk.
      createHasher(initialSettings.hashAlgorithm);
    }

    const { store, state } = DictionaryStore.open(dir, {
      readOnly: options.readOnly ?? false,
      initialSettings,
    });

    try {
      const { settings } = state.snapshot;
      checkRecorded(settings, 'hashAlgorithm', options.hasher?.algorithm ?? options.hashAlgorithm);
      checkRecorded(settings, 'boundary', options.boundary);
      const hasher = resolveHasher(settings, options);

      const dict = new PersistentDictionary(
        store,
        state.snapshot,
        hasher,
        options.compactThresholdBytes ?? DEFAULT_COMPACT_THRESHOLD_BYTES,
      );
      dict.load(state.snapshot, state.transactions);
      t.endWith({ dir, entries: dict.size, replayed: state.transactions.length });
      return dict;
    } catch (err) {
      store.close();
      throw err;
    }
  }

  get settings(): DictionarySettings {
    return { ...this.settingsValue };
  }

  /** Current write-ahead log size in bytes. */
  get logSize(): number {
    return this.store.logSize;
  }

  /**
   * Seed from corpus files using this dictionary's boundary rule.
   * @see seedCorpus
   */
  seed(files: readonly string[]): SeedStats {
    return seedCorpus(this, files, this.settingsValue.boundary);
  }

  /**
   * Encode `input` against this dictionary's boundary rule.
   *
   * The first encode records its mode (grow unless `requested` says
   * otherwise) in the same log transaction as the sentences it adds; an
   * encode that throws records nothing.
   *
   * @throws {ConfigError} When `requested` differs from the recorded mode.
   */
  encode(input: Uint8Array, requested?: EncodeMode): EncodeResult {
    const recorded = this.settingsValue.encodeMode;
    if (recorded !== null) {
      if (requested !== undefined && requested !== recorded) {
        throw new ConfigError(
          `Dictionary is recorded for ${recorded} encoding; refusing to encode in ${requested} mode`,
          'encodeMode',
        );
      }
      return encodeSentences(input, this, { mode: recorded, boundary: this.settingsValue.boundary });
    }

    const mode = requested ?? 'grow';
    this.ensureWritable('record the encode mode');
    this.pendingEncodeMode = mode;
    try {
      const result = this.transaction(() =>
        encodeSentences(input, this, { mode, boundary: this.settingsValue.boundary }),
      );
      // Nothing changed, so no transaction carried the mode yet.
      if (this.settingsValue.encodeMode === null) {
        this.appendTransaction([{ type: 'encodeMode', mode }]);
        this.settingsValue.encodeMode = mode;
      }
      logger.info('Recorded encode mode', { dir: this.paths.dir, mode });
      return result;
    } finally {
      this.pendingEncodeMode = null;
    }
  }

  /**
   * Write a fresh snapshot and empty the log.
   */
  compact(): void {
    this.ensureWritable('compact');
    this.store.compact(this.toSnapshot());
  }

  /**
   * Release the writer lock; compacts first when the log has grown past the
   * threshold. Safe to call twice.
   */
  close(): void {
    if (this.closed) return;
    try {
      if (!this.readOnly && this.store.logSize > this.compactThresholdBytes) {
        this.compact();
      }
    } finally {
      this.closed = true;
      this.store.close();
    }
  }

  protected override commit(changes: readonly DictionaryChange[]): void {
    this.ensureWritable('modify the dictionary');

    const putIds = new Set<number>();
    const records: WalRecord[] = [];
    if (this.pendingEncodeMode !== null) {
      records.push({ type: 'encodeMode', mode: this.pendingEncodeMode });
    }
    for (const change of changes) {
      if (change.type === 'put') {
        putIds.add(change.entry.id);
        records.push({ type: 'put', entry: change.entry });
      }
    }

    const deltas = new Map<number, number>();
    for (const change of changes) {
      if (change.type === 'occurrence' && !putIds.has(change.id)) {
        deltas.set(change.id, (deltas.get(change.id) ?? 0) + change.delta);
      }
    }
    for (const [id, delta] of deltas) {
      records.push({ type: 'occurrences', id, delta });
    }

    this.appendTransaction(records);
    if (this.pendingEncodeMode !== null) {
      this.settingsValue.encodeMode = this.pendingEncodeMode;
      this.pendingEncodeMode = null;
    }
  }

  private appendTransaction(records: readonly WalRecord[]): void {
    const txId = this.lastTxId + 1;
    this.store.append(txId, records);
    this.lastTxId = txId;
  }

  private load(snapshot: Snapshot, transactions: readonly CommittedTransaction[]): void {
    for (const entry of snapshot.entries) {
      this.restoreEntry(entry);
    }
    this.restoreNextId(snapshot.nextId);

    for (const tx of transactions) {
      for (const record of tx.records) {
        switch (record.type) {
          case 'put':
            this.restoreEntry(record.entry);
            break;
          case 'occurrences':
            this.restoreOccurrences(record.id, record.delta);
            break;
          case 'encodeMode':
            this.settingsValue.encodeMode = record.mode;
            break;
        }
      }
      this.lastTxId = tx.txId;
    }
  }

  private toSnapshot(): Snapshot {
    return {
      settings: this.settings,
      lastTxId: this.lastTxId,
      nextId: this.nextId,
      entries: [...this.entries()],
    };
  }

  private ensureWritable(operation: string): void {
    if (this.closed) {
      throw new ConfigError(`Cannot ${operation}: dictionary ${this.paths.dir} is closed`);
    }
    if (this.readOnly) {
      throw new ReadOnlyDictionaryError(operation);
    }
  }
}
