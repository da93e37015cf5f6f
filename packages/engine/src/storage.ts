// ============================================================================
// @phrasebank/engine — Persistent Storage
// ============================================================================
//
// One dictionary lives in one directory:
//
//   <dir>/
//     sentences.snap   # compacted snapshot (see storage/snapshot.ts)
//     sentences.wal    # committed transactions since the snapshot
//     sentences.lock   # present while a writer has the dictionary open
//
// Writers hold the lock for their whole session, repair a torn log tail and
// append transactions. Readers take no lock, never modify files, and retry
// when a compaction replaces the snapshot underneath them.
// ============================================================================

import * as fs from 'node:fs';
import * as path from 'node:path';
import { DatabaseCorruptionError, FileNotFoundError, logger } from '@phrasebank/core';
import { DirectoryLock } from './storage/lock.js';
import { type Snapshot, readSnapshot, writeSnapshot } from './storage/snapshot.js';
import {
  type CommittedTransaction,
  WAL,
  WAL_HEADER_SIZE,
  type WalRecord,
  readLog,
} from './storage/wal.js';
import type { DictionaryPaths, DictionarySettings } from './types.js';

const READ_ATTEMPTS = 3;

export function dictionaryPaths(dir: string): DictionaryPaths {
  return {
    dir,
    snapshot: path.join(dir, 'sentences.snap'),
    wal: path.join(dir, 'sentences.wal'),
    lock: path.join(dir, 'sentences.lock'),
  };
}

export interface OpenStoreOptions {
  readOnly: boolean;
  /** Settings recorded when the dictionary does not exist yet (writers only). */
  initialSettings: DictionarySettings;
}

/** Snapshot plus the committed transactions that follow it. */
export interface LoadedState {
  snapshot: Snapshot;
  transactions: CommittedTransaction[];
  created: boolean;
}

function snapshotStamp(filePath: string): string {
  const stats = fs.statSync(filePath, { throwIfNoEntry: false });
  return stats ? `${stats.ino}:${stats.size}:${stats.mtimeMs}` : 'missing';
}

/**
 * DictionaryStore: snapshot + WAL persistence for one dictionary directory.
 */
export class DictionaryStore {
  readonly paths: DictionaryPaths;
  readonly readOnly: boolean;
  private wal: WAL | null;
  private lock: DirectoryLock | null;

  private constructor(paths: DictionaryPaths, wal: WAL | null, lock: DirectoryLock | null) {
    this.paths = paths;
    this.readOnly = wal === null;
    this.wal = wal;
    this.lock = lock;
  }

  /**
   * Open a dictionary directory and load its committed state.
   *
   * @throws {FileNotFoundError} Read-only open of a missing dictionary.
   * @throws {DictionaryLockedError} Another writer holds the directory.
   * @throws {DatabaseCorruptionError} Unparseable or inconsistent files.
   */
  static open(dir: string, options: OpenStoreOptions): { store: DictionaryStore; state: LoadedState } {
    const paths = dictionaryPaths(dir);
    if (options.readOnly) {
      return { store: new DictionaryStore(paths, null, null), state: loadReadOnly(paths) };
    }

    fs.mkdirSync(dir, { recursive: true });
    const lock = DirectoryLock.acquire(paths.lock);
    let wal: WAL | null = null;
    try {
      const existing = readSnapshot(paths.snapshot);
      if (!existing) {
        const walSize = fs.statSync(paths.wal, { throwIfNoEntry: false })?.size ?? 0;
        if (walSize > WAL_HEADER_SIZE) {
          throw new DatabaseCorruptionError('transaction log exists without a snapshot', paths.wal);
        }
        const snapshot: Snapshot = {
          settings: options.initialSettings,
          lastTxId: 0,
          nextId: 1,
          entries: [],
        };
        writeSnapshot(paths.snapshot, snapshot);
        wal = WAL.create(paths.wal, 0);
        logger.info('Created dictionary', { dir, ...options.initialSettings });
        return {
          store: new DictionaryStore(paths, wal, lock),
          state: { snapshot, transactions: [], created: true },
        };
      }

      const log = readLog(paths.wal);
      let transactions: CommittedTransaction[] = [];
      if (!log || log.baseTxId === undefined) {
        wal = WAL.create(paths.wal, existing.lastTxId);
      } else {
        if (log.baseTxId > existing.lastTxId) {
          throw new DatabaseCorruptionError(
            `log builds on transaction ${log.baseTxId} but the snapshot ends at ${existing.lastTxId}`,
            paths.wal,
          );
        }
        wal = WAL.open(paths.wal);
        if (log.tornTail) {
          logger.warn('Discarding uncommitted transaction at end of log', {
            path: paths.wal,
            keptBytes: log.committedLength,
          });
          wal.truncate(log.committedLength);
        }
        transactions = log.transactions.filter((tx) => tx.txId > existing.lastTxId);
      }

      return {
        store: new DictionaryStore(paths, wal, lock),
        state: { snapshot: existing, transactions, created: false },
      };
    } catch (err) {
      wal?.close();
      lock.release();
      throw err;
    }
  }

  /** Current log size in bytes (0 for read-only stores). */
  get logSize(): number {
    return this.wal?.size ?? 0;
  }

  /** Durably append one committed transaction. */
  append(txId: number, records: readonly WalRecord[]): void {
    this.writer().appendTransaction(txId, records);
  }

  /**
   * Fold everything into a new snapshot and empty the log.
   */
  compact(snapshot: Snapshot): void {
    const wal = this.writer();
    writeSnapshot(this.paths.snapshot, snapshot);
    wal.reset(snapshot.lastTxId);
    logger.debug('Compacted dictionary', {
      dir: this.paths.dir,
      entries: snapshot.entries.length,
      lastTxId: snapshot.lastTxId,
    });
  }

  close(): void {
    this.wal?.close();
    this.wal = null;
    this.lock?.release();
    this.lock = null;
  }

  private writer(): WAL {
    if (!this.wal) {
      throw new Error(`Dictionary store ${this.paths.dir} is not open for writing`);
    }
    return this.wal;
  }
}

function loadReadOnly(paths: DictionaryPaths): LoadedState {
  for (let attempt = 0; attempt < READ_ATTEMPTS; attempt++) {
    const stampBefore = snapshotStamp(paths.snapshot);
    const snapshot = readSnapshot(paths.snapshot);
    if (!snapshot) {
      throw new FileNotFoundError(paths.snapshot, 'open dictionary');
    }
    const log = readLog(paths.wal);
    if (snapshotStamp(paths.snapshot) !== stampBefore) continue;

    if (!log || log.baseTxId === undefined) {
      return { snapshot, transactions: [], created: false };
    }
    if (log.baseTxId > snapshot.lastTxId) continue;

    return {
      snapshot,
      transactions: log.transactions.filter((tx) => tx.txId > snapshot.lastTxId),
      created: false,
    };
  }
  throw new DatabaseCorruptionError(
    `snapshot and log stayed inconsistent after ${READ_ATTEMPTS} attempts`,
    paths.dir,
  );
}
