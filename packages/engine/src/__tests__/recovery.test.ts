import * as fs from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DatabaseCorruptionError, FileNotFoundError, logger } from '@phrasebank/core';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { PersistentDictionary } from '../dictionary.js';
import { dictionaryPaths } from '../storage.js';
import { writeSnapshot } from '../storage/snapshot.js';

// ============================================================================
// Recovery Tests — on-disk states a crash or a concurrent compaction leaves
// ============================================================================

const race = vi.hoisted(() => {
  const state: { beforeReadLog?: () => void } = {};
  return state;
});

vi.mock('node:fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs')>();
  return {
    ...actual,
    openSync: vi.fn(actual.openSync),
    fsyncSync: vi.fn(actual.fsyncSync),
    renameSync: vi.fn(actual.renameSync),
  };
});

// Lets a test run a writer between a reader's snapshot and log reads.
vi.mock('../storage/wal.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../storage/wal.js')>();
  return {
    ...actual,
    readLog: (filePath: string) => {
      const hook = race.beforeReadLog;
      race.beforeReadLog = undefined;
      hook?.();
      return actual.readLog(filePath);
    },
  };
});

const utf8 = (text: string): Uint8Array => new TextEncoder().encode(text);

describe('recovery', () => {
  let root: string;
  let dir: string;

  beforeAll(() => {
    logger.setConsoleLogging(false);
  });

  beforeEach(() => {
    root = fs.mkdtempSync(join(tmpdir(), 'phrasebank-recovery-'));
    dir = join(root, 'db');
  });

  afterEach(() => {
    race.beforeReadLog = undefined;
    fs.rmSync(root, { recursive: true, force: true });
  });

  function write(fn: (dict: PersistentDictionary) => void): void {
    const dict = PersistentDictionary.open(dir);
    try {
      fn(dict);
    } finally {
      dict.close();
    }
  }

  function setLogBase(baseTxId: number): void {
    const walPath = dictionaryPaths(dir).wal;
    const bytes = fs.readFileSync(walPath);
    bytes.writeUInt32LE(baseTxId, 4);
    fs.writeFileSync(walPath, bytes);
  }

  describe('read-only opens', () => {
    it('retry when a compaction replaces the snapshot mid-read', () => {
      write((dict) => {
        dict.insertOrGet(utf8('a'));
      });
      race.beforeReadLog = () => {
        write((dict) => {
          dict.insertOrGet(utf8('b'));
          dict.compact();
        });
      };

      const reader = PersistentDictionary.open(dir, { readOnly: true });
      try {
        expect(race.beforeReadLog).toBeUndefined();
        expect(reader.lookup(utf8('a'))).toBe(1);
        expect(reader.lookup(utf8('b'))).toBe(2);
        expect(reader.nextId).toBe(3);
      } finally {
        reader.close();
      }
    });

    it('give up when the log keeps building on a later snapshot', () => {
      write((dict) => {
        dict.insertOrGet(utf8('a'));
        dict.compact();
      });
      setLogBase(7);

      expect(() => PersistentDictionary.open(dir, { readOnly: true })).toThrow(
        'snapshot and log stayed inconsistent after 3 attempts',
      );
    });
  });

  describe('writer opens', () => {
    it('reject a log that builds on a later snapshot', () => {
      write((dict) => {
        dict.insertOrGet(utf8('a'));
        dict.compact();
      });
      setLogBase(7);

      expect(() => PersistentDictionary.open(dir)).toThrow(
        'log builds on transaction 7 but the snapshot ends at 1',
      );
      expect(fs.existsSync(dictionaryPaths(dir).lock)).toBe(false);
    });

    it('reject a log whose snapshot is missing', () => {
      write((dict) => {
        dict.insertOrGet(utf8('a'));
      });
      const paths = dictionaryPaths(dir);
      fs.rmSync(paths.snapshot);

      expect(() => PersistentDictionary.open(dir)).toThrow(DatabaseCorruptionError);
      expect(() => PersistentDictionary.open(dir)).toThrow('transaction log exists without a snapshot');
      expect(fs.existsSync(paths.snapshot)).toBe(false);
      expect(fs.existsSync(paths.lock)).toBe(false);
      expect(() => PersistentDictionary.open(dir, { readOnly: true })).toThrow(FileNotFoundError);
    });
  });

  describe('snapshot writes', () => {
    it('sync the directory after renaming the snapshot into place', () => {
      fs.mkdirSync(dir);
      const openSync = vi.mocked(fs.openSync);
      const fsyncSync = vi.mocked(fs.fsyncSync);
      const renameSync = vi.mocked(fs.renameSync);
      openSync.mockClear();
      fsyncSync.mockClear();
      renameSync.mockClear();

      writeSnapshot(join(dir, 'sentences.snap'), {
        settings: { hashAlgorithm: 'sha256', boundary: 'exclusive', encodeMode: null },
        lastTxId: 0,
        nextId: 1,
        entries: [],
      });

      const dirOpen = openSync.mock.calls.findIndex(([target, flags]) => target === dir && flags === 'r');
      expect(dirOpen).toBeGreaterThanOrEqual(0);
      const dirFd = openSync.mock.results[dirOpen]?.value;
      const dirSync = fsyncSync.mock.calls.findIndex(([fd]) => fd === dirFd);
      expect(dirSync).toBeGreaterThanOrEqual(0);
      expect(renameSync).toHaveBeenCalledTimes(1);
      expect(fsyncSync.mock.invocationCallOrder[dirSync]).toBeGreaterThan(
        renameSync.mock.invocationCallOrder[0],
      );
    });
  });
});
