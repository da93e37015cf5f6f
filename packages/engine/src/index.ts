// ---- Dictionary ----
export { PersistentDictionary, DEFAULT_COMPACT_THRESHOLD_BYTES } from './dictionary.js';
export type { OpenDictionaryOptions } from './dictionary.js';

// ---- Storage ----
export { DictionaryStore, dictionaryPaths } from './storage.js';
export type { LoadedState, OpenStoreOptions } from './storage.js';
export { WAL, WalRecordType, parseLog, readLog } from './storage/wal.js';
export type { WalRecord, CommittedTransaction, ParsedLog } from './storage/wal.js';
export { readSnapshot, writeSnapshot, parseSnapshot, serializeSnapshot } from './storage/snapshot.js';
export type { Snapshot } from './storage/snapshot.js';
export { DirectoryLock } from './storage/lock.js';
export { crc32 } from './storage/crc32.js';

// ---- Seeding & files ----
export { seedCorpus } from './seed.js';
export { encodeFile, decodeFile, readInputFile, streamOutputPath, STREAM_EXTENSION } from './files.js';

// ---- Configuration ----
export { resolveConfig, DEFAULT_DB_DIR } from './config.js';
export type { PhrasebankConfig, ConfigFlags } from './config.js';

export type {
  DictionarySettings,
  DictionaryPaths,
  SeedStats,
  FileEncodeStats,
} from './types.js';
