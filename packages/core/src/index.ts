// ============================================================================
// @phrasebank/core — Public API
// ============================================================================

// Splitting
export { splitSentences, joinUnits, sentenceKey, terminatorBytes } from './splitter.js';

// Hashing
export {
  createHasher,
  isHashAlgorithm,
  sha256Hex,
  HASH_ALGORITHMS,
  DEFAULT_HASH_ALGORITHM,
} from './hashing.js';
export type { HashAlgorithm } from './hashing.js';

// Dictionary
export { MemoryDictionary } from './dictionary.js';
export type { MemoryDictionaryOptions, VerifyReport } from './dictionary.js';

// Encode / decode
export { encodeSentences } from './encoder.js';
export type { EncodeOptions } from './encoder.js';
export { decodeStream } from './decoder.js';
export {
  serializeStream,
  parseStream,
  highestReferencedId,
  STREAM_MAGIC,
  STREAM_VERSION,
} from './stream_codec.js';
export type { ParsedStream } from './stream_codec.js';

// Bytes
export { ByteReader, ByteWriter, bytesEqual, concatBytes } from './bytes.js';
export type { ReadErrorFactory } from './bytes.js';

// Errors
export {
  PhrasebankError,
  FileNotFoundError,
  UnreadableInputError,
  UnresolvedReferenceError,
  StreamFormatError,
  DatabaseCorruptionError,
  DictionaryLockedError,
  ReadOnlyDictionaryError,
  ConfigError,
} from './errors.js';

// Logging
export * as logger from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';

// Types
export type {
  Terminator,
  SentenceUnit,
  BoundaryRule,
  SentenceEntry,
  ContentHasher,
  SentenceLookup,
  SentenceDictionary,
  DictionaryStats,
  DictionaryChange,
  EncodeMode,
  ReferenceToken,
  ReferenceStream,
  EncodeStats,
  EncodeResult,
} from './types.js';
