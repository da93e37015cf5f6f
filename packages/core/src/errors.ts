// ============================================================================
// @phrasebank/core — Error Types
// ============================================================================

/**
 * Base error class for all phrasebank errors.
 */
export class PhrasebankError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PhrasebankError';
  }
}

// ---------------------------------------------------------------------------
// Input Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when an input file (corpus file, text to encode, stream to decode)
 * does not exist.
 */
export class FileNotFoundError extends PhrasebankError {
  public readonly path: string;
  public readonly operation: string;

  constructor(path: string, operation: string) {
    super(`${operation}: file not found: ${path}`);
    this.name = 'FileNotFoundError';
    this.path = path;
    this.operation = operation;
  }
}

/**
 * Thrown when an input file exists but cannot be read (permissions, a
 * directory in place of a file, I/O failure).
 */
export class UnreadableInputError extends PhrasebankError {
  public readonly path: string;
  public readonly operation: string;

  constructor(path: string, operation: string, reason: string) {
    super(`${operation}: cannot read ${path}: ${reason}`);
    this.name = 'UnreadableInputError';
    this.path = path;
    this.operation = operation;
  }
}

// ---------------------------------------------------------------------------
// Decoding Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a reference stream names an id the dictionary does not hold.
 * The dictionary used to decode is not a superset of the one used to encode.
 */
export class UnresolvedReferenceError extends PhrasebankError {
  public readonly id: number;
  public readonly tokenIndex?: number;

  constructor(id: number, tokenIndex?: number) {
    super(
      `Unresolved reference: sentence id ${id}${tokenIndex !== undefined ? ` (token ${tokenIndex})` : ''} is not in the dictionary. ` +
        'The stream was encoded against a different dictionary.',
    );
    this.name = 'UnresolvedReferenceError';
    this.id = id;
    this.tokenIndex = tokenIndex;
  }
}

/**
 * Thrown when an encoded reference stream is truncated or malformed.
 */
export class StreamFormatError extends PhrasebankError {
  public readonly offset?: number;

  constructor(message: string, offset?: number) {
    super(offset !== undefined ? `${message} (at byte ${offset})` : message);
    this.name = 'StreamFormatError';
    this.offset = offset;
  }
}

// ---------------------------------------------------------------------------
// Storage Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when persisted dictionary state cannot be parsed or is internally
 * inconsistent. Never recovered from partially.
 */
export class DatabaseCorruptionError extends PhrasebankError {
  public readonly path?: string;
  public readonly reason: string;

  constructor(reason: string, path?: string) {
    super(`Dictionary corrupted${path ? ` (${path})` : ''}: ${reason}`);
    this.name = 'DatabaseCorruptionError';
    this.reason = reason;
    this.path = path;
  }
}

/**
 * Thrown when another live process holds the dictionary's writer lock.
 */
export class DictionaryLockedError extends PhrasebankError {
  public readonly path: string;
  public readonly holderPid?: number;

  constructor(path: string, holderPid?: number) {
    super(
      `Dictionary is locked by ${holderPid !== undefined ? `process ${holderPid}` : 'another process'}: ${path}`,
    );
    this.name = 'DictionaryLockedError';
    this.path = path;
    this.holderPid = holderPid;
  }
}

/**
 * Thrown when a mutation is attempted on a dictionary opened read-only.
 */
export class ReadOnlyDictionaryError extends PhrasebankError {
  constructor(operation: string) {
    super(`Cannot ${operation}: dictionary is opened read-only`);
    this.name = 'ReadOnlyDictionaryError';
  }
}

// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a setting is invalid or conflicts with the setting recorded in
 * an existing dictionary.
 */
export class ConfigError extends PhrasebankError {
  public readonly setting?: string;

  constructor(message: string, setting?: string) {
    super(message);
    this.name = 'ConfigError';
    this.setting = setting;
  }
}
