// ============================================================================
// @phrasebank/engine — File-level Encode / Decode
// ============================================================================

import * as fs from 'node:fs';
import {
  type EncodeMode,
  FileNotFoundError,
  type SentenceLookup,
  UnreadableInputError,
  UnresolvedReferenceError,
  decodeStream,
  logger,
  parseStream,
  serializeStream,
} from '@phrasebank/core';
import type { PersistentDictionary } from './dictionary.js';
import { errorCode } from './storage/errno.js';
import type { FileEncodeStats } from './types.js';

export const STREAM_EXTENSION = '.dat';

/**
 * Read a whole input file.
 *
 * @throws {FileNotFoundError} When the path does not exist.
 * @throws {UnreadableInputError} For directories, permission and I/O errors.
 */
export function readInputFile(filePath: string, operation: string): Uint8Array {
  try {
    return new Uint8Array(fs.readFileSync(filePath));
  } catch (err) {
    const code = errorCode(err);
    if (code === 'ENOENT') {
      throw new FileNotFoundError(filePath, operation);
    }
    throw new UnreadableInputError(
      filePath,
      operation,
      err instanceof Error ? err.message : String(err),
    );
  }
}

/** `<output>.dat`, unless the path already ends in `.dat`. */
export function streamOutputPath(outputPath: string): string {
  return outputPath.endsWith(STREAM_EXTENSION) ? outputPath : `${outputPath}${STREAM_EXTENSION}`;
}

/**
 * Encode `inputPath` into a reference stream file.
 *
 * The input is read before anything else happens, so a missing file leaves
 * the dictionary untouched. The encode mode is resolved against (and, on
 * first use, recorded in) the dictionary; see {@link PersistentDictionary.encode}.
 */
export function encodeFile(
  dictionary: PersistentDictionary,
  inputPath: string,
  outputPath: string,
  options: { mode?: EncodeMode } = {},
): FileEncodeStats {
  const input = readInputFile(inputPath, 'encode');
  const { stream, stats } = dictionary.encode(input, options.mode);
  const mode = stream.mode;

  const target = streamOutputPath(outputPath);
  const bytes = serializeStream(stream);
  fs.writeFileSync(target, bytes);

  const result: FileEncodeStats = {
    inputPath,
    outputPath: target,
    mode,
    inputBytes: input.length,
    outputBytes: bytes.length,
    units: stats.units,
    references: stats.references,
    literals: stats.literals,
    newSentences: stats.newSentences,
  };
  logger.debug('Encoded file', { ...result });
  return result;
}

/**
 * Decode a reference stream file back into the original bytes.
 *
 * @throws {UnresolvedReferenceError} When the dictionary lacks an id the
 *   stream references (checked against the header's highest id first).
 * @throws {StreamFormatError} For malformed stream files.
 */
export function decodeFile(dictionary: SentenceLookup, streamPath: string): Uint8Array {
  const bytes = readInputFile(streamPath, 'decode');
  const { stream, highestId } = parseStream(bytes);
  if (highestId > 0 && dictionary.get(highestId) === undefined) {
    throw new UnresolvedReferenceError(highestId);
  }
  return decodeStream(stream, dictionary);
}
