// ============================================================================
// @phrasebank/engine — Dictionary Snapshot
// ============================================================================
//
// Compacted image of a dictionary. Written to a temporary file, fsynced and
// renamed over the previous snapshot, so a reader sees either the old or the
// new snapshot, never a mix. The directory is fsynced after the rename.
//
// Layout (integers are varints unless noted):
//   [Magic 'PBSN': 4 bytes] [Version: 1 byte]
//   [HashAlgorithm: length-prefixed UTF-8] [Boundary: 1 byte] [EncodeMode: 1 byte]
//   [LastTxId] [NextId] [EntryCount]
//   [Entry: Id, OccurrenceCount, ContentHash (length-prefixed), RawBytes (length-prefixed)]*
//   [CRC32 of everything above: 4 bytes LE]
// ============================================================================

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ByteReader, ByteWriter, DatabaseCorruptionError } from '@phrasebank/core';
import type { SentenceEntry } from '@phrasebank/core';
import type { DictionarySettings } from '../types.js';
import { crc32 } from './crc32.js';
import {
  BOUNDARIES_BY_CODE,
  BOUNDARY_CODES,
  ENCODE_MODES_BY_CODE,
  ENCODE_MODE_CODES,
} from './settings_codec.js';

export const SNAPSHOT_MAGIC = Uint8Array.of(0x50, 0x42, 0x53, 0x4e); // 'PBSN'
export const SNAPSHOT_VERSION = 1;

export interface Snapshot {
  settings: DictionarySettings;
  /** Last WAL transaction folded into this snapshot. */
  lastTxId: number;
  nextId: number;
  entries: SentenceEntry[];
}

export function serializeSnapshot(snapshot: Snapshot): Uint8Array {
  const writer = new ByteWriter(4096);
  writer
    .writeBytes(SNAPSHOT_MAGIC)
    .writeUint8(SNAPSHOT_VERSION)
    .writeLengthPrefixed(new TextEncoder().encode(snapshot.settings.hashAlgorithm))
    .writeUint8(BOUNDARY_CODES[snapshot.settings.boundary])
    .writeUint8(snapshot.settings.encodeMode ? ENCODE_MODE_CODES[snapshot.settings.encodeMode] : 0)
    .writeVarint(snapshot.lastTxId)
    .writeVarint(snapshot.nextId)
    .writeVarint(snapshot.entries.length);

  for (const entry of snapshot.entries) {
    writer
      .writeVarint(entry.id)
      .writeVarint(entry.occurrenceCount)
      .writeLengthPrefixed(new TextEncoder().encode(entry.contentHash))
      .writeLengthPrefixed(entry.rawBytes);
  }

  const body = writer.toBytes();
  const out = new Uint8Array(body.length + 4);
  out.set(body, 0);
  new DataView(out.buffer).setUint32(body.length, crc32(body), true);
  return out;
}

/**
 * @throws {DatabaseCorruptionError} On any checksum, layout or setting error.
 */
export function parseSnapshot(bytes: Uint8Array, filePath: string): Snapshot {
  if (bytes.length < SNAPSHOT_MAGIC.length + 1 + 4) {
    throw new DatabaseCorruptionError('snapshot is truncated', filePath);
  }
  const body = bytes.subarray(0, bytes.length - 4);
  const storedCrc = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(
    body.length,
    true,
  );
  if (crc32(body) !== storedCrc) {
    throw new DatabaseCorruptionError('snapshot checksum mismatch', filePath);
  }

  const reader = new ByteReader(
    body,
    (message, offset) => new DatabaseCorruptionError(`snapshot: ${message} at ${offset}`, filePath),
  );
  for (let i = 0; i < SNAPSHOT_MAGIC.length; i++) {
    if (reader.readUint8() !== SNAPSHOT_MAGIC[i]) {
      throw new DatabaseCorruptionError('bad snapshot magic bytes', filePath);
    }
  }
  const version = reader.readUint8();
  if (version !== SNAPSHOT_VERSION) {
    throw new DatabaseCorruptionError(`unsupported snapshot version ${version}`, filePath);
  }

  const hashAlgorithm = new TextDecoder().decode(reader.readLengthPrefixed());
  const boundary = BOUNDARIES_BY_CODE[reader.readUint8()];
  if (boundary === undefined) {
    throw new DatabaseCorruptionError('unknown boundary rule in snapshot', filePath);
  }
  const modeCode = reader.readUint8();
  const encodeMode = modeCode === 0 ? null : ENCODE_MODES_BY_CODE[modeCode];
  if (encodeMode === undefined) {
    throw new DatabaseCorruptionError('unknown encode mode in snapshot', filePath);
  }

  const lastTxId = reader.readVarint();
  const nextId = reader.readVarint();
  const count = reader.readVarint();
  const entries: SentenceEntry[] = [];
  for (let i = 0; i < count; i++) {
    const id = reader.readVarint();
    const occurrenceCount = reader.readVarint();
    const contentHash = new TextDecoder().decode(reader.readLengthPrefixed());
    const rawBytes = reader.readLengthPrefixed().slice();
    if (id >= nextId) {
      throw new DatabaseCorruptionError(`sentence id ${id} is not below nextId ${nextId}`, filePath);
    }
    entries.push({ id, occurrenceCount, contentHash, rawBytes });
  }
  if (!reader.done) {
    throw new DatabaseCorruptionError('trailing bytes after snapshot entries', filePath);
  }

  return { settings: { hashAlgorithm, boundary, encodeMode }, lastTxId, nextId, entries };
}

/** Read a snapshot; undefined when the file does not exist. */
export function readSnapshot(filePath: string): Snapshot | undefined {
  if (!fs.existsSync(filePath)) return undefined;
  return parseSnapshot(new Uint8Array(fs.readFileSync(filePath)), filePath);
}

/** fsync a directory so a rename inside it is durable. */
function syncDirectory(dirPath: string): void {
  const fd = fs.openSync(dirPath, 'r');
  try {
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Atomically replace the snapshot at `filePath`. Returns once the rename
 * itself is on disk, so the caller may then empty the log.
 */
export function writeSnapshot(filePath: string, snapshot: Snapshot): void {
  const tmpPath = `${filePath}.tmp`;
  const fd = fs.openSync(tmpPath, 'w');
  try {
    const bytes = serializeSnapshot(snapshot);
    let written = 0;
    while (written < bytes.length) {
      written += fs.writeSync(fd, bytes, written, bytes.length - written);
    }
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }
  fs.renameSync(tmpPath, filePath);
  syncDirectory(path.dirname(filePath));
}
