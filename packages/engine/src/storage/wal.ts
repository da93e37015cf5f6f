// ============================================================================
// @phrasebank/engine — Write-Ahead Log (WAL)
// ============================================================================
//
// Append-only log of committed dictionary transactions, replayed on top of
// the last snapshot when a dictionary is opened. A transaction is written as
// one buffer (BEGIN, its records, COMMIT) followed by an fsync, so a crash
// leaves at most one torn transaction at the end of the file.
//
// File Header:
//   [Magic 'PBWL': 4 bytes] [BaseTxId: 4 bytes]
//
// WAL Record Format (binary, little-endian):
//   [CRC32: 4 bytes] [Type: 1 byte] [TxId: 4 bytes] [Length: 4 bytes] [Payload: var]
//
// CRC32 covers: Type + TxId + Length + Payload
//
// A transaction is BEGIN, its data records, then COMMIT, all with the same
// TxId. The BEGIN payload is the transaction's total length in bytes, from
// the start of BEGIN to the end of COMMIT.
//
// BaseTxId is the snapshot transaction the log builds on; transactions with
// an id at or below the snapshot's lastTxId are already in the snapshot.
// ============================================================================

import * as fs from 'node:fs';
import { ByteReader, ByteWriter, DatabaseCorruptionError, type ReadErrorFactory } from '@phrasebank/core';
import type { EncodeMode, SentenceEntry } from '@phrasebank/core';
import { crc32 } from './crc32.js';
import { ENCODE_MODE_CODES, ENCODE_MODES_BY_CODE } from './settings_codec.js';

/** WAL record types. */
export enum WalRecordType {
  /** Start of a transaction — payload = byte length of the whole transaction (uint32) */
  BEGIN_TX = 1,
  /** Commit (durable) */
  COMMIT_TX = 2,
  /** New sentence — payload = id, occurrenceCount, contentHash, rawBytes */
  PUT_SENTENCE = 3,
  /** Occurrence count increase — payload = id, delta */
  ADD_OCCURRENCES = 4,
  /** Encode mode recorded — payload = mode code */
  SET_ENCODE_MODE = 5,
}

export const WAL_MAGIC = Uint8Array.of(0x50, 0x42, 0x57, 0x4c); // 'PBWL'
export const WAL_HEADER_SIZE = 8;
const RECORD_HEADER_SIZE = 4 + 1 + 4 + 4;
const BEGIN_PAYLOAD_SIZE = 4;
const BEGIN_RECORD_SIZE = RECORD_HEADER_SIZE + BEGIN_PAYLOAD_SIZE;
const EMPTY_RECORD_SIZE = RECORD_HEADER_SIZE;

/** A data record inside a transaction. */
export type WalRecord =
  | { type: 'put'; entry: SentenceEntry }
  | { type: 'occurrences'; id: number; delta: number }
  | { type: 'encodeMode'; mode: EncodeMode };

export interface CommittedTransaction {
  txId: number;
  records: WalRecord[];
}

export interface ParsedLog {
  /** Undefined when the header itself was torn. */
  baseTxId?: number;
  transactions: CommittedTransaction[];
  /** File length up to the end of the last committed transaction. */
  committedLength: number;
  /** True when bytes after the last commit were discarded. */
  tornTail: boolean;
}

// ---- Record payloads ----

function encodeRecord(record: WalRecord): { type: WalRecordType; payload: Uint8Array } {
  const writer = new ByteWriter(64);
  switch (record.type) {
    case 'put':
      writer
        .writeVarint(record.entry.id)
        .writeVarint(record.entry.occurrenceCount)
        .writeLengthPrefixed(new TextEncoder().encode(record.entry.contentHash))
        .writeLengthPrefixed(record.entry.rawBytes);
      return { type: WalRecordType.PUT_SENTENCE, payload: writer.toBytes() };
    case 'occurrences':
      writer.writeVarint(record.id).writeVarint(record.delta);
      return { type: WalRecordType.ADD_OCCURRENCES, payload: writer.toBytes() };
    case 'encodeMode':
      writer.writeUint8(ENCODE_MODE_CODES[record.mode]);
      return { type: WalRecordType.SET_ENCODE_MODE, payload: writer.toBytes() };
  }
}

function walPayloadError(filePath: string): ReadErrorFactory {
  return (message, offset) =>
    new DatabaseCorruptionError(`WAL record payload: ${message} at ${offset}`, filePath);
}

function decodeRecord(type: number, payload: Uint8Array, filePath: string): WalRecord {
  const reader = new ByteReader(payload, walPayloadError(filePath));
  let record: WalRecord;
  switch (type) {
    case WalRecordType.PUT_SENTENCE: {
      const id = reader.readVarint();
      const occurrenceCount = reader.readVarint();
      const contentHash = new TextDecoder().decode(reader.readLengthPrefixed());
      const rawBytes = reader.readLengthPrefixed().slice();
      record = { type: 'put', entry: { id, occurrenceCount, contentHash, rawBytes } };
      break;
    }
    case WalRecordType.ADD_OCCURRENCES:
      record = { type: 'occurrences', id: reader.readVarint(), delta: reader.readVarint() };
      break;
    case WalRecordType.SET_ENCODE_MODE: {
      const mode = ENCODE_MODES_BY_CODE[reader.readUint8()];
      if (mode === undefined) {
        throw new DatabaseCorruptionError('unknown encode mode in WAL', filePath);
      }
      record = { type: 'encodeMode', mode };
      break;
    }
    default:
      throw new DatabaseCorruptionError(`unknown WAL record type ${type}`, filePath);
  }
  if (!reader.done) {
    throw new DatabaseCorruptionError(`trailing bytes in WAL record type ${type}`, filePath);
  }
  return record;
}

function frame(type: WalRecordType, txId: number, payload: Uint8Array): Uint8Array {
  // Build the record body (Type + TxId + Length + Payload) for CRC
  const body = new Uint8Array(1 + 4 + 4 + payload.length);
  const bodyView = new DataView(body.buffer);
  bodyView.setUint8(0, type);
  bodyView.setUint32(1, txId, true);
  bodyView.setUint32(5, payload.length, true);
  body.set(payload, 9);

  const record = new Uint8Array(4 + body.length);
  new DataView(record.buffer).setUint32(0, crc32(body), true);
  record.set(body, 4);
  return record;
}

function header(baseTxId: number): Uint8Array {
  const bytes = new Uint8Array(WAL_HEADER_SIZE);
  bytes.set(WAL_MAGIC, 0);
  new DataView(bytes.buffer).setUint32(4, baseTxId, true);
  return bytes;
}

// ---- Reading ----

interface RawRecord {
  type: number;
  txId: number;
  payload: Uint8Array;
  end: number;
}

/**
 * The record at `offset`, or undefined when it is damaged: it runs past
 * `limit` or its checksum does not match.
 */
function readRecord(bytes: Uint8Array, view: DataView, offset: number, limit: number): RawRecord | undefined {
  if (limit - offset < RECORD_HEADER_SIZE) return undefined;
  const storedCrc = view.getUint32(offset, true);
  const length = view.getUint32(offset + 9, true);
  const end = offset + RECORD_HEADER_SIZE + length;
  if (end > limit) return undefined;
  if (crc32(bytes.subarray(offset + 4, end)) !== storedCrc) return undefined;
  return {
    type: view.getUint8(offset + 4),
    txId: view.getUint32(offset + 5, true),
    payload: bytes.subarray(offset + RECORD_HEADER_SIZE, end),
    end,
  };
}

/**
 * Records between a transaction's BEGIN and its declared end. Undefined when
 * a record is damaged; structural errors in intact records throw.
 */
function readTransactionBody(
  bytes: Uint8Array,
  view: DataView,
  start: number,
  txEnd: number,
  txId: number,
  filePath: string,
): WalRecord[] | undefined {
  const records: WalRecord[] = [];
  let offset = start;
  while (offset < txEnd) {
    const record = readRecord(bytes, view, offset, txEnd);
    if (!record) return undefined;
    if (record.txId !== txId) {
      throw new DatabaseCorruptionError(
        `WAL record for transaction ${record.txId} inside transaction ${txId}`,
        filePath,
      );
    }
    if (record.type === WalRecordType.COMMIT_TX) {
      if (record.end !== txEnd) {
        throw new DatabaseCorruptionError(`WAL commit for transaction ${txId} before its end`, filePath);
      }
      return records;
    }
    if (record.type === WalRecordType.BEGIN_TX) {
      throw new DatabaseCorruptionError(`WAL transaction ${txId} never committed`, filePath);
    }
    records.push(decodeRecord(record.type, record.payload, filePath));
    offset = record.end;
  }
  throw new DatabaseCorruptionError(`WAL transaction ${txId} has no commit record`, filePath);
}

/**
 * Parse a log file's bytes into committed transactions.
 *
 * Each BEGIN record carries the byte length of its whole transaction, under
 * its own checksum. Damage is a torn tail only when nothing can follow it:
 * a partial BEGIN at the end of the file, a transaction whose declared end
 * lies past the end of the file, or a damaged record inside the transaction
 * that ends exactly at the end of the file. Any other damage is corruption.
 *
 * @throws {DatabaseCorruptionError}
 */
export function parseLog(bytes: Uint8Array, filePath: string): ParsedLog {
  if (bytes.length < WAL_HEADER_SIZE) {
    return { transactions: [], committedLength: 0, tornTail: bytes.length > 0 };
  }
  for (let i = 0; i < WAL_MAGIC.length; i++) {
    if (bytes[i] !== WAL_MAGIC[i]) {
      throw new DatabaseCorruptionError('bad WAL magic bytes', filePath);
    }
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const baseTxId = view.getUint32(4, true);
  const transactions: CommittedTransaction[] = [];
  let lastTxId = baseTxId;
  let offset = WAL_HEADER_SIZE;

  while (offset < bytes.length) {
    const begin = readRecord(bytes, view, offset, bytes.length);
    if (!begin) {
      if (bytes.length - offset <= BEGIN_RECORD_SIZE) break;
      throw new DatabaseCorruptionError(`WAL checksum mismatch at byte ${offset}`, filePath);
    }
    if (begin.type !== WalRecordType.BEGIN_TX) {
      throw new DatabaseCorruptionError(`WAL record outside transaction ${begin.txId}`, filePath);
    }
    if (begin.payload.length !== BEGIN_PAYLOAD_SIZE) {
      throw new DatabaseCorruptionError(`WAL transaction ${begin.txId} has a malformed BEGIN`, filePath);
    }
    const txId = begin.txId;
    if (txId <= lastTxId) {
      throw new DatabaseCorruptionError(`WAL transaction id ${txId} out of order`, filePath);
    }

    const txEnd = offset + new ByteReader(begin.payload, walPayloadError(filePath)).readUint32();
    if (txEnd < begin.end + EMPTY_RECORD_SIZE) {
      throw new DatabaseCorruptionError(`WAL transaction ${txId} declares an impossible length`, filePath);
    }
    if (txEnd > bytes.length) break;

    const records = readTransactionBody(bytes, view, begin.end, txEnd, txId, filePath);
    if (!records) {
      if (txEnd === bytes.length) break;
      throw new DatabaseCorruptionError(`WAL transaction ${txId} is damaged at byte ${offset}`, filePath);
    }

    transactions.push({ txId, records });
    lastTxId = txId;
    offset = txEnd;
  }

  return {
    baseTxId,
    transactions,
    committedLength: offset,
    tornTail: offset < bytes.length,
  };
}

/** Read and parse a log file; undefined when it does not exist. */
export function readLog(filePath: string): ParsedLog | undefined {
  if (!fs.existsSync(filePath)) return undefined;
  return parseLog(new Uint8Array(fs.readFileSync(filePath)), filePath);
}

// ---- Writing ----

/**
 * Write-Ahead Log writer.
 *
 * @example
 * ```ts
 * const wal = WAL.create('./.phrasebank/sentences.wal', 0);
 * wal.appendTransaction(1, [{ type: 'put', entry }]);
 * wal.close();
 * ```
 */
export class WAL {
  private fd: number;
  private length: number;
  readonly filePath: string;

  private constructor(filePath: string, fd: number) {
    this.filePath = filePath;
    this.fd = fd;
    this.length = fs.fstatSync(fd).size;
  }

  /** Create (or overwrite) a log with an empty body. */
  static create(filePath: string, baseTxId: number): WAL {
    const wal = new WAL(filePath, fs.openSync(filePath, 'w+'));
    wal.reset(baseTxId);
    return wal;
  }

  /** Open an existing log for appending. */
  static open(filePath: string): WAL {
    return new WAL(filePath, fs.openSync(filePath, 'r+'));
  }

  get size(): number {
    return this.length;
  }

  /**
   * Append one transaction and fsync. Nothing is visible to a reader until
   * the COMMIT record is on disk.
   */
  appendTransaction(txId: number, records: readonly WalRecord[]): void {
    const body: Uint8Array[] = records.map((record) => {
      const { type, payload } = encodeRecord(record);
      return frame(type, txId, payload);
    });
    body.push(frame(WalRecordType.COMMIT_TX, txId, new Uint8Array(0)));

    let txLength = BEGIN_RECORD_SIZE;
    for (const part of body) txLength += part.length;
    const beginPayload = new ByteWriter(BEGIN_PAYLOAD_SIZE).writeUint32(txLength).toBytes();

    const writer = new ByteWriter(txLength);
    writer.writeBytes(frame(WalRecordType.BEGIN_TX, txId, beginPayload));
    for (const part of body) writer.writeBytes(part);
    const buffer = writer.toBytes();

    this.writeAt(buffer, this.length);
    this.length += buffer.length;
    this.sync();
  }

  /** Drop everything after `length` bytes (an uncommitted tail). */
  truncate(length: number): void {
    fs.ftruncateSync(this.fd, length);
    this.length = length;
    this.sync();
  }

  /**
   * Empty the log after a checkpoint. Only safe once every committed
   * transaction is in the snapshot at `baseTxId`.
   */
  reset(baseTxId: number): void {
    fs.ftruncateSync(this.fd, 0);
    this.length = 0;
    const bytes = header(baseTxId);
    this.writeAt(bytes, 0);
    this.length = bytes.length;
    this.sync();
  }

  /** Force sync WAL to disk (fsync). */
  sync(): void {
    fs.fsyncSync(this.fd);
  }

  close(): void {
    fs.closeSync(this.fd);
  }

  private writeAt(buffer: Uint8Array, position: number): void {
    let written = 0;
    while (written < buffer.length) {
      written += fs.writeSync(this.fd, buffer, written, buffer.length - written, position + written);
    }
  }
}
