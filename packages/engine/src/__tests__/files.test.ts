import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  FileNotFoundError,
  StreamFormatError,
  UnreadableInputError,
  UnresolvedReferenceError,
  logger,
} from '@phrasebank/core';
import { afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { PersistentDictionary } from '../dictionary.js';
import { decodeFile, encodeFile, readInputFile, streamOutputPath } from '../files.js';

describe('file encode / decode', () => {
  let root: string;
  let dict: PersistentDictionary;

  beforeAll(() => {
    logger.setConsoleLogging(false);
  });

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'phrasebank-files-'));
    dict = PersistentDictionary.open(join(root, 'db'));
  });

  afterEach(() => {
    dict.close();
    rmSync(root, { recursive: true, force: true });
  });

  it('appends .dat unless the path already has it', () => {
    expect(streamOutputPath('out/forecast')).toBe('out/forecast.dat');
    expect(streamOutputPath('out/forecast.txt')).toBe('out/forecast.txt.dat');
    expect(streamOutputPath('out/forecast.dat')).toBe('out/forecast.dat');
  });

  it('encodes to a .dat file that decodes to the original bytes', () => {
    const input = join(root, 'forecast.txt');
    writeFileSync(input, 'TONIGHT\r\nTODAY\n\nWaves 1 ft.');
    dict.insertOrGet(new TextEncoder().encode('TODAY'));

    const result = encodeFile(dict, input, join(root, 'forecast'));

    expect(result).toEqual({
      inputPath: input,
      outputPath: join(root, 'forecast.dat'),
      mode: 'grow',
      inputBytes: 27,
      outputBytes: 15,
      units: 4,
      references: 3,
      literals: 1,
      newSentences: 2,
    });
    expect(dict.settings.encodeMode).toBe('grow');
    expect(new Uint8Array(decodeFile(dict, result.outputPath))).toEqual(new Uint8Array(readFileSync(input)));
  });

  it('leaves the dictionary untouched when the input is missing', () => {
    expect(() => encodeFile(dict, join(root, 'missing.txt'), join(root, 'out'))).toThrow(FileNotFoundError);
    expect(dict.settings.encodeMode).toBeNull();
    expect(dict.size).toBe(0);
    expect(existsSync(join(root, 'out.dat'))).toBe(false);
  });

  it('fails to decode against a dictionary missing referenced ids', () => {
    const input = join(root, 'forecast.txt');
    writeFileSync(input, 'a\nb\nc\n');
    const { outputPath } = encodeFile(dict, input, join(root, 'forecast.dat'));

    const other = PersistentDictionary.open(join(root, 'other'));
    try {
      other.insertOrGet(new TextEncoder().encode('a'));
      expect(() => decodeFile(other, outputPath)).toThrow(UnresolvedReferenceError);
      expect(() => decodeFile(other, outputPath)).toThrow('sentence id 3 is not in the dictionary');
    } finally {
      other.close();
    }
  });

  it('rejects files that are not reference streams', () => {
    const bogus = join(root, 'bogus.dat');
    writeFileSync(bogus, 'TONIGHT\n');
    expect(() => decodeFile(dict, bogus)).toThrow(StreamFormatError);
  });

  it('reports unreadable inputs', () => {
    const folder = join(root, 'folder');
    mkdirSync(folder);
    expect(() => readInputFile(folder, 'encode')).toThrow(UnreadableInputError);
    expect(() => readInputFile(join(root, 'nope'), 'decode')).toThrow(
      `decode: file not found: ${join(root, 'nope')}`,
    );
  });
});
