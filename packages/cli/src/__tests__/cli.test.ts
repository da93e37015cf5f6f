import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { concatBytes, logger } from '@phrasebank/core';
import { afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { type CliIO, EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runCli } from '../cli.js';

// ============================================================================
// CLI Tests (in-process, captured output)
// ============================================================================

interface RunResult {
  code: number;
  stdout: string;
  stderr: string;
  bytes: Uint8Array;
}

function run(args: string[], env: NodeJS.ProcessEnv = {}): RunResult {
  let stdout = '';
  let stderr = '';
  const chunks: Uint8Array[] = [];
  const io: CliIO = {
    stdout: (chunk) => {
      if (typeof chunk === 'string') {
        stdout += chunk;
      } else {
        chunks.push(chunk);
      }
    },
    stderr: (text) => {
      stderr += text;
    },
    env,
    isTTY: false,
  };
  const code = runCli(args, io);
  return { code, stdout, stderr, bytes: concatBytes(chunks) };
}

describe('phrasebank CLI', () => {
  let root: string;
  let db: string;

  beforeAll(() => {
    logger.setConsoleLogging(false);
  });

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'phrasebank-cli-'));
    db = join(root, 'db');
    mkdirSync(join(root, 'corpus'));
    writeFileSync(join(root, 'corpus', 'a.txt'), 'TONIGHT\nTODAY\n');
    writeFileSync(join(root, 'corpus', 'b.txt'), 'TODAY\n\nWaves 1 ft.\n');
    writeFileSync(join(root, 'corpus', 'notes.md'), 'ignored\n');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  const seedCorpus = (): RunResult => run(['--db', db, '--seed', join(root, 'corpus', '*.txt')]);

  // ---- seed ----

  describe('--seed', () => {
    it('seeds every matching file and reports totals', () => {
      const result = seedCorpus();
      expect(result.code).toBe(EXIT_OK);
      expect(result.stdout).toBe(
        'Seeded 2 files (5 units, 1 blank, 33 bytes)\n' +
          '  new sentences:   3\n' +
          '  known sentences: 1\n' +
          `  dictionary:      3 entries in ${db}\n`,
      );
    });

    it('fails when nothing matches', () => {
      const pattern = join(root, 'corpus', '*.csv');
      const result = run(['--db', db, '--seed', pattern]);
      expect(result.code).toBe(EXIT_FAILURE);
      expect(result.stderr).toBe(`Error: no files match ${pattern}\n`);
      expect(existsSync(db)).toBe(false);
    });
  });

  // ---- encode / decode ----

  describe('--input / --decode', () => {
    it('encodes seeded text by reference and decodes it back', () => {
      seedCorpus();
      const input = join(root, 'forecast.txt');
      writeFileSync(input, 'TONIGHT\nTODAY\nWaves 1 ft.\n');

      const encoded = run(['--db', db, '--input', input, '--output', join(root, 'forecast')]);
      expect(encoded.code).toBe(EXIT_OK);
      expect(encoded.stdout).toBe(
        `Encoded ${input} -> ${join(root, 'forecast.dat')} (grow)\n` +
          '  units:      3 (3 references, 0 literals)\n' +
          '  new:        0 sentences\n' +
          '  size:       26 -> 13 bytes (2.00x)\n',
      );

      const decoded = run(['--db', db, '--decode', join(root, 'forecast.dat')]);
      expect(decoded.code).toBe(EXIT_OK);
      expect(new TextDecoder().decode(decoded.bytes)).toBe('TONIGHT\nTODAY\nWaves 1 ft.\n');
      expect(decoded.stdout).toBe('');
    });

    it('decodes to a file with --output', () => {
      const input = join(root, 'mixed.txt');
      writeFileSync(input, 'Fog\r\n\rlater');
      run(['--db', db, '--input', input, '--output', join(root, 'mixed.dat')]);

      const restored = join(root, 'restored.txt');
      const result = run(['--db', db, '--decode', join(root, 'mixed.dat'), '--output', restored]);
      expect(result.code).toBe(EXIT_OK);
      expect(result.stdout).toBe(`Decoded ${join(root, 'mixed.dat')} -> ${restored} (11 bytes)\n`);
      expect(readFileSync(restored, 'latin1')).toBe('Fog\r\n\rlater');
    });

    it('keeps unseen sentences as literals in strict mode and records the mode', () => {
      seedCorpus();
      const input = join(root, 'forecast.txt');
      writeFileSync(input, 'TODAY\nRain\n');

      const encoded = run(['--db', db, '--mode', 'strict', '--input', input, '--output', join(root, 'f')]);
      expect(encoded.code).toBe(EXIT_OK);
      expect(encoded.stdout).toContain('  units:      2 (1 references, 1 literals)\n');

      const grow = run(['--db', db, '--mode', 'grow', '--input', input, '--output', join(root, 'g')]);
      expect(grow.code).toBe(EXIT_FAILURE);
      expect(grow.stderr).toBe(
        'Error: Dictionary is recorded for strict encoding; refusing to encode in grow mode\n',
      );

      const stats = run(['--db', db, '--stats', '--limit', '0']);
      expect(stats.stdout).toContain('  entries:      3\n');
      expect(stats.stdout).toContain('  encode mode:  strict\n');
    });

    it('fails when the dictionary lacks referenced sentences', () => {
      seedCorpus();
      const input = join(root, 'forecast.txt');
      writeFileSync(input, 'Waves 1 ft.\n');
      run(['--db', db, '--input', input, '--output', join(root, 'forecast')]);

      const other = join(root, 'other-db');
      run(['--db', other, '--seed', join(root, 'corpus', 'a.txt')]);
      const result = run(['--db', other, '--decode', join(root, 'forecast.dat')]);
      expect(result.code).toBe(EXIT_FAILURE);
      expect(result.stderr).toContain('Error: Unresolved reference: sentence id 3 is not in the dictionary.');
      expect(result.bytes).toHaveLength(0);
    });

    it('fails to decode without a dictionary', () => {
      const result = run(['--db', db, '--decode', join(root, 'missing.dat')]);
      expect(result.code).toBe(EXIT_FAILURE);
      expect(result.stderr).toBe(`Error: open dictionary: file not found: ${join(db, 'sentences.snap')}\n`);
    });

    it('fails on a missing input file', () => {
      const result = run(['--db', db, '--input', join(root, 'nope.txt'), '--output', join(root, 'out')]);
      expect(result.code).toBe(EXIT_FAILURE);
      expect(result.stderr).toBe(`Error: encode: file not found: ${join(root, 'nope.txt')}\n`);
    });
  });

  // ---- maintenance ----

  describe('--stats / --verify / --compact', () => {
    it('prints statistics and the most frequent sentences', () => {
      seedCorpus();
      const result = run(['--stats', '--limit', '2'], { PHRASEBANK_DB: db });
      expect(result.code).toBe(EXIT_OK);
      expect(result.stdout).toBe(
        [
          `Dictionary ${db}`,
          '  entries:      3',
          '  occurrences:  4',
          '  buckets:      3 (0 shared)',
          '  next id:      4',
          '  hash:         sha256',
          '  boundary:     exclusive',
          '  encode mode:  unset',
          'Top sentences',
          '  #2  x2  "TODAY"',
          '  #1  x1  "TONIGHT"',
          '',
        ].join('\n'),
      );
    });

    it('verifies a healthy dictionary', () => {
      seedCorpus();
      const result = run(['--db', db, '--verify']);
      expect(result.code).toBe(EXIT_OK);
      expect(result.stdout).toBe('Verified 3 entries: ok\n');
    });

    it('compacts the log', () => {
      seedCorpus();
      const result = run(['--db', db, '--compact']);
      expect(result.code).toBe(EXIT_OK);
      expect(result.stdout).toBe(`Compacted ${db}: 3 entries\n`);
      expect(statSync(join(db, 'sentences.wal')).size).toBe(8);
    });
  });

  // ---- usage ----

  describe('usage errors', () => {
    it('prints help', () => {
      const result = run(['--help']);
      expect(result.code).toBe(EXIT_OK);
      expect(result.stdout).toContain('Usage:\n  phrasebank --seed <glob>');
    });

    it.each([
      { args: [], message: 'Error: No command given' },
      { args: ['--stats', '--verify'], message: 'Error: Choose one command, got --stats, --verify' },
      { args: ['--input', 'a.txt'], message: 'Error: --input requires --output' },
      { args: ['--seed'], message: 'Error: --seed requires a value' },
      { args: ['--frobnicate'], message: 'Error: Unknown option: --frobnicate' },
      { args: ['stats'], message: 'Error: Unexpected argument: stats' },
      {
        args: ['--stats', '--limit', 'ten'],
        message: 'Error: --limit must be a non-negative integer, got "ten"',
      },
    ])('exits with usage status: $message', ({ args, message }) => {
      const result = run([...args, '--db', db]);
      expect(result.code).toBe(EXIT_USAGE);
      expect(result.stderr.startsWith(`${message}\n\n`)).toBe(true);
      expect(existsSync(db)).toBe(false);
    });

    it('rejects invalid setting values', () => {
      const result = run(['--db', db, '--mode', 'fast', '--stats']);
      expect(result.code).toBe(EXIT_USAGE);
      expect(result.stderr.startsWith('Error: Invalid mode: ')).toBe(true);
    });
  });
});
