import { spawnSync } from 'node:child_process';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

// ============================================================================
// Installed binary: the launcher runs the CLI under plain node
// ============================================================================

const launcher = fileURLToPath(new URL('../../bin/phrasebank.js', import.meta.url));
const SPAWN_TIMEOUT_MS = 30_000;

interface BinResult {
  code: number;
  stdout: string;
  stderr: string;
}

describe('phrasebank binary', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'phrasebank-bin-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function runBin(args: string[]): BinResult {
    const result = spawnSync(process.execPath, [launcher, ...args], {
      cwd: root,
      encoding: 'utf-8',
      env: { ...process.env, NO_COLOR: '1', PHRASEBANK_DEBUG: '' },
    });
    return {
      code: result.status ?? 1,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
    };
  }

  it(
    'prints usage',
    () => {
      const result = runBin(['--help']);
      expect(result.code).toBe(0);
      expect(result.stdout.startsWith('phrasebank: persistent sentence dictionary\n')).toBe(true);
    },
    SPAWN_TIMEOUT_MS,
  );

  it(
    'encodes and decodes a file',
    () => {
      writeFileSync(join(root, 'forecast.txt'), 'TONIGHT\nTODAY\nTONIGHT\n');

      const encoded = runBin(['--input', 'forecast.txt', '--output', 'forecast', '--db', 'db', '--quiet']);
      expect(encoded.code).toBe(0);

      const decoded = runBin(['--decode', 'forecast.dat', '--db', 'db', '--quiet']);
      expect(decoded.code).toBe(0);
      expect(decoded.stdout).toBe('TONIGHT\nTODAY\nTONIGHT\n');
    },
    SPAWN_TIMEOUT_MS,
  );

  it(
    'exits with the usage code for unknown options',
    () => {
      const result = runBin(['--bogus']);
      expect(result.code).toBe(2);
      expect(result.stderr.startsWith('Error: Unknown option: --bogus\n')).toBe(true);
    },
    SPAWN_TIMEOUT_MS,
  );
});
