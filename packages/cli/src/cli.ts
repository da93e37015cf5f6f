// ============================================================================
// @phrasebank/cli — Sentence dictionary command line
// ============================================================================
// Commands:
//   phrasebank --seed <glob>                       → add corpus sentences
//   phrasebank --input <file> --output <file>      → file.dat reference stream
//   phrasebank --decode <file.dat> [--output <f>]  → original bytes (stdout)
//   phrasebank --stats [--limit 10]                → dictionary statistics
//   phrasebank --verify                            → recheck hashes + uniqueness
//   phrasebank --compact                           → fold the log into a snapshot
//
// Shared options: --db <dir>, --mode grow|strict, --hash sha256|sha256-32,
// --boundary exclusive|inclusive, --quiet, --color / --no-color.
//
// Exit codes: 0 success, 1 failure, 2 usage error.
// ============================================================================

import { writeFileSync } from 'node:fs';
import { ConfigError, PhrasebankError, logger } from '@phrasebank/core';
import {
  PersistentDictionary,
  type PhrasebankConfig,
  decodeFile,
  encodeFile,
  resolveConfig,
} from '@phrasebank/engine';
import fg from 'fast-glob';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const DEFAULT_TOP_LIMIT = 10;
const PREVIEW_CHARS = 60;

/** Where the CLI writes. Tests substitute buffers for the process streams. */
export interface CliIO {
  stdout(chunk: string | Uint8Array): void;
  stderr(text: string): void;
  env: NodeJS.ProcessEnv;
  isTTY: boolean;
}

const processIO: CliIO = {
  stdout: (chunk) => {
    process.stdout.write(chunk);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  env: process.env,
  isTTY: process.stdout.isTTY === true,
};

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const VALUE_FLAGS = new Set([
  'seed',
  'input',
  'output',
  'decode',
  'db',
  'mode',
  'hash',
  'boundary',
  'limit',
  'compact-threshold',
]);
const SWITCH_FLAGS = new Set(['stats', 'verify', 'compact', 'help', 'quiet', 'color', 'no-color']);
const COMMAND_FLAGS = ['seed', 'input', 'decode', 'stats', 'verify', 'compact', 'help'] as const;

type Command = (typeof COMMAND_FLAGS)[number];

interface ParsedArgs {
  values: Map<string, string>;
  switches: Set<string>;
}

function parseArgs(argv: readonly string[]): ParsedArgs {
  const values = new Map<string, string>();
  const switches = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

    if (VALUE_FLAGS.has(name)) {
      const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
      if (value === undefined || value === '' || (eq === -1 && value.startsWith('--'))) {
        throw new UsageError(`--${name} requires a value`);
      }
      values.set(name, value);
    } else if (SWITCH_FLAGS.has(name) && eq === -1) {
      switches.add(name);
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  return { values, switches };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

// ── Output helpers ──────────────────────────────────────────────────────────

interface Style {
  pass(text: string): string;
  fail(text: string): string;
  heading(text: string): string;
  dim(text: string): string;
  num(value: number | string): string;
}

function createStyle(useColor: boolean): Style {
  const clr = (code: string, text: string): string =>
    useColor ? `\x1b[${code}m${text}\x1b[0m` : text;
  return {
    pass: (text) => clr('92', text),
    fail: (text) => clr('31', text),
    heading: (text) => clr('1;97', text),
    dim: (text) => clr('2', text),
    num: (value) => clr('96', String(value)),
  };
}

function preview(bytes: Uint8Array): string {
  const text = JSON.stringify(new TextDecoder().decode(bytes));
  return text.length > PREVIEW_CHARS ? `${text.slice(0, PREVIEW_CHARS - 3)}...` : text;
}

function printUsage(write: (text: string) => void): void {
  write(`phrasebank: persistent sentence dictionary

Usage:
  phrasebank --seed <glob>                       Add every sentence of the matching files
  phrasebank --input <file> --output <file>      Encode to <file>.dat
  phrasebank --decode <file.dat> [--output <f>]  Decode to stdout (or <f>)
  phrasebank --stats [--limit N]                 Dictionary statistics and top sentences
  phrasebank --verify                            Recheck hashes and byte uniqueness
  phrasebank --compact                           Fold the log into a new snapshot

Options:
  --db <dir>                      Dictionary directory (default .phrasebank, env PHRASEBANK_DB)
  --mode grow|strict              Encode mode; fixed by the first encode (env PHRASEBANK_MODE)
  --hash sha256|sha256-32         Hash for a new dictionary (env PHRASEBANK_HASH)
  --boundary exclusive|inclusive  Terminator handling for a new dictionary (env PHRASEBANK_BOUNDARY)
  --compact-threshold <bytes>     Log size that triggers compaction on close
  --quiet                         No log output
  --color, --no-color             Force or disable colored output
`);
}

// ── Command context ─────────────────────────────────────────────────────────

interface Context {
  io: CliIO;
  style: Style;
  config: PhrasebankConfig;
  getFlag(name: string): string | undefined;
}

function openDictionary(ctx: Context, readOnly: boolean): PersistentDictionary {
  return PersistentDictionary.open(ctx.config.dbDir, {
    readOnly,
    hashAlgorithm: ctx.config.hashAlgorithm,
    boundary: ctx.config.boundary,
    compactThresholdBytes: ctx.config.compactThresholdBytes,
  });
}

function withDictionary<T>(ctx: Context, readOnly: boolean, fn: (dict: PersistentDictionary) => T): T {
  const dict = openDictionary(ctx, readOnly);
  try {
    return fn(dict);
  } finally {
    dict.close();
  }
}

// ============================================================================
// seed
// ============================================================================
function seedCommand(ctx: Context, pattern: string): number {
  const files = fg.sync(pattern, { onlyFiles: true, unique: true }).sort();
  if (files.length === 0) {
    ctx.io.stderr(`Error: no files match ${pattern}\n`);
    return EXIT_FAILURE;
  }

  const { stats, entries } = withDictionary(ctx, false, (dict) => ({
    stats: dict.seed(files),
    entries: dict.size,
  }));

  const { style } = ctx;
  ctx.io.stdout(
    `${style.heading('Seeded')} ${style.num(stats.files)} files ` +
      `(${style.num(stats.units)} units, ${style.num(stats.blankUnits)} blank, ${style.num(stats.bytesRead)} bytes)\n` +
      `  new sentences:   ${style.num(stats.newSentences)}\n` +
      `  known sentences: ${style.num(stats.knownSentences)}\n` +
      `  dictionary:      ${style.num(entries)} entries in ${ctx.config.dbDir}\n`,
  );
  return EXIT_OK;
}

// ============================================================================
// encode
// ============================================================================
function encodeCommand(ctx: Context, inputPath: string): number {
  const outputPath = ctx.getFlag('output');
  if (!outputPath) {
    throw new UsageError('--input requires --output');
  }

  const result = withDictionary(ctx, false, (dict) =>
    encodeFile(dict, inputPath, outputPath, { mode: ctx.config.mode }),
  );

  const { style } = ctx;
  const ratio = result.inputBytes / result.outputBytes;
  ctx.io.stdout(
    `${style.heading('Encoded')} ${inputPath} -> ${result.outputPath} (${result.mode})\n` +
      `  units:      ${style.num(result.units)} (${style.num(result.references)} references, ${style.num(result.literals)} literals)\n` +
      `  new:        ${style.num(result.newSentences)} sentences\n` +
      `  size:       ${style.num(result.inputBytes)} -> ${style.num(result.outputBytes)} bytes (${style.num(ratio.toFixed(2))}x)\n`,
  );
  return EXIT_OK;
}

// ============================================================================
// decode
// ============================================================================
function decodeCommand(ctx: Context, streamPath: string): number {
  const outputPath = ctx.getFlag('output');
  const bytes = withDictionary(ctx, true, (dict) => decodeFile(dict, streamPath));

  if (outputPath) {
    writeFileSync(outputPath, bytes);
    ctx.io.stdout(`${ctx.style.heading('Decoded')} ${streamPath} -> ${outputPath} (${bytes.length} bytes)\n`);
  } else {
    ctx.io.stdout(bytes);
  }
  return EXIT_OK;
}

// ============================================================================
// stats
// ============================================================================
function statsCommand(ctx: Context): number {
  const limitFlag = ctx.getFlag('limit');
  const limit = limitFlag === undefined ? DEFAULT_TOP_LIMIT : Number(limitFlag);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new UsageError(`--limit must be a non-negative integer, got "${limitFlag}"`);
  }

  const { stats, settings, top } = withDictionary(ctx, true, (dict) => ({
    stats: dict.stats(),
    settings: dict.settings,
    top: dict.topSentences(limit),
  }));

  const { style } = ctx;
  const lines = [
    `${style.heading('Dictionary')} ${ctx.config.dbDir}`,
    `  entries:      ${style.num(stats.entries)}`,
    `  occurrences:  ${style.num(stats.totalOccurrences)}`,
    `  buckets:      ${style.num(stats.buckets)} (${style.num(stats.sharedBuckets)} shared)`,
    `  next id:      ${style.num(stats.nextId)}`,
    `  hash:         ${settings.hashAlgorithm}`,
    `  boundary:     ${settings.boundary}`,
    `  encode mode:  ${settings.encodeMode ?? style.dim('unset')}`,
  ];
  if (top.length > 0) {
    lines.push(style.heading('Top sentences'));
    for (const entry of top) {
      lines.push(`  #${entry.id}  x${entry.occurrenceCount}  ${preview(entry.rawBytes)}`);
    }
  }
  ctx.io.stdout(`${lines.join('\n')}\n`);
  return EXIT_OK;
}

// ============================================================================
// verify
// ============================================================================
function verifyCommand(ctx: Context): number {
  const report = withDictionary(ctx, true, (dict) => dict.verify());
  const { style } = ctx;

  const lines = [
    `Verified ${style.num(report.entries)} entries: ${report.ok ? style.pass('ok') : style.fail('FAILED')}`,
  ];
  for (const id of report.hashMismatches) {
    lines.push(`  hash mismatch: id ${id}`);
  }
  for (const [first, second] of report.duplicates) {
    lines.push(`  duplicate content: ids ${first} and ${second}`);
  }
  ctx.io.stdout(`${lines.join('\n')}\n`);
  return report.ok ? EXIT_OK : EXIT_FAILURE;
}

// ============================================================================
// compact
// ============================================================================
function compactCommand(ctx: Context): number {
  const entries = withDictionary(ctx, false, (dict) => {
    dict.compact();
    return dict.size;
  });
  ctx.io.stdout(`${ctx.style.heading('Compacted')} ${ctx.config.dbDir}: ${ctx.style.num(entries)} entries\n`);
  return EXIT_OK;
}

// ============================================================================
// Entry point
// ============================================================================

function selectCommand(args: ParsedArgs): Command {
  const given = COMMAND_FLAGS.filter((name) => args.values.has(name) || args.switches.has(name));
  if (given.length === 0) {
    throw new UsageError('No command given');
  }
  if (given.length > 1 && !given.includes('help')) {
    throw new UsageError(`Choose one command, got ${given.map((name) => `--${name}`).join(', ')}`);
  }
  return given.includes('help') ? 'help' : given[0];
}

function buildContext(args: ParsedArgs, io: CliIO): Context {
  const getFlag = (name: string): string | undefined => args.values.get(name);
  const hasFlag = (name: string): boolean => args.switches.has(name);

  let useColor = io.isTTY && io.env.NO_COLOR === undefined;
  if (hasFlag('color')) useColor = true;
  if (hasFlag('no-color')) useColor = false;

  let config: PhrasebankConfig;
  try {
    config = resolveConfig(
      {
        db: getFlag('db'),
        mode: getFlag('mode'),
        hash: getFlag('hash'),
        boundary: getFlag('boundary'),
        compactThreshold: getFlag('compact-threshold'),
      },
      io.env,
    );
  } catch (err) {
    if (err instanceof ConfigError) throw new UsageError(err.message);
    throw err;
  }

  return { io, style: createStyle(useColor), config, getFlag };
}

function dispatch(command: Command, ctx: Context): number {
  const value = (name: string): string => {
    const flag = ctx.getFlag(name);
    if (flag === undefined) throw new UsageError(`--${name} requires a value`);
    return flag;
  };

  switch (command) {
    case 'help':
      printUsage((text) => ctx.io.stdout(text));
      return EXIT_OK;
    case 'seed':
      return seedCommand(ctx, value('seed'));
    case 'input':
      return encodeCommand(ctx, value('input'));
    case 'decode':
      return decodeCommand(ctx, value('decode'));
    case 'stats':
      return statsCommand(ctx);
    case 'verify':
      return verifyCommand(ctx);
    case 'compact':
      return compactCommand(ctx);
  }
}

/**
 * Run the CLI with `argv` (without the node and script entries) and return
 * the process exit code.
 */
export function runCli(argv: readonly string[], io: CliIO = processIO): number {
  let quiet = false;
  try {
    const args = parseArgs(argv);
    quiet = args.switches.has('quiet');
    if (quiet) logger.setConsoleLogging(false);

    const command = selectCommand(args);
    return dispatch(command, buildContext(args, io));
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`Error: ${err.message}\n\n`);
      printUsage((text) => io.stderr(text));
      return EXIT_USAGE;
    }
    if (!(err instanceof PhrasebankError)) {
      logger.error('Unexpected failure', { stack: err instanceof Error ? err.stack : String(err) });
    }
    io.stderr(`Error: ${errorMessage(err)}\n`);
    return EXIT_FAILURE;
  } finally {
    if (quiet) logger.setConsoleLogging(true);
  }
}
