// ============================================================================
// @phrasebank/engine — Configuration
// ============================================================================
//
// Precedence: command-line flags, then environment, then defaults.
//
//   PHRASEBANK_DB                 dictionary directory      (default .phrasebank)
//   PHRASEBANK_MODE               grow | strict             (default: recorded, else grow)
//   PHRASEBANK_HASH               sha256 | sha256-32        (new dictionaries only)
//   PHRASEBANK_BOUNDARY           exclusive | inclusive     (new dictionaries only)
//   PHRASEBANK_COMPACT_THRESHOLD  log bytes before compaction on close
// ============================================================================

import { ConfigError, HASH_ALGORITHMS } from '@phrasebank/core';
import { z } from 'zod';
import { DEFAULT_COMPACT_THRESHOLD_BYTES } from './dictionary.js';

export const DEFAULT_DB_DIR = '.phrasebank';

const configSchema = z.object({
  dbDir: z.string().min(1),
  mode: z.enum(['grow', 'strict']).optional(),
  hashAlgorithm: z.enum(HASH_ALGORITHMS).optional(),
  boundary: z.enum(['exclusive', 'inclusive']).optional(),
  compactThresholdBytes: z.coerce.number().int().positive(),
});

export type PhrasebankConfig = z.infer<typeof configSchema>;

/** Raw flag values as the CLI parsed them. */
export interface ConfigFlags {
  db?: string;
  mode?: string;
  hash?: string;
  boundary?: string;
  compactThreshold?: string;
}

function pick(flag: string | undefined, envValue: string | undefined): string | undefined {
  if (flag !== undefined && flag !== '') return flag;
  if (envValue !== undefined && envValue !== '') return envValue;
  return undefined;
}

/**
 * Merge flags, environment and defaults into a validated configuration.
 *
 * @throws {ConfigError} Naming the first invalid setting.
 */
export function resolveConfig(
  flags: ConfigFlags = {},
  env: NodeJS.ProcessEnv = process.env,
): PhrasebankConfig {
  const result = configSchema.safeParse({
    dbDir: pick(flags.db, env.PHRASEBANK_DB) ?? DEFAULT_DB_DIR,
    mode: pick(flags.mode, env.PHRASEBANK_MODE),
    hashAlgorithm: pick(flags.hash, env.PHRASEBANK_HASH),
    boundary: pick(flags.boundary, env.PHRASEBANK_BOUNDARY),
    compactThresholdBytes:
      pick(flags.compactThreshold, env.PHRASEBANK_COMPACT_THRESHOLD) ??
      DEFAULT_COMPACT_THRESHOLD_BYTES,
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const setting = issue.path.map(String).join('.');
    throw new ConfigError(`Invalid ${setting}: ${issue.message}`, setting);
  }
  return result.data;
}
