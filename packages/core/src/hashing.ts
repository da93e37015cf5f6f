// ============================================================================
// @phrasebank/core — Content Hashing
// ============================================================================
//
// Content hashes select a dictionary bucket; they never certify equality.
// `sha256-32` keeps only the first four digest bytes, the compact width the
// earliest tools wrote to disk, and collides far sooner than `sha256`.
// ============================================================================

import { createHash } from 'node:crypto';
import { ConfigError } from './errors.js';
import type { ContentHasher } from './types.js';

export const HASH_ALGORITHMS = ['sha256', 'sha256-32'] as const;

export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export const DEFAULT_HASH_ALGORITHM: HashAlgorithm = 'sha256';

/**
 * Compute the hex-encoded SHA-256 digest of a byte sequence.
 */
export function sha256Hex(data: Uint8Array): string {
  const hash = createHash('sha256');
  hash.update(data);
  return hash.digest('hex');
}

const HASHERS: Record<HashAlgorithm, ContentHasher> = {
  sha256: {
    algorithm: 'sha256',
    hash: sha256Hex,
  },
  'sha256-32': {
    algorithm: 'sha256-32',
    hash: (data) => sha256Hex(data).slice(0, 8),
  },
};

export function isHashAlgorithm(name: string): name is HashAlgorithm {
  return (HASH_ALGORITHMS as readonly string[]).includes(name);
}

/**
 * Look up a built-in hasher by algorithm name.
 * @throws {ConfigError} For names that are not built in.
 */
export function createHasher(algorithm: string): ContentHasher {
  if (!isHashAlgorithm(algorithm)) {
    throw new ConfigError(
      `Unknown hash algorithm "${algorithm}". Available: ${HASH_ALGORITHMS.join(', ')}`,
      'hashAlgorithm',
    );
  }
  return HASHERS[algorithm];
}
