// ============================================================================
// @phrasebank/engine — On-disk codes for dictionary settings
// ============================================================================

import type { BoundaryRule, EncodeMode } from '@phrasebank/core';

/** 0 is reserved for "not recorded yet". */
export const ENCODE_MODE_CODES: Record<EncodeMode, number> = {
  grow: 1,
  strict: 2,
};

export const ENCODE_MODES_BY_CODE: Record<number, EncodeMode | undefined> = {
  1: 'grow',
  2: 'strict',
};

export const BOUNDARY_CODES: Record<BoundaryRule, number> = {
  exclusive: 0,
  inclusive: 1,
};

export const BOUNDARIES_BY_CODE: Record<number, BoundaryRule | undefined> = {
  0: 'exclusive',
  1: 'inclusive',
};
