// Account identifiers: 32 bytes, written as 64 hex characters with an
// optional 0x prefix. Normalized to lowercase without the prefix.

import { z } from 'zod';

import type { AccountId } from './types.js';

const ACCOUNT_PATTERN = /^(0x)?[0-9a-fA-F]{64}$/;

function normalize(raw: string): AccountId {
  return raw.replace(/^0x/, '').toLowerCase();
}

/** Normalized account, or null when `raw` is not 32 bytes of hex */
export function parseAccountId(raw: string): AccountId | null {
  return ACCOUNT_PATTERN.test(raw) ? normalize(raw) : null;
}

export const AccountIdSchema = z
  .string()
  .regex(ACCOUNT_PATTERN, 'Must be 32 bytes of hex (64 characters, optional 0x prefix)')
  .transform(normalize);
