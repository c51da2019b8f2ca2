// u128 amount helpers. Amounts are bigints in memory and decimal strings
// on the wire.

import { z } from 'zod';

import { LedgerAmountOverflowError, LedgerInvalidAmountError } from './errors.js';
import type { Amount } from './types.js';

/** Largest representable amount: 2^128 - 1 */
export const MAX_AMOUNT: Amount = (1n << 128n) - 1n;

const DECIMAL_PATTERN = /^\d+$/;

export function isAmount(value: bigint): boolean {
  return value >= 0n && value <= MAX_AMOUNT;
}

/**
 * Throw LedgerInvalidAmountError unless `value` is within [0, MAX_AMOUNT].
 */
export function assertAmount(value: bigint): Amount {
  if (!isAmount(value)) {
    throw new LedgerInvalidAmountError(value.toString());
  }
  return value;
}

/**
 * Add two amounts, throwing LedgerAmountOverflowError past MAX_AMOUNT.
 *
 * @param context - Operation name carried in the error message
 */
export function checkedAdd(a: Amount, b: Amount, context: string): Amount {
  const sum = a + b;
  if (sum > MAX_AMOUNT) {
    throw new LedgerAmountOverflowError(context);
  }
  return sum;
}

/**
 * Parse a decimal string into an Amount.
 * Rejects signs, decimals, exponents, and values above MAX_AMOUNT.
 */
export function parseAmount(raw: string): Amount {
  if (!DECIMAL_PATTERN.test(raw)) {
    throw new LedgerInvalidAmountError(raw);
  }
  return assertAmount(BigInt(raw));
}

/** Decimal string within the u128 range (kept as a string) */
export const DecimalAmountSchema = z
  .string()
  .regex(DECIMAL_PATTERN, 'Must be a non-negative decimal integer string')
  // Regex failures do not abort the chain; only range-check well-formed input
  .refine(
    (s) => !DECIMAL_PATTERN.test(s) || BigInt(s) <= MAX_AMOUNT,
    'Must not exceed 2^128 - 1'
  );

/** Amount on the wire, transformed to bigint */
export const AmountStringSchema = DecimalAmountSchema.transform((s) => BigInt(s));
