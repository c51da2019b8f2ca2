import createError from '@fastify/error';

// Ledger errors (LEDGER_*)
//
// Failed preconditions (insufficient balance, allowance, not issuer) are NOT
// errors -- they return { success: false, reason } from the Ledger. These
// errors cover malformed input and invariant violations.

/**
 * Amount handed to the core is negative or above the u128 ceiling (400).
 * Wire input never gets this far: the routes reject it as LEDGER_INVALID_REQUEST.
 */
export const LedgerInvalidAmountError = createError<[string]>(
  'LEDGER_INVALID_AMOUNT',
  'Invalid amount: %s',
  400
);

/** Request body or path parameters failed validation (400) */
export const LedgerInvalidRequestError = createError<[string]>(
  'LEDGER_INVALID_REQUEST',
  'Invalid ledger request: %s',
  400
);

/** Mutating call arrived without a resolvable caller identity (401) */
export const LedgerCallerRequiredError = createError<[string]>(
  'LEDGER_CALLER_REQUIRED',
  'Caller identity required in header: %s',
  401
);

/**
 * An addition would exceed the u128 ceiling. Unreachable while total supply
 * stays in range, so this is fatal rather than a failed precondition (500).
 */
export const LedgerAmountOverflowError = createError<[string]>(
  'LEDGER_AMOUNT_OVERFLOW',
  'Amount overflow in %s',
  500
);
