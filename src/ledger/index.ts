// Barrel exports for the ledger module

// Types
export type {
  AccountId,
  Amount,
  LedgerEvent,
  LedgerEventType,
  CreatedEvent,
  TransferEvent,
  ApprovalEvent,
  TransferFromEvent,
  BurnEvent,
  IssueEvent,
  EventSink,
  LedgerResult,
  LedgerSnapshot,
  LedgerOptions,
} from './types.js';
export { LedgerFailureReason } from './types.js';

// Errors
export {
  LedgerInvalidAmountError,
  LedgerInvalidRequestError,
  LedgerCallerRequiredError,
  LedgerAmountOverflowError,
} from './errors.js';

// Amounts and accounts
export {
  MAX_AMOUNT,
  isAmount,
  assertAmount,
  checkedAdd,
  parseAmount,
  DecimalAmountSchema,
  AmountStringSchema,
} from './amount.js';
export { AccountIdSchema, parseAccountId } from './account.js';

// Config
export type { LedgerConfig } from './config.js';
export { LedgerConfigSchema } from './config.js';

// State machine
export { Ledger } from './ledger.js';
