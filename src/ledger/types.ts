// Ledger domain types.
//
// Key design: the Ledger is a synchronous state machine. The host supplies
// the caller identity on every mutating call and an EventSink that records
// notifications. Neither is looked up from ambient state.

import type { FastifyBaseLogger } from 'fastify';

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

/** Normalized account identifier: 64 lowercase hex characters */
export type AccountId = string;

/** Token quantity in [0, 2^128 - 1] */
export type Amount = bigint;

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface CreatedEvent {
  type: 'Created';
  from: AccountId;
  totalSupply: Amount;
}

export interface TransferEvent {
  type: 'Transfer';
  from: AccountId;
  to: AccountId;
  value: Amount;
}

export interface ApprovalEvent {
  type: 'Approval';
  owner: AccountId;
  spender: AccountId;
  value: Amount;
}

export interface TransferFromEvent {
  type: 'TransferFrom';
  /** The spender that drew on the allowance */
  from: AccountId;
  owner: AccountId;
  to: AccountId;
  value: Amount;
}

export interface BurnEvent {
  type: 'Burn';
  from: AccountId;
  value: Amount;
}

export interface IssueEvent {
  type: 'Issue';
  issuer: AccountId;
  value: Amount;
}

export type LedgerEvent =
  | CreatedEvent
  | TransferEvent
  | ApprovalEvent
  | TransferFromEvent
  | BurnEvent
  | IssueEvent;

export type LedgerEventType = LedgerEvent['type'];

/**
 * Notification sink supplied by the host.
 * `emit` must not throw; durable backends report write failures on their own.
 */
export interface EventSink {
  emit(event: LedgerEvent): void;

  /** Recorded events in emission order */
  list(offset?: number, limit?: number): readonly LedgerEvent[];

  count(): number;

  /** Health check -- returns true if the sink can record events */
  healthy(): Promise<boolean>;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export const LedgerFailureReason = {
  InsufficientBalance: 'insufficient_balance',
  InsufficientAllowance: 'insufficient_allowance',
  NotIssuer: 'not_issuer',
} as const;

export type LedgerFailureReason = (typeof LedgerFailureReason)[keyof typeof LedgerFailureReason];

export type LedgerResult<E extends LedgerEvent = LedgerEvent> =
  | { success: true; event: E }
  | { success: false; reason: LedgerFailureReason };

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

/** Deep copy of the ledger state at one point in time */
export interface LedgerSnapshot {
  issuer: AccountId;
  totalSupply: Amount;
  balances: Map<AccountId, Amount>;
  allowances: Map<AccountId, Map<AccountId, Amount>>;
}

export interface LedgerOptions {
  sink: EventSink;
  logger?: FastifyBaseLogger;
}
