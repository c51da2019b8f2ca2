// Wire format for the ledger HTTP API.
//
// Request schemas accept strings (accounts as hex, amounts as decimal
// strings) and transform them into ledger types. Response schemas are
// plain strings throughout so bigints never touch JSON.

import { z } from 'zod';

import { SerializedLedgerEventSchema } from '../events/serialize.js';
import { AccountIdSchema } from '../ledger/account.js';
import { AmountStringSchema } from '../ledger/amount.js';
import { LedgerFailureReason } from '../ledger/types.js';

const AmountWire = z.string().regex(/^\d+$/);

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export const TransferRequestSchema = z.object({
  to: AccountIdSchema,
  value: AmountStringSchema,
});

export const ApproveRequestSchema = z.object({
  spender: AccountIdSchema,
  value: AmountStringSchema,
});

export const TransferFromRequestSchema = z.object({
  owner: AccountIdSchema,
  to: AccountIdSchema,
  value: AmountStringSchema,
});

/** Body of /burn and /issue */
export const ValueRequestSchema = z.object({
  value: AmountStringSchema,
});

export const AccountParamsSchema = z.object({
  account: AccountIdSchema,
});

export const AllowanceParamsSchema = z.object({
  owner: AccountIdSchema,
  spender: AccountIdSchema,
});

export const EventsQuerySchema = z.object({
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export type TransferRequest = z.input<typeof TransferRequestSchema>;
export type ApproveRequest = z.input<typeof ApproveRequestSchema>;
export type TransferFromRequest = z.input<typeof TransferFromRequestSchema>;
export type ValueRequest = z.input<typeof ValueRequestSchema>;

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export const LedgerInfoResponseSchema = z.object({
  issuer: z.string(),
  totalSupply: AmountWire,
});

export const SupplyResponseSchema = z.object({
  totalSupply: AmountWire,
});

export const BalanceResponseSchema = z.object({
  account: z.string(),
  balance: AmountWire,
});

export const AllowanceResponseSchema = z.object({
  owner: z.string(),
  spender: z.string(),
  allowance: AmountWire,
});

export const OperationResponseSchema = z.union([
  z.object({
    success: z.literal(true),
    event: SerializedLedgerEventSchema,
  }),
  z.object({
    success: z.literal(false),
    reason: z.enum(LedgerFailureReason),
    message: z.string(),
  }),
]);

export const EventsResponseSchema = z.object({
  total: z.number().int(),
  offset: z.number().int(),
  events: z.array(SerializedLedgerEventSchema),
});

export type LedgerInfoResponse = z.infer<typeof LedgerInfoResponseSchema>;
export type SupplyResponse = z.infer<typeof SupplyResponseSchema>;
export type BalanceResponse = z.infer<typeof BalanceResponseSchema>;
export type AllowanceResponse = z.infer<typeof AllowanceResponseSchema>;
export type OperationResponse = z.infer<typeof OperationResponseSchema>;
export type EventsResponse = z.infer<typeof EventsResponseSchema>;
