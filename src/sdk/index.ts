// SDK barrel export -- public API for ledger clients

export { LedgerClient, LedgerClientError } from './ledger-client.js';
export type { LedgerClientOptions } from './ledger-client.js';
export type {
  TransferRequest,
  ApproveRequest,
  TransferFromRequest,
  ValueRequest,
  LedgerInfoResponse,
  SupplyResponse,
  BalanceResponse,
  AllowanceResponse,
  OperationResponse,
  EventsResponse,
} from './types.js';
export {
  TransferRequestSchema,
  ApproveRequestSchema,
  TransferFromRequestSchema,
  ValueRequestSchema,
  LedgerInfoResponseSchema,
  SupplyResponseSchema,
  BalanceResponseSchema,
  AllowanceResponseSchema,
  OperationResponseSchema,
  EventsResponseSchema,
} from './types.js';
export { SerializedLedgerEventSchema } from '../events/serialize.js';
export type { SerializedLedgerEvent } from '../events/serialize.js';
