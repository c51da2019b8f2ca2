// JSON form of ledger events. Amounts travel as decimal strings so they
// survive JSON without precision loss.

import { z } from 'zod';

import type { LedgerEvent } from '../ledger/types.js';

const AccountString = z.string().regex(/^[0-9a-f]{64}$/);
const AmountString = z.string().regex(/^\d+$/);

export const SerializedLedgerEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Created'), from: AccountString, totalSupply: AmountString }),
  z.object({
    type: z.literal('Transfer'),
    from: AccountString,
    to: AccountString,
    value: AmountString,
  }),
  z.object({
    type: z.literal('Approval'),
    owner: AccountString,
    spender: AccountString,
    value: AmountString,
  }),
  z.object({
    type: z.literal('TransferFrom'),
    from: AccountString,
    owner: AccountString,
    to: AccountString,
    value: AmountString,
  }),
  z.object({ type: z.literal('Burn'), from: AccountString, value: AmountString }),
  z.object({ type: z.literal('Issue'), issuer: AccountString, value: AmountString }),
]);

export type SerializedLedgerEvent = z.infer<typeof SerializedLedgerEventSchema>;

export function serializeEvent(event: LedgerEvent): SerializedLedgerEvent {
  switch (event.type) {
    case 'Created':
      return { type: 'Created', from: event.from, totalSupply: event.totalSupply.toString() };
    case 'Transfer':
      return { type: 'Transfer', from: event.from, to: event.to, value: event.value.toString() };
    case 'Approval':
      return {
        type: 'Approval',
        owner: event.owner,
        spender: event.spender,
        value: event.value.toString(),
      };
    case 'TransferFrom':
      return {
        type: 'TransferFrom',
        from: event.from,
        owner: event.owner,
        to: event.to,
        value: event.value.toString(),
      };
    case 'Burn':
      return { type: 'Burn', from: event.from, value: event.value.toString() };
    case 'Issue':
      return { type: 'Issue', issuer: event.issuer, value: event.value.toString() };
  }
}
