// Token ledger client -- Example
//
// Walks through the ledger operations against a running server:
//   1. Read issuer and total supply (GET /ledger)
//   2. Transfer from the issuer to a second account
//   3. Approve a spender, then spend from the allowance
//   4. Burn and issue as the issuer
//   5. List the recorded events
//
// Usage:
//   ISSUER=<64 hex chars> tsx examples/client.ts
//
// Environment variables:
//   ISSUER      (required) -- the ledger.issuer account from the server config
//   SERVER_URL  (optional) -- ledger URL (default: http://localhost:3000)

import { LedgerClient } from '../src/sdk/index.js';
import type { OperationResponse } from '../src/sdk/index.js';

const SERVER_URL = process.env.SERVER_URL ?? 'http://localhost:3000';

const BOB = 'bb'.repeat(32);
const CAROL = 'cc'.repeat(32);

function report(step: string, result: OperationResponse): void {
  if (result.success) {
    console.log(`${step}: ${result.event.type}`, result.event);
  } else {
    console.log(`${step}: rejected (${result.reason}) ${result.message}`);
  }
}

async function main(): Promise<void> {
  const issuer = process.env.ISSUER;
  if (!issuer) {
    console.error('ERROR: ISSUER environment variable is required.');
    process.exit(1);
  }

  const asIssuer = new LedgerClient({ baseUrl: SERVER_URL, caller: issuer });
  const asBob = asIssuer.withCaller(BOB);

  const info = await asIssuer.info();
  console.log(`Ledger issuer ${info.issuer}, total supply ${info.totalSupply}`);

  report('transfer 100 to bob', await asIssuer.transfer({ to: BOB, value: '100' }));
  report('approve bob for 50', await asIssuer.approve({ spender: BOB, value: '50' }));
  report(
    'bob spends 20 to carol',
    await asBob.transferFrom({ owner: issuer, to: CAROL, value: '20' })
  );
  report('bob issues 10', await asBob.issue('10'));
  report('issuer burns 5', await asIssuer.burn('5'));
  report('issuer issues 25', await asIssuer.issue('25'));

  const [bob, carol, allowance] = await Promise.all([
    asIssuer.balanceOf(BOB),
    asIssuer.balanceOf(CAROL),
    asIssuer.allowance(issuer, BOB),
  ]);
  console.log(`bob=${bob.balance} carol=${carol.balance} allowance=${allowance.allowance}`);

  const { total, events } = await asIssuer.events();
  console.log(`${total} events recorded:`);
  for (const event of events) {
    console.log(' ', event.type, event);
  }
}

main().catch((err) => {
  console.error('Example failed:', err);
  process.exit(1);
});
