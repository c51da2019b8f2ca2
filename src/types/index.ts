// token-ledger type definitions

import type { Config } from '../config/index.js';
import type { Ledger } from '../ledger/ledger.js';
import type { AccountId, EventSink } from '../ledger/types.js';

// Augment Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    ledger: Ledger;
    eventSink: EventSink;
  }

  interface FastifyRequest {
    /** Caller identity resolved from the caller header, null if absent or malformed */
    caller: AccountId | null;
  }
}
