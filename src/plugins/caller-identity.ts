// Caller identity resolution.
//
// The ledger takes the caller as an explicit argument on every mutation.
// This plugin is the host side of that contract: it reads the configured
// header on each request and exposes the normalized account as
// `request.caller` (null when the header is absent or malformed).

import type { FastifyPluginCallback, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

import { parseAccountId } from '../ledger/account.js';
import { LedgerCallerRequiredError } from '../ledger/errors.js';
import type { AccountId } from '../ledger/types.js';

interface CallerIdentityOptions {
  /** Lowercase header name, e.g. "x-ledger-caller" */
  header: string;
}

const callerIdentity: FastifyPluginCallback<CallerIdentityOptions> = (fastify, options, done) => {
  const { header } = options;

  fastify.decorateRequest('caller', null);

  fastify.addHook('onRequest', async (request) => {
    const raw = request.headers[header];
    request.caller = typeof raw === 'string' ? parseAccountId(raw) : null;
  });

  done();
};

/**
 * Return the resolved caller or throw LedgerCallerRequiredError (401).
 */
export function requireCaller(request: FastifyRequest, header: string): AccountId {
  if (request.caller === null) {
    throw new LedgerCallerRequiredError(header);
  }
  return request.caller;
}

export const callerIdentityPlugin = fp(callerIdentity, {
  name: 'caller-identity',
  fastify: '5.x',
});
