// Read routes -- total supply, balances, allowances.
//
// Reads never mutate state and never emit events, so they need no caller
// identity.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

import { formatIssues } from '../errors/index.js';
import { LedgerInvalidRequestError } from '../ledger/errors.js';
import {
  AccountParamsSchema,
  AllowanceParamsSchema,
  AllowanceResponseSchema,
  BalanceResponseSchema,
  LedgerInfoResponseSchema,
  SupplyResponseSchema,
} from '../sdk/types.js';

const ledgerRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get(
    '/ledger',
    {
      schema: {
        description: 'Ledger issuer and total supply',
        tags: ['Ledger'],
        response: { 200: LedgerInfoResponseSchema },
      },
    },
    async (_request, reply) => {
      return reply.status(200).send({
        issuer: fastify.ledger.issuer,
        totalSupply: fastify.ledger.totalSupply().toString(),
      });
    }
  );

  fastify.get(
    '/supply',
    {
      schema: {
        description: 'Total supply of the token',
        tags: ['Ledger'],
        response: { 200: SupplyResponseSchema },
      },
    },
    async (_request, reply) => {
      return reply.status(200).send({ totalSupply: fastify.ledger.totalSupply().toString() });
    }
  );

  fastify.get(
    '/accounts/:account/balance',
    {
      schema: {
        description: 'Spendable balance of an account (0 if never credited)',
        tags: ['Ledger'],
        response: { 200: BalanceResponseSchema },
      },
    },
    async (request, reply) => {
      const parsed = AccountParamsSchema.safeParse(request.params);
      if (!parsed.success) {
        throw new LedgerInvalidRequestError(formatIssues(parsed.error));
      }

      const { account } = parsed.data;
      return reply.status(200).send({
        account,
        balance: fastify.ledger.balanceOf(account).toString(),
      });
    }
  );

  fastify.get(
    '/allowances/:owner/:spender',
    {
      schema: {
        description: 'Amount the owner has set aside for the spender',
        tags: ['Ledger'],
        response: { 200: AllowanceResponseSchema },
      },
    },
    async (request, reply) => {
      const parsed = AllowanceParamsSchema.safeParse(request.params);
      if (!parsed.success) {
        throw new LedgerInvalidRequestError(formatIssues(parsed.error));
      }

      const { owner, spender } = parsed.data;
      return reply.status(200).send({
        owner,
        spender,
        allowance: fastify.ledger.allowance(owner, spender).toString(),
      });
    }
  );

  done();
};

export const ledgerRoutesPlugin = fp(ledgerRoutes, {
  name: 'ledger-routes',
  fastify: '5.x',
});
