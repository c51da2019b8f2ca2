// Mutating routes -- transfer, approve, transfer-from, burn, issue.
//
// Each route resolves the caller from the caller header, validates the body
// with Zod, and runs one ledger operation. A failed precondition is a normal
// outcome and returns HTTP 200 with { success: false, reason, message };
// only malformed requests and invariant violations become HTTP errors.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import type { z } from 'zod';

import { formatIssues } from '../errors/index.js';
import { serializeEvent } from '../events/serialize.js';
import { LedgerInvalidRequestError } from '../ledger/errors.js';
import type { LedgerEvent, LedgerFailureReason, LedgerResult } from '../ledger/types.js';
import { requireCaller } from '../plugins/caller-identity.js';
import {
  ApproveRequestSchema,
  OperationResponseSchema,
  TransferFromRequestSchema,
  TransferRequestSchema,
  ValueRequestSchema,
} from '../sdk/types.js';
import type { OperationResponse } from '../sdk/types.js';

// ---------------------------------------------------------------------------
// Human-readable failure descriptions
// ---------------------------------------------------------------------------

const FAILURE_MESSAGES: Record<LedgerFailureReason, string> = {
  insufficient_balance: 'Caller balance is less than the requested amount',
  insufficient_allowance: 'Allowance granted to the caller is less than the requested amount',
  not_issuer: 'Only the issuer may issue new tokens',
};

export function describeFailure(reason: LedgerFailureReason): string {
  return FAILURE_MESSAGES[reason];
}

export function toOperationResponse(result: LedgerResult<LedgerEvent>): OperationResponse {
  if (result.success) {
    return { success: true, event: serializeEvent(result.event) };
  }
  return { success: false, reason: result.reason, message: describeFailure(result.reason) };
}

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new LedgerInvalidRequestError(formatIssues(parsed.error));
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

const operationRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const header = fastify.config.ledger.callerHeader;
  const routeOptions = (description: string) => ({
    config: {
      rateLimit: {
        max: fastify.config.rateLimit.sensitive,
        timeWindow: fastify.config.rateLimit.windowMs,
      },
    },
    schema: {
      description,
      tags: ['Operations'],
      response: { 200: OperationResponseSchema },
    },
  });

  fastify.post(
    '/transfer',
    routeOptions('Move tokens from the caller to another account'),
    async (request, reply) => {
      const caller = requireCaller(request, header);
      const { to, value } = parseBody(TransferRequestSchema, request.body);

      const result = fastify.ledger.transfer(caller, to, value);
      return reply.status(200).send(toOperationResponse(result));
    }
  );

  fastify.post(
    '/approve',
    routeOptions("Set aside part of the caller's balance for a spender"),
    async (request, reply) => {
      const caller = requireCaller(request, header);
      const { spender, value } = parseBody(ApproveRequestSchema, request.body);

      const result = fastify.ledger.approve(caller, spender, value);
      return reply.status(200).send(toOperationResponse(result));
    }
  );

  fastify.post(
    '/transfer-from',
    routeOptions('Spend from an allowance an owner granted the caller'),
    async (request, reply) => {
      const caller = requireCaller(request, header);
      const { owner, to, value } = parseBody(TransferFromRequestSchema, request.body);

      const result = fastify.ledger.transferFrom(caller, owner, to, value);
      return reply.status(200).send(toOperationResponse(result));
    }
  );

  fastify.post(
    '/burn',
    routeOptions("Destroy tokens from the caller's balance"),
    async (request, reply) => {
      const caller = requireCaller(request, header);
      const { value } = parseBody(ValueRequestSchema, request.body);

      const result = fastify.ledger.burn(caller, value);
      return reply.status(200).send(toOperationResponse(result));
    }
  );

  fastify.post(
    '/issue',
    routeOptions('Mint new tokens to the issuer (issuer only)'),
    async (request, reply) => {
      const caller = requireCaller(request, header);
      const { value } = parseBody(ValueRequestSchema, request.body);

      const result = fastify.ledger.issue(caller, value);
      return reply.status(200).send(toOperationResponse(result));
    }
  );

  done();
};

export const operationRoutesPlugin = fp(operationRoutes, {
  name: 'operation-routes',
  fastify: '5.x',
  dependencies: ['caller-identity'],
});
