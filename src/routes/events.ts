// GET /events route -- notifications recorded by the event sink during this
// process lifetime, oldest first.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

import { formatIssues } from '../errors/index.js';
import { serializeEvent } from '../events/serialize.js';
import { LedgerInvalidRequestError } from '../ledger/errors.js';
import { EventsQuerySchema, EventsResponseSchema } from '../sdk/types.js';

const eventRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get(
    '/events',
    {
      schema: {
        description: 'Page through recorded ledger events',
        tags: ['Ledger'],
        response: { 200: EventsResponseSchema },
      },
    },
    async (request, reply) => {
      const parsed = EventsQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        throw new LedgerInvalidRequestError(formatIssues(parsed.error));
      }

      const { offset, limit } = parsed.data;
      return reply.status(200).send({
        total: fastify.eventSink.count(),
        offset,
        events: fastify.eventSink.list(offset, limit).map(serializeEvent),
      });
    }
  );

  done();
};

export const eventRoutesPlugin = fp(eventRoutes, {
  name: 'event-routes',
  fastify: '5.x',
});
