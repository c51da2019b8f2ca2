import { z } from 'zod';

/**
 * Event sink configuration Zod schema.
 *
 * `memory` keeps events for the lifetime of the process. `redis` also
 * appends every event to a Redis list so external observers can read the
 * history after a restart.
 *
 * SECURITY: `redis.password` is sensitive and must never appear in logs.
 */
export const EventsConfigSchema = z
  .object({
    backend: z.enum(['memory', 'redis']).default('memory'),

    redis: z
      .object({
        host: z.string().default('127.0.0.1'),
        port: z.number().int().min(1).max(65535).default(6379),
        /** Redis password (sensitive - never log). Optional for local dev. */
        password: z.string().optional(),
        /** Redis username (Redis 6+ ACL). Optional. */
        username: z.string().optional(),
        /** Redis database number (0-15). Default 0. */
        db: z.number().int().min(0).max(15).default(0),
        /** List key the events are appended to */
        key: z.string().min(1).default('ledger:events'),
      })
      .default(() => ({ host: '127.0.0.1', port: 6379, db: 0, key: 'ledger:events' })),
  })
  .default(() => ({
    backend: 'memory' as const,
    redis: { host: '127.0.0.1', port: 6379, db: 0, key: 'ledger:events' },
  }));

export type EventsConfig = z.infer<typeof EventsConfigSchema>;
