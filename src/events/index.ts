// Event sink module barrel export and factory function.

import type { FastifyBaseLogger } from 'fastify';
import type { Redis } from 'ioredis';

import type { EventsConfig } from './config.js';
import type { EventSink } from '../ledger/types.js';
import { ServerStartError } from '../errors/index.js';
import { MemoryEventSink } from './memory-sink.js';
import { RedisEventSink } from './redis-sink.js';

export type { EventsConfig } from './config.js';
export { EventsConfigSchema } from './config.js';
export { MemoryEventSink } from './memory-sink.js';
export { RedisEventSink } from './redis-sink.js';
export { createRedisClient, disconnectRedis } from './redis-client.js';
export { serializeEvent, SerializedLedgerEventSchema } from './serialize.js';
export type { SerializedLedgerEvent } from './serialize.js';

/**
 * Create an event sink based on configuration.
 * The redis backend requires a connected client.
 */
export function createEventSink(
  config: EventsConfig,
  redis: Redis | null,
  logger: FastifyBaseLogger
): EventSink {
  if (config.backend === 'memory') {
    return new MemoryEventSink();
  }
  if (!redis) {
    throw new ServerStartError('the redis event backend requires a Redis client');
  }
  return new RedisEventSink({ redis, key: config.redis.key, logger });
}
