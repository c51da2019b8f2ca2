// Event sink that archives every event to a Redis list.
//
// The ledger emits synchronously, so events are recorded in memory first
// and the RPUSH runs in the background. Pending writes are tracked so the
// server can flush them before disconnecting.

import type { FastifyBaseLogger } from 'fastify';
import type { Redis } from 'ioredis';

import { MemoryEventSink } from './memory-sink.js';
import { serializeEvent } from './serialize.js';
import type { LedgerEvent } from '../ledger/types.js';

export class RedisEventSink extends MemoryEventSink {
  private readonly redis: Redis;
  private readonly key: string;
  private readonly logger: FastifyBaseLogger;
  private readonly pending = new Set<Promise<void>>();
  private failedWrites = 0;

  constructor(options: { redis: Redis; key: string; logger: FastifyBaseLogger }) {
    super();
    this.redis = options.redis;
    this.key = options.key;
    this.logger = options.logger;
  }

  emit(event: LedgerEvent): void {
    super.emit(event);

    const payload = JSON.stringify(serializeEvent(event));
    const write = this.redis
      .rpush(this.key, payload)
      .then(() => undefined)
      .catch((err: unknown) => {
        this.failedWrites++;
        this.logger.error(
          { err: err instanceof Error ? err.message : 'Unknown error', event: event.type },
          'Failed to archive ledger event'
        );
      })
      .finally(() => {
        this.pending.delete(write);
      });
    this.pending.add(write);
  }

  /** Number of events that could not be appended to Redis */
  getFailedWriteCount(): number {
    return this.failedWrites;
  }

  /** Wait for every in-flight RPUSH to settle */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  async healthy(): Promise<boolean> {
    await this.redis.ping();
    return true;
  }
}
