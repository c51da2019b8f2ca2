import type { FastifyInstance } from 'fastify';
import type { Redis } from 'ioredis';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { RedisEventSink } from '@/events/redis-sink.js';
import { createServer } from '@/server.js';

import { BOB, ISSUER, createTestConfig, postAs } from './helpers.js';

// In-process stand-in for the ioredis client
function createMockRedis() {
  const lists = new Map<string, string[]>();

  return {
    connect: vi.fn().mockResolvedValue(undefined),
    quit: vi.fn().mockResolvedValue('OK'),
    disconnect: vi.fn(),
    on: vi.fn().mockReturnThis(),
    ping: vi.fn().mockResolvedValue('PONG'),
    rpush: vi.fn(async (key: string, ...values: string[]): Promise<number> => {
      const list = lists.get(key) ?? [];
      list.push(...values);
      lists.set(key, list);
      return list.length;
    }),
    status: 'ready',
    _lists: lists,
  };
}

const redisConfig = {
  events: { backend: 'redis', redis: { key: 'test:events' } },
};

describe('Redis event archive', () => {
  let server: FastifyInstance | null = null;
  let redis: ReturnType<typeof createMockRedis>;

  beforeEach(() => {
    redis = createMockRedis();
  });

  afterEach(async () => {
    if (server) await server.close();
    server = null;
  });

  async function start(): Promise<FastifyInstance> {
    const app = await createServer({
      config: createTestConfig(redisConfig),
      redis: redis as unknown as Redis,
    });
    server = app;
    await app.ready();
    return app;
  }

  it('should connect and archive the Created event', async () => {
    const app = await start();

    expect(redis.connect).toHaveBeenCalledOnce();
    expect(app.eventSink).toBeInstanceOf(RedisEventSink);
    expect(redis._lists.get('test:events')).toEqual([
      JSON.stringify({ type: 'Created', from: ISSUER, totalSupply: '1000' }),
    ]);
  });

  it('should append operation events with decimal-string amounts', async () => {
    const app = await start();

    await postAs(app, ISSUER, '/transfer', { to: BOB, value: '250' });
    await postAs(app, BOB, '/issue', { value: '1' });

    expect(redis.rpush).toHaveBeenCalledTimes(2);
    expect(redis._lists.get('test:events')?.[1]).toBe(
      JSON.stringify({ type: 'Transfer', from: ISSUER, to: BOB, value: '250' })
    );
  });

  it('should quit Redis on close', async () => {
    const app = await start();
    server = null;

    await app.close();

    expect(redis.quit).toHaveBeenCalledOnce();
  });

  it('should report the event sink down when Redis stops answering', async () => {
    const app = await start();
    redis.ping.mockRejectedValueOnce(new Error('Connection is closed.'));

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json().dependencies.events).toMatchObject({
      status: 'down',
      error: 'Connection is closed.',
    });
  });

  it('should refuse to start when Redis cannot connect', async () => {
    redis.connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));

    await expect(
      createServer({ config: createTestConfig(redisConfig), redis: redis as unknown as Redis })
    ).rejects.toMatchObject({
      code: 'SERVER_START_ERROR',
      message: 'Failed to start server: Redis unavailable: ECONNREFUSED',
    });
  });
});
