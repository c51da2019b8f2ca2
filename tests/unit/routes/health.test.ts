import type { FastifyInstance } from 'fastify';
import fastify from 'fastify';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { healthRoutesPlugin } from '@/routes/health.js';

const ISSUER = 'ee'.repeat(32);

/** Mock event sink that is healthy by default */
function createMockSink(healthy: ReturnType<typeof vi.fn> = vi.fn().mockResolvedValue(true)) {
  return {
    emit: vi.fn(),
    list: vi.fn().mockReturnValue([]),
    count: vi.fn().mockReturnValue(3),
    healthy,
  };
}

async function createHealthServer(
  sink: ReturnType<typeof createMockSink> = createMockSink()
): Promise<FastifyInstance> {
  const server = fastify({ logger: false });

  // Cast to 'never' to satisfy Fastify's strict decorator typing -- test mocks
  server.decorate('eventSink', sink as never);
  server.decorate('ledger', {
    issuer: ISSUER,
    totalSupply: () => 1000n,
  } as never);

  await server.register(healthRoutesPlugin);
  await server.ready();
  return server;
}

describe('Health Endpoint', () => {
  let server: FastifyInstance;

  afterEach(async () => {
    if (server) await server.close();
  });

  describe('Event sink up (healthy)', () => {
    beforeEach(async () => {
      server = await createHealthServer();
    });

    it('should return healthy status with HTTP 200', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json().status).toBe('healthy');
    });

    it('should report the event sink as up with latency', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      const body = response.json();
      expect(body.dependencies.events.status).toBe('up');
      expect(body.dependencies.events.latency).toBeGreaterThanOrEqual(0);
    });

    it('should summarize the ledger', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.json().ledger).toEqual({
        issuer: ISSUER,
        totalSupply: '1000',
        events: 3,
      });
    });
  });

  describe('Event sink down (unhealthy)', () => {
    it('should return 503 when the sink health check rejects', async () => {
      server = await createHealthServer(
        createMockSink(vi.fn().mockRejectedValue(new Error('Connection refused')))
      );

      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      const body = response.json();
      expect(body.status).toBe('unhealthy');
      expect(body.dependencies.events.status).toBe('down');
      expect(body.dependencies.events.error).toBe('Connection refused');
    });

    it('should return 503 when the sink reports unhealthy', async () => {
      server = await createHealthServer(createMockSink(vi.fn().mockResolvedValue(false)));

      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json().dependencies.events.status).toBe('down');
    });

    it('should handle non-Error rejections', async () => {
      server = await createHealthServer(
        createMockSink(vi.fn().mockRejectedValue('string error'))
      );

      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.json().dependencies.events.error).toBe('Unknown error');
    });
  });

  describe('Response shape validation', () => {
    beforeEach(async () => {
      server = await createHealthServer();
    });

    it('should return ISO timestamp', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.json().timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
    });

    it('should return uptime as positive number', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      const body = response.json();
      expect(typeof body.uptime).toBe('number');
      expect(body.uptime).toBeGreaterThan(0);
    });

    it('should return the package version', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.json().version).toBe('0.1.0');
    });
  });
});
