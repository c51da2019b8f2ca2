import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

import type { EventSink } from '../ledger/types.js';

// Read version once at startup (not on every request)
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(resolve(process.cwd(), 'package.json'), 'utf-8')));
const APP_VERSION = packageJson.version;

interface DependencyStatus {
  status: 'up' | 'down';
  latency?: number;
  error?: string;
}

interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  ledger: {
    issuer: string;
    totalSupply: string;
    events: number;
  };
  dependencies: Record<string, DependencyStatus>;
}

async function checkEventSink(sink: EventSink): Promise<DependencyStatus> {
  const start = Date.now();
  try {
    const healthy = await sink.healthy();
    return {
      status: healthy ? 'up' : 'down',
      latency: Date.now() - start,
    };
  } catch (err) {
    return {
      status: 'down',
      latency: Date.now() - start,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  }
}

const healthRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Reply: HealthResponse }>('/health', async (_request, reply) => {
    const dependencies: Record<string, DependencyStatus> = {
      events: await checkEventSink(fastify.eventSink),
    };

    const allUp = Object.values(dependencies).every((d) => d.status === 'up');
    const allDown = Object.values(dependencies).every((d) => d.status === 'down');

    let status: HealthResponse['status'];
    if (allUp) {
      status = 'healthy';
    } else if (allDown) {
      status = 'unhealthy';
    } else {
      status = 'degraded';
    }

    const response: HealthResponse = {
      status,
      timestamp: new Date().toISOString(),
      version: APP_VERSION,
      uptime: process.uptime(),
      ledger: {
        issuer: fastify.ledger.issuer,
        totalSupply: fastify.ledger.totalSupply().toString(),
        events: fastify.eventSink.count(),
      },
      dependencies,
    };

    return reply.status(status === 'unhealthy' ? 503 : 200).send(response);
  });

  done();
};

export const healthRoutesPlugin = fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
