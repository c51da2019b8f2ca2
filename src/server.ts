import { randomUUID } from 'node:crypto';

import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { FastifyInstance } from 'fastify';
import fastify from 'fastify';
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';
import type { Redis } from 'ioredis';

import type { Config } from './config/index.js';
import { ServerStartError } from './errors/index.js';
import {
  createEventSink,
  createRedisClient,
  disconnectRedis,
  RedisEventSink,
} from './events/index.js';
import { parseAmount } from './ledger/amount.js';
import { Ledger } from './ledger/ledger.js';
import { callerIdentityPlugin } from './plugins/caller-identity.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { requestLoggerPlugin } from './plugins/request-logger.js';
import { eventRoutesPlugin } from './routes/events.js';
import { healthRoutesPlugin } from './routes/health.js';
import { ledgerRoutesPlugin } from './routes/ledger.js';
import { operationRoutesPlugin } from './routes/operations.js';

// Import types to ensure augmentation is loaded
import './types/index.js';

export interface CreateServerOptions {
  config: Config;
  /** Pre-built Redis client (tests); otherwise one is created for the redis backend */
  redis?: Redis;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const { config } = options;
  const isDev = config.env === 'development';

  const server = fastify({
    logger: {
      level: config.logging.level,
      transport: config.logging.pretty
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    },
    // Request ID handling
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
    // Disable default request logging (we use custom plugin)
    disableRequestLogging: true,
    // Strict body limit (16KB)
    bodyLimit: 16384,
  });

  // Zod type provider compilers (Zod response schemas in route declarations)
  server.setValidatorCompiler(validatorCompiler);
  server.setSerializerCompiler(serializerCompiler);

  server.decorate('config', config);

  // Security headers
  await server.register(helmet, {
    global: true,
    contentSecurityPolicy: isDev ? false : undefined,
  });

  await server.register(rateLimit, {
    max: config.rateLimit.global,
    timeWindow: config.rateLimit.windowMs,
  });

  // CORS - permissive in dev, restrictive in prod
  await server.register(cors, {
    origin: isDev ? true : false,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID', config.ledger.callerHeader],
  });

  // Custom plugins (caller identity first: the logger and error handler read it)
  await server.register(callerIdentityPlugin, { header: config.ledger.callerHeader });
  await server.register(errorHandlerPlugin, { isDev });
  await server.register(requestLoggerPlugin, { isDev });

  // ---- OpenAPI documentation ----
  await server.register(swagger, {
    openapi: {
      openapi: '3.0.3',
      info: {
        title: 'Token Ledger',
        description:
          'Fungible-token ledger API: balances, allowances, total supply, and issuance.',
        version: '1.0.0',
      },
      servers: [{ url: `http://localhost:${config.server.port}`, description: 'Development' }],
      tags: [
        { name: 'Health', description: 'Server health' },
        { name: 'Ledger', description: 'Read-only ledger state and events' },
        { name: 'Operations', description: 'State transitions (caller header required)' },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await server.register(swaggerUi, {
    routePrefix: '/docs',
  });

  // ---- Event sink initialization ----
  let redis: Redis | null = null;
  if (config.events.backend === 'redis') {
    redis = options.redis ?? createRedisClient(config.events.redis, server.log);
    try {
      await redis.connect();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      server.log.error({ err: message }, 'Event sink initialization failed');
      throw new ServerStartError(`Redis unavailable: ${message}`);
    }
    server.log.info(
      {
        redis: `${config.events.redis.host}:${config.events.redis.port}`,
        key: config.events.redis.key,
      },
      'Event sink: Redis connected'
    );
  }

  const eventSink = createEventSink(config.events, redis, server.log);
  server.decorate('eventSink', eventSink);

  server.addHook('onClose', async () => {
    if (eventSink instanceof RedisEventSink) {
      await eventSink.flush();
    }
    if (redis) {
      await disconnectRedis(redis);
    }
    server.log.info('Event sink shutdown complete');
  });

  // ---- Ledger construction (emits Created) ----
  const ledger = new Ledger(parseAmount(config.ledger.initialSupply), config.ledger.issuer, {
    sink: eventSink,
    logger: server.log,
  });
  server.decorate('ledger', ledger);

  server.log.info(
    { issuer: ledger.issuer, totalSupply: ledger.totalSupply().toString() },
    'Ledger created'
  );

  // Routes
  await server.register(healthRoutesPlugin);
  await server.register(ledgerRoutesPlugin);
  await server.register(operationRoutesPlugin);
  await server.register(eventRoutesPlugin);

  return server;
}
