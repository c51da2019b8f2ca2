import type { FastifyPluginCallback, FastifyError } from 'fastify';
import fp from 'fastify-plugin';

import { Sentry } from '../instrument.js';

interface ErrorHandlerOptions {
  isDev: boolean;
}

interface ErrorResponse {
  error: {
    code: string;
    message: string;
    statusCode: number;
    stack?: string;
  };
  requestId: string;
  timestamp: string;
}

const errorHandler: FastifyPluginCallback<ErrorHandlerOptions> = (fastify, options, done) => {
  const { isDev } = options;

  // Handle thrown errors
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    const code = error.code ?? 'INTERNAL_ERROR';

    // Server errors log at error level, client errors at warn
    const logData = { err: error, code, statusCode, caller: request.caller };
    if (statusCode >= 500) {
      request.log.error(logData, 'Request error');
    } else {
      request.log.warn(logData, 'Request rejected');
    }

    // Capture server errors in Sentry
    if (statusCode >= 500) {
      Sentry.captureException(error, {
        extra: {
          requestId: request.id,
          url: request.url,
          method: request.method,
          caller: request.caller,
        },
      });
    }

    const response: ErrorResponse = {
      error: {
        code,
        message: isDev ? error.message : sanitizeMessage(error.message, code, statusCode),
        statusCode,
        // Only include stack in development
        ...(isDev && error.stack && { stack: error.stack }),
      },
      requestId: request.id,
      timestamp: new Date().toISOString(),
    };

    reply.status(statusCode).send(response);
  });

  // Handle 404 not found with consistent format
  fastify.setNotFoundHandler((request, reply) => {
    const response: ErrorResponse = {
      error: {
        code: 'NOT_FOUND',
        message: `Route ${request.method}:${request.url} not found`,
        statusCode: 404,
      },
      requestId: request.id,
      timestamp: new Date().toISOString(),
    };

    request.log.warn(
      {
        method: request.method,
        url: request.url,
        requestId: request.id,
      },
      'Route not found'
    );

    reply.status(404).send(response);
  });

  done();
};

function sanitizeMessage(message: string, code: string, statusCode: number): string {
  // Allow rate limit messages
  if (statusCode === 429) {
    return message;
  }
  // In production, return generic messages for internal errors and
  // ledger invariant violations
  if (
    code === 'INTERNAL_ERROR' ||
    code.startsWith('SERVER_') ||
    code === 'LEDGER_AMOUNT_OVERFLOW'
  ) {
    return 'An internal error occurred';
  }
  // Config errors should be visible (they're startup issues)
  if (code.startsWith('CONFIG_')) {
    return message;
  }
  // Default: return the message (it's likely user-facing)
  return message;
}

export const errorHandlerPlugin = fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});
