import type { FastifyPluginCallback, FastifyError } from 'fastify';
import fp from 'fastify-plugin';

import { Sentry } from '../instrument.js';

interface ErrorHandlerOptions {
  /** Return raw messages and stacks to callers (local development only) */
  exposeErrorDetails: boolean;
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
  const { exposeErrorDetails } = options;

  // Handle thrown errors
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    const code = error.code ?? 'INTERNAL_ERROR';

    // Client errors are expected traffic; only server errors log at error level
    const level = statusCode >= 500 ? 'error' : 'warn';
    request.log[level](
      {
        err: error,
        code,
        statusCode,
      },
      'Request error'
    );

    // Capture server errors in Sentry
    if (statusCode >= 500) {
      Sentry.captureException(error, {
        extra: {
          requestId: request.id,
          url: request.url,
          method: request.method,
        },
      });
    }

    const response: ErrorResponse = {
      error: {
        code,
        message: exposeErrorDetails
          ? error.message
          : sanitizeMessage(error.message, code, statusCode),
        statusCode,
        ...(exposeErrorDetails && error.stack && { stack: error.stack }),
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
  // Client errors (validation, not found, too large, rate limit) are user-facing
  if (statusCode < 500) {
    return message;
  }
  // Storage failures already carry a generic message without backend detail
  if (code === 'VAULT_STORAGE_ERROR') {
    return message;
  }
  // Everything else is unexpected: never leak internals
  return 'An internal error occurred';
}

export const errorHandlerPlugin = fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});
