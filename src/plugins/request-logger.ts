import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

interface RequestLoggerOptions {
  isDev: boolean;
}

const requestLogger: FastifyPluginCallback<RequestLoggerOptions> = (fastify, options, done) => {
  const { isDev } = options;

  // Log incoming requests
  fastify.addHook('onRequest', async (request) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      url: request.url,
      requestId: request.id,
    };

    // Uploads are binary: log their size and type, never their content
    if (isDev) {
      logData.userAgent = request.headers['user-agent'];
      logData.contentType = request.headers['content-type'];
      logData.contentLength = request.headers['content-length'];
    }

    request.log.info(logData, 'Incoming request');
  });

  // Log completed responses
  fastify.addHook('onResponse', async (request, reply) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
      requestId: request.id,
    };

    // Vault routes: tie the response to the entry it touched
    const vaultId = reply.getHeader('x-vault-id');
    if (typeof vaultId === 'string') {
      logData.vaultId = vaultId;
    }

    // Log at appropriate level based on status code
    if (reply.statusCode >= 500) {
      request.log.error(logData, 'Request completed with server error');
    } else if (reply.statusCode >= 400) {
      request.log.warn(logData, 'Request completed with client error');
    } else {
      request.log.info(logData, 'Request completed');
    }
  });

  done();
};

export const requestLoggerPlugin = fp(requestLogger, {
  name: 'request-logger',
  fastify: '5.x',
});
