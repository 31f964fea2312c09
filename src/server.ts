import { randomUUID } from 'node:crypto';

import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import multipart from '@fastify/multipart';
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

import type { Config } from './config/index.js';
import { buildLoggerOptions } from './logger.js';
import { AuditLog } from './logs/index.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { requestLoggerPlugin } from './plugins/request-logger.js';
import { healthRoutesPlugin } from './routes/health.js';
import { ingestRoutesPlugin } from './routes/ingest.js';
import { vaultRoutesPlugin } from './routes/vault.js';
import { createBlobStore } from './storage/index.js';
import type { BlobStore } from './storage/index.js';
import { VaultService } from './vault/index.js';

// Import types to ensure augmentation is loaded
import './types/index.js';

export interface CreateServerOptions {
  config: Config;
  /** Blob store to use instead of the one built from `config.storage` */
  storage?: BlobStore;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const { config } = options;
  const isDev = config.env === 'development';

  const server = fastify({
    logger: buildLoggerOptions(config.logging),
    // Request ID handling
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
    // Disable default request logging (we use custom plugin)
    disableRequestLogging: true,
    // JSON bodies are small; uploads get their own limit on POST /ingest
    bodyLimit: 51200,
  });

  // Zod type provider compilers (enables Zod schemas in route schema declarations)
  server.setValidatorCompiler(validatorCompiler);
  server.setSerializerCompiler(serializerCompiler);

  // Decorate server with config for access in routes
  server.decorate('config', config);

  // Security headers
  await server.register(helmet, {
    global: true,
    contentSecurityPolicy: isDev ? false : undefined,
  });

  // Rate limiting
  await server.register(rateLimit, {
    max: config.rateLimit.global,
    timeWindow: config.rateLimit.windowMs,
  });

  // CORS - permissive in dev, restrictive in prod
  await server.register(cors, {
    origin: isDev ? true : false,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    exposedHeaders: ['Content-Disposition', 'X-Content-Digest', 'X-Vault-Id'],
  });

  // Multipart support (file uploads)
  await server.register(multipart, {
    limits: { fileSize: config.vault.maxUploadBytes, files: 1 },
  });

  // Custom plugins
  await server.register(errorHandlerPlugin, { exposeErrorDetails: isDev });
  await server.register(requestLoggerPlugin, { isDev });

  // ---- OpenAPI documentation ----
  await server.register(swagger, {
    openapi: {
      openapi: '3.0.3',
      info: {
        title: 'vault-relay',
        description:
          'File relay: stores uploads in an object store under a generated vault ID and verifies them against the SHA-256 digest recorded at ingest.',
        version: '1.0.0',
        license: { name: 'Apache-2.0', url: 'https://www.apache.org/licenses/LICENSE-2.0' },
      },
      servers: [{ url: 'http://localhost:3000', description: 'Development' }],
      tags: [
        { name: 'Service', description: 'Service status' },
        { name: 'Vault', description: 'File ingest, retrieval and verification' },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await server.register(swaggerUi, {
    routePrefix: '/docs',
  });

  // ---- Storage and audit log ----
  const storage = options.storage ?? createBlobStore(config.storage, server.log);
  server.decorate('storage', storage);
  server.log.info({ backend: config.storage.backend }, 'Storage layer initialized');

  const auditLog = new AuditLog(config.vault.auditLogPath, server.log);
  server.decorate('auditLog', auditLog);

  server.decorate(
    'vault',
    new VaultService({
      storage,
      auditLog,
      logger: server.log,
      maxUploadBytes: config.vault.maxUploadBytes,
    })
  );
  server.log.info({ auditLog: auditLog.path }, 'Vault service initialized');

  // Routes
  await server.register(healthRoutesPlugin);
  await server.register(ingestRoutesPlugin);
  await server.register(vaultRoutesPlugin);

  return server;
}
