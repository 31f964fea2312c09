import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

import type { BlobStore } from '../storage/types.js';

export const SERVICE_NAME = 'vault-relay';

// Read version once at startup (not on every request)
const packageJson = JSON.parse(readFileSync(resolve(process.cwd(), 'package.json'), 'utf-8')) as {
  version: string;
};
const APP_VERSION = packageJson.version;

interface ServiceInfoResponse {
  status: 'operational';
  service: string;
  version: string;
  timestamp: string;
}

interface DependencyStatus {
  status: 'up' | 'down';
  latency?: number;
  error?: string;
}

interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  dependencies: Record<string, DependencyStatus>;
}

async function checkStorage(storage: BlobStore): Promise<DependencyStatus> {
  const start = Date.now();
  try {
    const healthy = await storage.healthy();
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
  fastify.get<{ Reply: ServiceInfoResponse }>('/', async (_request, reply) => {
    return reply.send({
      status: 'operational',
      service: SERVICE_NAME,
      version: APP_VERSION,
      timestamp: new Date().toISOString(),
    });
  });

  fastify.get<{ Reply: HealthResponse }>('/health', async (_request, reply) => {
    const storageStatus = await checkStorage(fastify.storage);

    const response: HealthResponse = {
      status: storageStatus.status === 'up' ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      version: APP_VERSION,
      uptime: process.uptime(),
      dependencies: { storage: storageStatus },
    };

    return reply.status(response.status === 'healthy' ? 200 : 503).send(response);
  });

  done();
};

export const healthRoutesPlugin = fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
