import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';

import { createServer } from '@/server.js';
import { FsBlobStore } from '@/storage/fs-backend.js';

import { createTestConfig } from '../helpers/test-config.js';

describe('Server Integration', () => {
  let server: FastifyInstance;
  let testDir: string;

  beforeAll(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'vault-server-'));
    // No storage override: the filesystem backend is built from config
    server = await createServer({ config: createTestConfig(testDir) });
    await server.listen({ port: 0, host: '127.0.0.1' });
  });

  afterAll(async () => {
    await server.close();
    await rm(testDir, { recursive: true, force: true });
  });

  it('should build the storage backend named in config', () => {
    expect(server.storage).toBeInstanceOf(FsBlobStore);
  });

  it('should have security headers from helmet', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/nonexistent',
    });

    // Helmet sets these headers
    expect(response.headers['x-dns-prefetch-control']).toBe('off');
    expect(response.headers['x-frame-options']).toBe('SAMEORIGIN');
    expect(response.headers['x-content-type-options']).toBe('nosniff');
  });

  it('should return request ID in error responses', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/nonexistent',
      headers: {
        'x-request-id': 'test-request-123',
      },
    });

    const body = JSON.parse(response.body);
    expect(body.requestId).toBe('test-request-123');
  });

  it('should generate request ID if not provided', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/nonexistent',
    });

    const body = JSON.parse(response.body);
    expect(body.requestId).toMatch(/^[0-9a-f-]{36}$/); // UUID format
  });

  it('should return 404 for unknown routes', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/unknown-route',
    });

    expect(response.statusCode).toBe(404);
  });

  it('should include timestamp in error responses', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/nonexistent',
    });

    const body = JSON.parse(response.body);
    expect(new Date(body.timestamp).getTime()).not.toBeNaN();
  });

  it('should report healthy storage', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json().dependencies.storage.status).toBe('up');
  });

  it('should serve the OpenAPI document', async () => {
    const response = await server.inject({ method: 'GET', url: '/docs/json' });

    expect(response.statusCode).toBe(200);
    const paths = Object.keys(response.json().paths);
    expect(paths).toEqual(
      expect.arrayContaining(['/ingest', '/vault/{vaultId}', '/vault/{vaultId}/verify'])
    );
  });
});
