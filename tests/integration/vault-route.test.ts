import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { createServer } from '@/server.js';

import { MemoryBlobStore } from '../helpers/memory-blob-store.js';
import { createMultipartBody, createTestConfig } from '../helpers/test-config.js';

const HELLO_DIGEST = '89a7e6eabbc4c9477277ec9b246c6417dc352e69418bf3ef4d75e9c19bbbedd6';
const TAMPERED_DIGEST = 'd121be3103007b41edf96f8262925f8c7d61894afe9a041843b631f69445bc57';
const UNKNOWN_ID = '7c9e6679-7425-40de-944b-e07fc1f90ae7';

describe('Vault routes', () => {
  let server: FastifyInstance;
  let storage: MemoryBlobStore;
  let testDir: string;
  let vaultId: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'vault-route-'));
    storage = new MemoryBlobStore();
    server = await createServer({ config: createTestConfig(testDir), storage });
    await server.ready();

    const { body, boundary } = createMultipartBody('note.txt', Buffer.from('hello12345'));
    const response = await server.inject({
      method: 'POST',
      url: '/ingest',
      headers: { 'content-type': `multipart/form-data; boundary=${boundary}` },
      payload: body,
    });
    vaultId = response.json().vault_id;
  });

  afterEach(async () => {
    await server.close();
    await rm(testDir, { recursive: true, force: true });
  });

  describe('GET /vault/:vaultId', () => {
    it('should download the stored bytes as an attachment', async () => {
      const response = await server.inject({
        method: 'GET',
        url: `/vault/${vaultId}?filename=note.txt`,
      });

      expect(response.statusCode).toBe(200);
      expect(response.body).toBe('hello12345');
      expect(response.headers['content-type']).toBe('application/octet-stream');
      expect(response.headers['content-disposition']).toBe('attachment; filename="note.txt"');
      expect(response.headers['content-length']).toBe('10');
      expect(response.headers['x-content-digest']).toBe(HELLO_DIGEST);
      expect(response.headers['x-vault-id']).toBe(vaultId);
    });

    it('should log the retrieval', async () => {
      await server.inject({ method: 'GET', url: `/vault/${vaultId}?filename=note.txt` });

      const records = await server.auditLog.readAll();
      expect(records).toHaveLength(2);
      expect(records[1]).toMatchObject({
        operation: 'retrieve',
        vault_id: vaultId,
        filename: 'note.txt',
        content_digest: HELLO_DIGEST,
        status: 'success',
      });
    });

    it('should return metadata only when asked', async () => {
      const response = await server.inject({
        method: 'GET',
        url: `/vault/${vaultId}?metadata_only=TRUE`,
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        vault_id: vaultId,
        filename: 'note.txt',
        content_digest: HELLO_DIGEST,
        timestamp: expect.any(String),
        status: 'success',
      });
      expect(await server.auditLog.readAll()).toHaveLength(1);
    });

    it('should serve tampered bytes without comparing digests', async () => {
      storage.tamper(vaultId, 'note.txt', Buffer.from('tampered'));

      const response = await server.inject({
        method: 'GET',
        url: `/vault/${vaultId}?filename=note.txt`,
      });

      expect(response.statusCode).toBe(200);
      expect(response.body).toBe('tampered');
      expect(response.headers['x-content-digest']).toBe(TAMPERED_DIGEST);
    });

    it('should reject a malformed vault id', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/vault/not-a-uuid?filename=note.txt',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toMatchObject({
        code: 'VAULT_VALIDATION',
        message: 'Invalid vault ID format',
      });
    });

    it('should reject the upper-case form of a stored vault id', async () => {
      const response = await server.inject({
        method: 'GET',
        url: `/vault/${vaultId.toUpperCase()}?filename=note.txt`,
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.message).toBe('Invalid vault ID format');
      expect(response.headers['x-vault-id']).toBeUndefined();
    });

    it('should require a filename for downloads', async () => {
      const response = await server.inject({ method: 'GET', url: `/vault/${vaultId}` });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.message).toBe('Filename required for file retrieval');
    });

    it('should return 404 for an unknown vault id', async () => {
      const response = await server.inject({
        method: 'GET',
        url: `/vault/${UNKNOWN_ID}?filename=note.txt`,
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().error).toMatchObject({
        code: 'VAULT_NOT_FOUND',
        message: 'File not found in vault',
      });
    });

    it('should return 404 for metadata of an unknown vault id', async () => {
      const response = await server.inject({
        method: 'GET',
        url: `/vault/${UNKNOWN_ID}?metadata_only=true`,
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().error.message).toBe('Vault ID not found');
    });
  });

  describe('GET /vault/:vaultId/verify', () => {
    it('should confirm untouched content', async () => {
      const response = await server.inject({
        method: 'GET',
        url: `/vault/${vaultId}/verify?filename=note.txt`,
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        vault_id: vaultId,
        filename: 'note.txt',
        original_hash: HELLO_DIGEST,
        current_hash: HELLO_DIGEST,
        integrity_verified: true,
        file_size: 10,
        timestamp: expect.any(String),
      });
    });

    it('should give the same verdict when an untouched entry is verified twice', async () => {
      const url = `/vault/${vaultId}/verify?filename=note.txt`;

      const first = await server.inject({ method: 'GET', url });
      const second = await server.inject({ method: 'GET', url });

      expect(first.statusCode).toBe(200);
      expect(second.statusCode).toBe(200);
      const firstReport = first.json();
      const secondReport = second.json();
      delete firstReport.timestamp;
      delete secondReport.timestamp;
      expect(secondReport).toEqual(firstReport);
      expect(secondReport).toMatchObject({
        original_hash: HELLO_DIGEST,
        current_hash: HELLO_DIGEST,
        integrity_verified: true,
      });
      expect(second.headers['x-vault-id']).toBe(vaultId);
    });

    it('should report tampering with 200 and integrity_verified false', async () => {
      storage.tamper(vaultId, 'note.txt', Buffer.from('tampered'));

      const response = await server.inject({
        method: 'GET',
        url: `/vault/${vaultId}/verify?filename=note.txt`,
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        original_hash: HELLO_DIGEST,
        current_hash: TAMPERED_DIGEST,
        integrity_verified: false,
        file_size: 8,
      });
    });

    it('should require a filename', async () => {
      const response = await server.inject({ method: 'GET', url: `/vault/${vaultId}/verify` });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.message).toBe('Filename required for verification');
    });

    it('should return 404 when the blob is gone', async () => {
      storage.remove(vaultId, 'note.txt');

      const response = await server.inject({
        method: 'GET',
        url: `/vault/${vaultId}/verify?filename=note.txt`,
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().error.message).toBe('File not found in vault');
    });

    it('should return 404 when no ingest record exists', async () => {
      storage.tamper(UNKNOWN_ID, 'note.txt', Buffer.from('orphan'));

      const response = await server.inject({
        method: 'GET',
        url: `/vault/${UNKNOWN_ID}/verify?filename=note.txt`,
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().error.message).toBe('Original digest not found in audit log');
    });
  });
});
