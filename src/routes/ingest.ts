// POST /ingest route -- store an uploaded file in the vault.
//
// Flow: client sends multipart file -> filename sanitized -> digest computed ->
// blob stored under a fresh vault id -> audit record appended -> vault id returned.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

// Import for type augmentation -- adds request.file() to FastifyRequest
import '@fastify/multipart';

import { toHttpError } from './failures.js';
import { ErrorResponseSchema } from './schemas.js';
import { VaultPayloadTooLargeError, VaultValidationError } from '../errors/index.js';

/** Multipart envelope allowance on top of the file itself. */
const MULTIPART_OVERHEAD_BYTES = 64 * 1024;

function isFileTooLargeError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'FST_REQ_FILE_TOO_LARGE'
  );
}

const ingestRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const { maxUploadBytes } = fastify.config.vault;

  fastify.post(
    '/ingest',
    {
      schema: {
        description: 'Upload a file (multipart/form-data, field "file") into the vault',
        tags: ['Vault'],
        response: {
          201: z.object({
            status: z.literal('success'),
            vault_id: z.string(),
            filename: z.string(),
            content_digest: z.string(),
            file_size: z.number(),
            timestamp: z.string(),
          }),
          400: ErrorResponseSchema,
          413: ErrorResponseSchema,
          500: ErrorResponseSchema,
        },
      },
      config: {
        rateLimit: {
          max: fastify.config.rateLimit.sensitive,
          timeWindow: fastify.config.rateLimit.windowMs,
        },
      },
      bodyLimit: maxUploadBytes + MULTIPART_OVERHEAD_BYTES,
    },
    async (request, reply) => {
      // 1. Parse multipart file upload
      let upload: { filename: string; data: Buffer } | undefined;
      try {
        const file = await request.file({ limits: { fileSize: maxUploadBytes, files: 1 } });
        if (file && file.fieldname === 'file') {
          upload = { filename: file.filename, data: await file.toBuffer() };
        }
      } catch (error) {
        if (isFileTooLargeError(error)) {
          throw new VaultPayloadTooLargeError(maxUploadBytes);
        }
        request.log.warn(
          { err: error instanceof Error ? error.message : 'Unknown error' },
          'File upload parsing failed'
        );
        throw new VaultValidationError('Failed to parse file upload');
      }

      if (!upload) {
        throw new VaultValidationError(
          'No file provided. Send a multipart/form-data request with a "file" field.'
        );
      }

      // 2. Hash, store and record
      const result = await fastify.vault.ingest(upload.filename, upload.data);
      if (!result.ok) {
        throw toHttpError(result.failure);
      }

      const entry = result.value;
      return reply.status(201).header('X-Vault-Id', entry.vaultId).send({
        status: 'success' as const,
        vault_id: entry.vaultId,
        filename: entry.filename,
        content_digest: entry.contentDigest,
        file_size: entry.size,
        timestamp: entry.createdAt,
      });
    }
  );

  done();
};

export const ingestRoutesPlugin = fp(ingestRoutes, {
  name: 'ingest-routes',
  fastify: '5.x',
});
