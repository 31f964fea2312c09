// GET /vault/:vaultId and GET /vault/:vaultId/verify routes.
//
// Retrieval serves the stored bytes even when they no longer match the digest
// recorded at ingest; the verify route is the only place digests are compared.
// X-Vault-Id echoes only ids the service has validated.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

import { toHttpError } from './failures.js';
import { ErrorResponseSchema, VaultIdParamsSchema } from './schemas.js';
import type { VaultIdParams } from './schemas.js';

interface RetrieveQuery {
  filename?: string;
  metadata_only?: string;
}

interface VerifyQuery {
  filename?: string;
}

const vaultRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Params: VaultIdParams; Querystring: RetrieveQuery }>(
    '/vault/:vaultId',
    {
      schema: {
        description:
          'Download a stored file as an attachment, or its ingest metadata with metadata_only=true',
        tags: ['Vault'],
        params: VaultIdParamsSchema,
        querystring: z.object({
          filename: z.string().optional().describe('Stored filename (required for download)'),
          metadata_only: z.string().optional().describe('"true" to return metadata only'),
        }),
        response: {
          200: z
            .object({
              vault_id: z.string(),
              filename: z.string(),
              content_digest: z.string(),
              timestamp: z.string(),
              status: z.literal('success'),
            })
            .describe('Metadata (metadata_only=true); otherwise application/octet-stream'),
          400: ErrorResponseSchema,
          404: ErrorResponseSchema,
          500: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { vaultId } = request.params;
      const { filename, metadata_only: metadataOnly } = request.query;

      if (metadataOnly?.toLowerCase() === 'true') {
        const result = await fastify.vault.getMetadata(vaultId);
        if (!result.ok) {
          throw toHttpError(result.failure);
        }
        const metadata = result.value;
        return reply.status(200).header('X-Vault-Id', metadata.vaultId).send({
          vault_id: metadata.vaultId,
          filename: metadata.filename,
          content_digest: metadata.contentDigest,
          timestamp: metadata.createdAt,
          status: metadata.status,
        });
      }

      const result = await fastify.vault.retrieve(vaultId, filename);
      if (!result.ok) {
        throw toHttpError(result.failure);
      }

      const blob = result.value;
      return reply
        .status(200)
        .header('Content-Type', 'application/octet-stream')
        .header('Content-Disposition', `attachment; filename="${blob.filename}"`)
        .header('Content-Length', blob.data.length.toString())
        .header('X-Content-Digest', blob.contentDigest)
        .header('X-Vault-Id', blob.vaultId)
        .send(blob.data);
    }
  );

  fastify.get<{ Params: VaultIdParams; Querystring: VerifyQuery }>(
    '/vault/:vaultId/verify',
    {
      schema: {
        description: 'Re-hash a stored file and compare it with the digest recorded at ingest',
        tags: ['Vault'],
        params: VaultIdParamsSchema,
        querystring: z.object({
          filename: z.string().optional().describe('Stored filename'),
        }),
        response: {
          200: z.object({
            vault_id: z.string(),
            filename: z.string(),
            original_hash: z.string(),
            current_hash: z.string(),
            integrity_verified: z.boolean(),
            file_size: z.number(),
            timestamp: z.string(),
          }),
          400: ErrorResponseSchema,
          404: ErrorResponseSchema,
          500: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const result = await fastify.vault.verify(request.params.vaultId, request.query.filename);
      if (!result.ok) {
        throw toHttpError(result.failure);
      }

      const report = result.value;
      return reply.status(200).header('X-Vault-Id', report.vaultId).send({
        vault_id: report.vaultId,
        filename: report.filename,
        original_hash: report.originalDigest,
        current_hash: report.currentDigest,
        integrity_verified: report.match,
        file_size: report.size,
        timestamp: new Date().toISOString(),
      });
    }
  );

  done();
};

export const vaultRoutesPlugin = fp(vaultRoutes, {
  name: 'vault-routes',
  fastify: '5.x',
});
