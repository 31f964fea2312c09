// Response schemas shared by the vault routes.

import { z } from 'zod';

/** Body written by the error-handler plugin for every thrown error. */
export const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    statusCode: z.number(),
    stack: z.string().optional(),
  }),
  requestId: z.string(),
  timestamp: z.string(),
});

export const VaultIdParamsSchema = z.object({
  vaultId: z.string().describe('Vault ID (UUID) returned by POST /ingest'),
});

export interface VaultIdParams {
  vaultId: string;
}
