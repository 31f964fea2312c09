import { randomUUID } from 'node:crypto';

import { z } from 'zod';

// Storage keys and audit lookups match ids byte for byte, so only the
// lowercase form issued at ingest is accepted.
const VaultIdSchema = z
  .string()
  .uuid()
  .refine((value) => value === value.toLowerCase());

/** Fresh vault id: a random (v4) UUID, 122 random bits. */
export function generateVaultId(): string {
  return randomUUID();
}

/** Canonical hyphenated UUID form, lowercase. */
export function isValidVaultId(value: string): boolean {
  return VaultIdSchema.safeParse(value).success;
}
