// Record types for the two append-only JSON-lines logs.
//
// Field names are snake_case because these objects are the on-disk format.

import { z } from 'zod';

import { isDigest } from '../integrity/digest.js';

const DigestSchema = z.string().refine(isDigest, 'Expected a hex SHA-256 digest');

// ---------------------------------------------------------------------------
// Audit log (ingest / retrieve)
// ---------------------------------------------------------------------------

export const AuditRecordSchema = z.object({
  /** ISO-8601 UTC */
  timestamp: z.string(),
  operation: z.enum(['ingest', 'retrieve']),
  filename: z.string(),
  /** Null when a retrieve found no blob to hash */
  content_digest: DigestSchema.nullable(),
  vault_id: z.string(),
  status: z.enum(['success', 'failed']),
  error: z.string().optional(),
});

export type AuditRecord = z.infer<typeof AuditRecordSchema>;
export type AuditOperation = AuditRecord['operation'];

/** Successful ingest record; `content_digest` is always present. */
export interface IngestRecord extends AuditRecord {
  operation: 'ingest';
  status: 'success';
  content_digest: string;
}

// ---------------------------------------------------------------------------
// Integrity-check trail
// ---------------------------------------------------------------------------

export const IntegrityCheckStatusSchema = z.enum(['verified', 'corrupted', 'failed', 'error']);
export type IntegrityCheckStatus = z.infer<typeof IntegrityCheckStatusSchema>;

export const IntegrityCheckRecordSchema = z.object({
  check_type: z.literal('integrity_verification'),
  timestamp: z.string(),
  vault_id: z.string(),
  filename: z.string(),
  status: IntegrityCheckStatusSchema,
  original_digest: DigestSchema,
  current_digest: DigestSchema.nullable(),
  /** Null whenever no current digest could be computed */
  match: z.boolean().nullable(),
  error: z.string().optional(),
});

export const IntegritySummaryRecordSchema = z.object({
  check_type: z.literal('integrity_summary'),
  timestamp: z.string(),
  total_files: z.number().int().min(0),
  verified_files: z.number().int().min(0),
  failed_files: z.number().int().min(0),
  duration_seconds: z.number().min(0),
});

export const IntegrityFatalRecordSchema = z.object({
  check_type: z.literal('fatal_error'),
  timestamp: z.string(),
  error: z.string(),
});

export const IntegrityLogRecordSchema = z.discriminatedUnion('check_type', [
  IntegrityCheckRecordSchema,
  IntegritySummaryRecordSchema,
  IntegrityFatalRecordSchema,
]);

export type IntegrityCheckRecord = z.infer<typeof IntegrityCheckRecordSchema>;
export type IntegritySummaryRecord = z.infer<typeof IntegritySummaryRecordSchema>;
export type IntegrityFatalRecord = z.infer<typeof IntegrityFatalRecordSchema>;
export type IntegrityLogRecord = z.infer<typeof IntegrityLogRecordSchema>;
