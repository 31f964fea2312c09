// Logs module barrel export.

export { AuditLog, isIngestRecord } from './audit-log.js';
export type { AuditEvent, AuditLookup } from './audit-log.js';
export { IntegrityLog } from './integrity-log.js';
export { JsonlFile, isNotFoundError } from './jsonl-file.js';
export type { JsonlFileOptions } from './jsonl-file.js';
export { withFileLock } from './file-lock.js';

export {
  AuditRecordSchema,
  IntegrityCheckRecordSchema,
  IntegrityLogRecordSchema,
  IntegritySummaryRecordSchema,
} from './types.js';
export type {
  AuditOperation,
  AuditRecord,
  IngestRecord,
  IntegrityCheckRecord,
  IntegrityCheckStatus,
  IntegrityFatalRecord,
  IntegrityLogRecord,
  IntegritySummaryRecord,
} from './types.js';
