// Integrity module barrel export.

export { computeDigest, isDigest, DIGEST_HEX_LENGTH } from './digest.js';
export { IntegrityAuditor } from './auditor.js';
export type {
  AbortedAuditRun,
  AuditRunReport,
  CompletedAuditRun,
  FatalAuditRun,
  IntegrityAuditorOptions,
  ScheduledAuditReport,
} from './auditor.js';
