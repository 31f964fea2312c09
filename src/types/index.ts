// vault-relay type definitions

import type { Config } from '../config/index.js';
import type { AuditLog } from '../logs/audit-log.js';
import type { BlobStore } from '../storage/types.js';
import type { VaultService } from '../vault/vault-service.js';

// Augment Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    storage: BlobStore;
    auditLog: AuditLog;
    vault: VaultService;
  }
}
