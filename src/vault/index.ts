// Vault module barrel export.

export { VaultService } from './vault-service.js';
export type { VaultServiceOptions } from './vault-service.js';
export { sanitizeFilename, isSanitizedFilename } from './filename.js';
export { generateVaultId, isValidVaultId } from './vault-id.js';
export { failure, success } from './types.js';
export type {
  RetrievedBlob,
  VaultEntry,
  VaultFailure,
  VaultMetadata,
  VaultResult,
  VerificationReport,
} from './types.js';
