import createError from '@fastify/error';

// Configuration errors (CONFIG_*)
export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s',
  500
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s',
  500
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s',
  500
);

// Vault errors (VAULT_*) - routes throw these for service failures and the
// error-handler plugin renders them.

/** Bad filename, bad vault id or a missing required field (400) */
export const VaultValidationError = createError<[string]>('VAULT_VALIDATION', '%s', 400);

/** Upload exceeds the configured payload limit (413) */
export const VaultPayloadTooLargeError = createError<[number]>(
  'VAULT_PAYLOAD_TOO_LARGE',
  'File exceeds the maximum upload size of %d bytes',
  413
);

/** Blob or audit record absent (404) */
export const VaultNotFoundError = createError<[string]>('VAULT_NOT_FOUND', '%s', 404);

/** Blob store unreachable or rejected the call (500, generic message only) */
export const VaultStorageError = createError<[string]>('VAULT_STORAGE_ERROR', '%s', 500);
