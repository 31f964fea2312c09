import type { FastifyError } from 'fastify';

import {
  VaultNotFoundError,
  VaultPayloadTooLargeError,
  VaultStorageError,
  VaultValidationError,
} from '../errors/index.js';
import type { VaultFailure } from '../vault/types.js';

/** Map a service failure to the error the error-handler plugin renders. */
export function toHttpError(failure: VaultFailure): FastifyError {
  switch (failure.kind) {
    case 'validation':
      return new VaultValidationError(failure.message);
    case 'too_large':
      return new VaultPayloadTooLargeError(failure.limitBytes);
    case 'not_found':
      return new VaultNotFoundError(failure.message);
    case 'storage':
      return new VaultStorageError(failure.message);
  }
}
