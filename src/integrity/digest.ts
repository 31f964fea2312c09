// Content hasher.
//
// SHA-256 over the full byte sequence, hex encoded. The digest recorded at
// ingest time is the ground truth every later check compares against.

import { createHash } from 'node:crypto';

/** Length of a hex-encoded SHA-256 digest. */
export const DIGEST_HEX_LENGTH = 64;

const DIGEST_PATTERN = /^[a-f0-9]{64}$/;

export function computeDigest(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

/** True for a lowercase hex string of digest length. */
export function isDigest(value: string): boolean {
  return DIGEST_PATTERN.test(value);
}
