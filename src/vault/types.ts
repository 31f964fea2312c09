// Vault domain types.
//
// Every service operation returns a VaultResult: either the success payload
// or one failure kind. A digest mismatch is not a failure; it is reported as
// `match: false` in the verification payload.

/** A stored file as recorded at ingest time. */
export interface VaultEntry {
  vaultId: string;
  filename: string;
  /** SHA-256 hex computed at ingest; never recomputed-and-overwritten */
  contentDigest: string;
  size: number;
  createdAt: string;
}

/** What the audit log knows about an entry (metadata-only retrieval). */
export interface VaultMetadata {
  vaultId: string;
  filename: string;
  contentDigest: string;
  createdAt: string;
  status: 'success';
}

export interface RetrievedBlob {
  vaultId: string;
  filename: string;
  data: Buffer;
  /** Digest of the bytes as served; not compared against the original */
  contentDigest: string;
}

export interface VerificationReport {
  vaultId: string;
  filename: string;
  originalDigest: string;
  currentDigest: string;
  match: boolean;
  size: number;
}

export type VaultFailure =
  | { kind: 'validation'; message: string }
  | { kind: 'too_large'; message: string; limitBytes: number }
  | { kind: 'not_found'; message: string }
  | { kind: 'storage'; message: string };

export type VaultResult<T> = { ok: true; value: T } | { ok: false; failure: VaultFailure };

export function success<T>(value: T): VaultResult<T> {
  return { ok: true, value };
}

export function failure<T>(reason: VaultFailure): VaultResult<T> {
  return { ok: false, failure: reason };
}
