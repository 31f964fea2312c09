// Blob store interface.
//
// Blobs are opaque byte buffers addressed by the composite key
// `{vault_id}/{filename}`. Failures are data, not exceptions: implementations
// catch and log transport errors and return a tagged result, so callers never
// see a raw backend exception.

export type PutResult = { ok: true } | { ok: false; reason: 'storage_error'; message: string };

export type GetResult =
  | { ok: true; data: Buffer }
  | { ok: false; reason: 'not_found' }
  | { ok: false; reason: 'storage_error'; message: string };

export interface BlobStore {
  /** Store `data` under `vaultId/filename` with private access */
  put(vaultId: string, filename: string, data: Buffer): Promise<PutResult>;

  /** Read the blob back; absence is `not_found`, never an exception */
  get(vaultId: string, filename: string): Promise<GetResult>;

  /** Connectivity probe -- returns true if the backend is reachable */
  healthy(): Promise<boolean>;
}

/**
 * Key segments must be a single path component: no separators, no `.` or
 * `..`, nothing empty. Both backends refuse keys that fail this check.
 */
export function isSafeKeySegment(segment: string): boolean {
  return (
    segment.length > 0 &&
    segment !== '.' &&
    segment !== '..' &&
    !/[/\\\0]/.test(segment)
  );
}
