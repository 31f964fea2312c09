/**
 * Cross-process file locking using proper-lockfile.
 *
 * The lock is a `<path>.lock` directory beside the target, so the target file
 * itself does not have to exist yet.
 */
import lockfile, { type LockOptions } from 'proper-lockfile';

const DEFAULT_OPTIONS: LockOptions = {
  stale: 30000, // Consider lock stale after 30 seconds
  realpath: false,
  retries: {
    retries: 10,
    minTimeout: 50,
    maxTimeout: 1000,
  },
};

/**
 * Execute a function while holding an exclusive lock on a file
 *
 * @param path - Path to the file to lock
 * @param fn - Function to execute while holding the lock
 * @param options - Optional lock options to override defaults
 * @returns The result of the function
 */
export async function withFileLock<T>(
  path: string,
  fn: () => Promise<T>,
  options?: Partial<LockOptions>
): Promise<T> {
  const release = await lockfile.lock(path, { ...DEFAULT_OPTIONS, ...options });
  try {
    return await fn();
  } finally {
    await release();
  }
}
