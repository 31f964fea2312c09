/** Raised when a blob store call exceeds its time budget. */
export class StorageTimeoutError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'StorageTimeoutError';
  }
}

/**
 * Race `task` against a timer. The timer is cleared as soon as the task
 * settles so it never keeps the process alive.
 */
export async function withTimeout<T>(
  task: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new StorageTimeoutError(operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([task, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
