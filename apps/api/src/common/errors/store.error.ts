// src/common/errors/store.error.ts

/**
 * Persistence failure wrapped with the operation that failed. Not an
 * HttpException, so the framework answers an opaque 500 and logs the cause.
 */
export class StoreError extends Error {
  constructor(operation: string, cause: unknown) {
    super(`failed to ${operation}`, { cause });
    this.name = 'StoreError';
  }
}

/** Await `run`, rethrowing any failure as a StoreError for `operation`. */
export async function wrapStore<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err: unknown) {
    throw new StoreError(operation, err);
  }
}
