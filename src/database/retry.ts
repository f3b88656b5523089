import { PersistenceError, SyncCancelledError } from '../types/errors';
import { logger } from '../utils/logger';
import { formatError, sleep } from '../utils/util';

export interface PersistenceRetryPolicy {
  maxRetries: number;
  retryDelayMs: number;
}

/**
 * Runs a write, retrying with a linearly growing delay. Once the retries are
 * spent the last failure is wrapped in a PersistenceError.
 */
export async function withPersistenceRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  policy: PersistenceRetryPolicy,
  signal?: AbortSignal
): Promise<T> {
  let lastError: unknown = null;
  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof SyncCancelledError) {
        throw error;
      }
      lastError = error;
      if (attempt < policy.maxRetries) {
        const delay = policy.retryDelayMs * (attempt + 1);
        logger.warn(`[Persistence] ${operation} failed (attempt ${attempt + 1}/${policy.maxRetries + 1}): ${formatError(error)}. Retrying in ${delay}ms`);
        await sleep(delay, signal);
      }
    }
  }
  throw new PersistenceError(operation, lastError);
}
