/**
 * Single local retry of transient store failures
 */

import { setTimeout as delay } from 'node:timers/promises';
import { StoreUnavailableError } from '../realtime/errors';

export interface RetryOptions {
  backoffMs: number;
  isTransient: (error: unknown) => boolean;
  onRetry?: (error: unknown) => void;
}

/**
 * Run `fn`; on a transient failure wait `backoffMs` and run it once more.
 * A second transient failure surfaces as StoreUnavailableError, any other
 * failure is rethrown unchanged.
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  try {
    return await fn();
  } catch (error: unknown) {
    if (!options.isTransient(error)) {
      throw error;
    }
    options.onRetry?.(error);
  }

  await delay(options.backoffMs);

  try {
    return await fn();
  } catch (error: unknown) {
    if (options.isTransient(error)) {
      throw new StoreUnavailableError(operation, error);
    }
    throw error;
  }
}
