/**
 * Bounded exponential backoff for oracle calls
 */

import { ErrorCodes, SchedulerError } from './error.js';
import type { Logger } from './logger.js';

export interface RetryOptions {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Delay before the second attempt; doubles each time */
  baseDelayMs: number;
  /** Which failures are worth another attempt (default: quota errors) */
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

export function isQuotaError(error: unknown): boolean {
  return error instanceof SchedulerError && error.code === ErrorCodes.QUOTA_EXCEEDED;
}

export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const isRetryable = opts.isRetryable ?? isQuotaError;
  const sleep = opts.sleep ?? defaultSleep;
  const attempts = Math.max(1, opts.maxAttempts);

  let lastError: unknown;
  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!isRetryable(error) || attempt === attempts - 1) break;
      const delay = opts.baseDelayMs * 2 ** attempt;
      opts.logger?.warn(`Quota hit, retrying in ${delay} ms (attempt ${attempt + 2}/${attempts})`);
      await sleep(delay);
    }
  }
  throw lastError;
}
