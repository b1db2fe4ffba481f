/**
 * Retry helper for transient network failures
 */

import { TransientError, toErrorMessage } from './errors';
import { AppLogger } from './logger';

export interface RetryOptions {
  /** Name used in log lines */
  label: string;
  /** Total attempts including the first one */
  attempts?: number;
  /** Backoff unit; attempt N waits delayMs * N */
  delayMs?: number;
  isRetryable?: (error: unknown) => boolean;
}

const TRANSIENT_PATTERNS = [
  /net::ERR_/,
  /ECONNRESET/,
  /ECONNREFUSED/,
  /ETIMEDOUT/,
  /ENOTFOUND/,
  /EAI_AGAIN/,
  /socket hang up/i,
  /Navigation timeout/i,
];

/**
 * Whether an error looks like a network hiccup rather than a real failure
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TransientError) {
    return true;
  }
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === 'TimeoutError') {
    return true;
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
  return TRANSIENT_PATTERNS.some(pattern => pattern.test(error.message) || pattern.test(code));
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute an async operation, retrying once (by default) on transient errors
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { label, attempts = 2, delayMs = 2000, isRetryable = isTransientError } = options;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;

      if (isRetryable(error) && attempt < attempts) {
        const delay = delayMs * attempt;
        AppLogger.warn(
          `${label} failed with transient error (${toErrorMessage(error)}), retrying in ${delay}ms (attempt ${attempt}/${attempts})`
        );
        await sleep(delay);
        continue;
      }

      throw error;
    }
  }

  throw lastError;
}
