import { AdapterError, AdapterErrorCode, toAdapterError, type AdapterName } from "./errors.js";
import { logWarn } from "./logger.js";

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Race a call against a deadline. A call that misses its deadline becomes an
 * AdapterError with code TIMEOUT; the underlying promise is left to settle on
 * its own.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  adapter: AdapterName,
  label: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        new AdapterError({
          adapter,
          code: AdapterErrorCode.TIMEOUT,
          message: `${label} timed out after ${ms}ms`,
        })
      );
    }, ms);
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

/**
 * Run `fn` with bounded exponential backoff. Only retryable adapter errors
 * (timeout, rate limit, network, unavailable) are retried; the last error is
 * rethrown as an AdapterError.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  adapter: AdapterName,
  label: string,
  wait: Sleep = sleep
): Promise<T> {
  let lastError: AdapterError | undefined;

  for (let attempt = 1; attempt <= policy.attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = toAdapterError(adapter, error);
      if (!lastError.retryable || attempt === policy.attempts) break;

      const delay = backoffDelay(attempt, policy);
      logWarn(
        `${label} failed (${lastError.code}), retry ${attempt}/${policy.attempts - 1} in ${delay}ms`
      );
      await wait(delay);
    }
  }

  throw lastError ?? new AdapterError({ adapter, code: AdapterErrorCode.UNKNOWN, message: `${label} failed` });
}
