import type { BackendCallConfig } from "./config";
import { BackendTimeoutError, RateLimitedError } from "./errors";
import { isRetryableBackendError, toBackendError } from "./backend-errors";
import { safeErrorForLog } from "./log-format";

export function delay(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Exponential backoff: base, 2·base, 4·base … capped at maxDelayMs. */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(maxDelayMs, baseDelayMs * 2 ** exponent);
}

export async function withTimeout<T>(task: () => Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new BackendTimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([task(), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export type RetryOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  label: string;
  isRetryable?: (error: unknown) => boolean;
};

export async function withRetry<T>(task: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const isRetryable = options.isRetryable ?? isRetryableBackendError;
  let attempt = 0;
  for (;;) {
    attempt += 1;
    try {
      return await task(attempt);
    } catch (error) {
      if (attempt >= options.maxAttempts || !isRetryable(error)) throw error;
      const suggested = error instanceof RateLimitedError ? error.retryAfterMs : null;
      const wait = Math.min(
        options.maxDelayMs,
        Math.max(suggested ?? 0, backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs))
      );
      console.warn(`[retry] ${options.label} failed; retrying`, {
        attempt,
        maxAttempts: options.maxAttempts,
        waitMs: wait,
        error: safeErrorForLog(error),
      });
      if (wait > 0) await delay(wait);
    }
  }
}

/**
 * Run one backend call with the configured timeout and bounded backoff.
 * Whatever escapes is already mapped onto the backend error taxonomy.
 */
export async function callBackend<T>(
  task: () => Promise<T>,
  config: BackendCallConfig,
  label: string
): Promise<T> {
  try {
    return await withRetry(
      () =>
        withTimeout(async () => {
          try {
            return await task();
          } catch (error) {
            throw toBackendError(error, label);
          }
        }, config.timeoutMs, label),
      {
        maxAttempts: config.maxAttempts,
        baseDelayMs: config.baseDelayMs,
        maxDelayMs: config.maxDelayMs,
        label,
      }
    );
  } catch (error) {
    throw toBackendError(error, label);
  }
}
