/**
 * Retry with exponential backoff + jitter for market-data calls.
 *
 * delay = min(base * 2^attempt, maxDelay) * (1 ± jitter)
 */

import { errorMessage } from "./_core/errors";

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number; // 0.3 = ±30%
}

export const RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 2000,
  maxDelayMs: 30000,
  jitterFactor: 0.3,
};

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export function calculateBackoffDelay(
  attempt: number,
  config: RetryConfig = RETRY_CONFIG,
  random: () => number = Math.random
): number {
  const exponentialDelay = Math.min(
    config.baseDelayMs * Math.pow(2, attempt),
    config.maxDelayMs
  );
  const jitter = 1 + (random() * 2 - 1) * config.jitterFactor;
  return Math.round(exponentialDelay * jitter);
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const sleep: SleepFn = (ms, signal) =>
  new Promise(resolve => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number; errors: string[] }
  | { ok: false; attempts: number; errors: string[]; aborted: boolean };

export interface RetryOptions {
  config?: RetryConfig;
  sleep?: SleepFn;
  signal?: AbortSignal;
  tag?: string;
}

/**
 * Runs `fn` up to maxRetries + 1 times. Never throws: the outcome carries
 * every attempt's error so callers can report it.
 */
export async function withRetry<T>(
  label: string,
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryOutcome<T>> {
  const config = options.config ?? RETRY_CONFIG;
  const wait = options.sleep ?? sleep;
  const tag = options.tag ?? "Retry";
  const errors: string[] = [];
  const maxAttempts = config.maxRetries + 1;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      return { ok: false, attempts: attempt, errors, aborted: true };
    }
    if (attempt > 0) {
      const delay = calculateBackoffDelay(attempt - 1, config);
      console.log(`[${tag}] ⟳ Retry ${attempt}/${config.maxRetries} for ${label} (backoff: ${delay}ms)...`);
      await wait(delay, options.signal);
      if (options.signal?.aborted) {
        return { ok: false, attempts: attempt, errors, aborted: true };
      }
    }

    try {
      const value = await fn();
      return { ok: true, value, attempts: attempt + 1, errors };
    } catch (error) {
      const message = errorMessage(error);
      errors.push(message);
      console.warn(`[${tag}] ${label} attempt ${attempt + 1}/${maxAttempts} failed: ${message}`);
    }
  }

  console.error(`[${tag}] ✗ ${label} failed after ${maxAttempts} attempts`);
  return { ok: false, attempts: maxAttempts, errors, aborted: false };
}
