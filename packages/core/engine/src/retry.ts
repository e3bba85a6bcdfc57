import { setTimeout as sleep } from 'node:timers/promises';

export interface RetryConfig {
  attempts: number;
  minDelayMs: number;
  maxDelayMs: number;
  jitter: number;
}

export function getRetryConfig(config?: Partial<RetryConfig>): RetryConfig {
  return {
    attempts: config?.attempts ?? 2,
    minDelayMs: config?.minDelayMs ?? 500,
    maxDelayMs: config?.maxDelayMs ?? 5000,
    jitter: config?.jitter ?? 0.1,
  };
}

export function backoffDelay(attempt: number, config: RetryConfig, random: () => number = Math.random): number {
  const backoff = Math.min(config.minDelayMs * Math.pow(2, attempt - 1), config.maxDelayMs);
  return backoff + backoff * config.jitter * random();
}

/**
 * Run `fn` until it succeeds, `shouldRetry` rejects the error, attempts run
 * out, or `signal` aborts. The last error is rethrown.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig,
  shouldRetry: (error: unknown) => boolean,
  signal?: AbortSignal
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= config.attempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error) || attempt >= config.attempts || signal?.aborted) {
        break;
      }
      try {
        await sleep(backoffDelay(attempt, config), undefined, { signal });
      } catch (error) {
        if (signal?.aborted) break;
        throw error;
      }
    }
  }
  throw lastError;
}
