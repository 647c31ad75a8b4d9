import { setTimeout as delay } from "node:timers/promises";

export type RetryConfig = {
  retries: number;
  backoffMs: number;
  onRetry?: (attempt: number, error: unknown) => void;
  sleep?: (ms: number) => Promise<unknown>;
};

/**
 * Calls `fn` until it resolves or `retries` extra attempts are used up,
 * doubling the wait after each failure. The last error is rethrown.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig
): Promise<T> {
  const sleep = config.sleep ?? delay;
  let attempt = 0;
  let lastError: unknown;

  while (attempt <= config.retries) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === config.retries) break;
      config.onRetry?.(attempt + 1, error);
      const wait = config.backoffMs * Math.pow(2, attempt);
      await sleep(wait);
      attempt += 1;
    }
  }

  throw lastError;
}
