import { setTimeout as delay } from "node:timers/promises";
import { isRetryable as defaultIsRetryable } from "./errors";
import type { Logger } from "./logger";

export interface RetryOptions {
  attempts: number;
  backoffMs: number;
  label: string;
  logger: Logger;
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Runs `fn` up to `attempts` times with a fixed pause between attempts.
 * Errors the predicate rejects are rethrown at once; the last retryable
 * error is rethrown once attempts run out.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  const retryable = options.isRetryable ?? defaultIsRetryable;
  const sleep = options.sleep ?? delay;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!retryable(err) || attempt >= attempts) {
        throw err;
      }
      options.logger
        .with()
        .str("operation", options.label)
        .num("attempt", attempt)
        .num("maxAttempts", attempts)
        .error(err)
        .logger()
        .warn(`Attempt ${attempt} of ${options.label} failed; retrying`);
      await sleep(options.backoffMs);
    }
  }
}
