import type { ErrorClass } from "../errors.js";
import type { Logger } from "../logger.js";
import { sleep as defaultSleep } from "./sleep.js";

export interface RetryOptions {
  /** Retries after the first attempt; total attempts = maxRetries + 1. */
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  /** Error classes that trigger a retry. Anything else is rethrown at once. */
  retryOn: readonly ErrorClass[];
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Delay before the retry that follows failed attempt `attempt` (0-based):
 * initialDelayMs * 2^attempt, capped at maxDelayMs.
 */
export function backoffDelay(attempt: number, initialDelayMs: number, maxDelayMs: number): number {
  return Math.min(initialDelayMs * Math.pow(2, attempt), maxDelayMs);
}

/**
 * Retry an async function with exponential backoff on whitelisted error classes.
 * The final failure rethrows the original error unchanged.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxRetries, initialDelayMs, maxDelayMs, retryOn, sleep = defaultSleep, logger } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const retryable = retryOn.some((cls) => error instanceof cls);
      if (!retryable || attempt >= maxRetries) {
        throw error;
      }

      const delay = backoffDelay(attempt, initialDelayMs, maxDelayMs);
      logger?.warn("Retryable error, backing off", {
        error: error instanceof Error ? error.name : String(error),
        attempt: attempt + 1,
        maxRetries,
        delayMs: delay,
      });
      await sleep(delay);
    }
  }
}
