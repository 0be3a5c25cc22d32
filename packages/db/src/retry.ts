/**
 * Bounded retry for transient store failures.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { StoreUnavailableError } from "./errors.js";

export interface RetryOptions {
  /** Total tries, including the first */
  attempts: number;
  /** Delay before retry n is n * delayMs */
  delayMs: number;
  /**
   * Idempotent operations retry on any StoreUnavailableError; others only
   * when the error says the statement was not applied.
   */
  idempotent: boolean;
  onRetry?: (err: StoreUnavailableError, attempt: number) => void;
}

/**
 * Run `operation`, retrying StoreUnavailableError within the budget.
 * Anything else, and the last failure, propagates.
 */
export async function retryTransient<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (
        !(err instanceof StoreUnavailableError) ||
        attempt >= options.attempts ||
        !(options.idempotent || err.retrySafe)
      ) {
        throw err;
      }

      options.onRetry?.(err, attempt);
      if (options.delayMs > 0) {
        await sleep(options.delayMs * attempt);
      }
    }
  }
}
