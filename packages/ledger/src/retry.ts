/**
 * @guild-ledger/ledger — Retry of units of work that lost a lock race.
 *
 * Only STORAGE_CONFLICT is retried. Everything else a unit throws is a
 * decision (insufficient funds, duplicates) and surfaces immediately.
 *
 * Delay before retry n (zero-based): min(baseDelayMs * 2^n + jitter, maxDelayMs)
 */

import { isLedgerError } from "./types.js";

export interface RetryConfig {
  /** Attempts including the first. Default: 5 */
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  /** Upper bound of the random jitter added to each delay. */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 5,
  baseDelayMs: 20,
  maxDelayMs: 1000,
  jitterMs: 20,
};

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Storage still busy after ${String(attempts)} attempts: ${msg}`, { cause: lastError });
    this.name = "RetryExhaustedError";
  }
}

export function backoffDelay(attempt: number, config: RetryConfig, random: () => number = Math.random): number {
  const exponential = config.baseDelayMs * 2 ** attempt;
  return Math.min(exponential + random() * config.jitterMs, config.maxDelayMs);
}

/**
 * Run a synchronous unit, sleeping and running it again while it fails
 * with STORAGE_CONFLICT.
 */
export async function retryOnConflict<T>(
  unit: () => T,
  config: RetryConfig,
  sleep: (ms: number) => Promise<void>,
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    try {
      return unit();
    } catch (err: unknown) {
      if (!isLedgerError(err, "STORAGE_CONFLICT")) {
        throw err;
      }
      lastError = err;
      if (attempt < config.maxAttempts - 1) {
        await sleep(backoffDelay(attempt, config));
      }
    }
  }
  throw new RetryExhaustedError(config.maxAttempts, lastError);
}
