import { readPositiveInt } from "../auth/config.js";

export interface RetryPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

export function readRetryPolicy(): RetryPolicy {
  return {
    baseDelayMs: readPositiveInt(process.env.RETRY_BASE_DELAY_MS, 1000),
    maxDelayMs: readPositiveInt(process.env.RETRY_MAX_DELAY_MS, 300_000)
  };
}

/** Delay before retry number `retryCount` (1-based) becomes eligible. */
export function retryDelayMs(retryCount: number, policy: RetryPolicy): number {
  const exponent = Math.max(retryCount - 1, 0);
  return Math.min(policy.baseDelayMs * 2 ** exponent, policy.maxDelayMs);
}
