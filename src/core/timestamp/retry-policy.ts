/**
 * Backoff for transport-level TSA failures
 */
export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 500,
  backoffMultiplier: 2,
  maxDelayMs: 10000,
};

/**
 * Delay before the given retry (attempt 2 is the first retry)
 */
export function retryDelay(policy: RetryPolicy, attempt: number): number {
  const delay =
    policy.initialDelayMs * Math.pow(policy.backoffMultiplier, Math.max(0, attempt - 2));
  return Math.min(delay, policy.maxDelayMs);
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));
