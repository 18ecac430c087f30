export type BackoffPolicy = {
  baseDelayMs: number;
  maxDelayMs: number;
};

export type RetryState = {
  /** Attempts made so far for the current request. */
  attempt: number;
  nextDelayMs: number;
};

export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

export function initialRetryState(): RetryState {
  return { attempt: 0, nextDelayMs: 0 };
}

/**
 * Delay before the retry that follows attempt number `attempt` (1-based):
 * `base * 2^(attempt - 1)` capped at `maxDelayMs`, then scaled into
 * [50%, 100%] by `jitter` in [0, 1].
 */
export function computeBackoffDelay(attempt: number, policy: BackoffPolicy, jitter: number): number {
  const exponent = Math.max(0, attempt - 1);
  const capped = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** exponent);
  const bounded = Math.min(1, Math.max(0, jitter));
  return Math.round(capped * (0.5 + 0.5 * bounded));
}
