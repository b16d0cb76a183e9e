export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs?: number;
};

/**
 * Position inside a bounded retry sequence: the attempt about to run and the
 * delay to wait if it fails.
 */
export type RetryState = {
  attempt: number;
  nextDelayMs: number;
};

export const computeBackoffDelay = (
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number => {
  const exponential = Math.min(
    policy.baseDelayMs * 2 ** Math.max(0, attempt - 1),
    policy.maxDelayMs,
  );
  const jitter = Math.floor(random() * (policy.jitterMs ?? 0));
  return exponential + jitter;
};

export const initialRetryState = (
  policy: RetryPolicy,
  random: () => number = Math.random,
): RetryState => ({
  attempt: 1,
  nextDelayMs: computeBackoffDelay(1, policy, random),
});

/**
 * Advances past a failed attempt, or returns null once the attempt budget is spent.
 */
export const nextRetryState = (
  state: RetryState,
  policy: RetryPolicy,
  random: () => number = Math.random,
): RetryState | null => {
  if (state.attempt >= policy.maxAttempts) {
    return null;
  }

  const attempt = state.attempt + 1;
  return {
    attempt,
    nextDelayMs: computeBackoffDelay(attempt, policy, random),
  };
};
