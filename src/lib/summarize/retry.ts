export type RetryPolicy = {
  maxAttempts: number;
  initialDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
  shouldRetry: (error: unknown, attempt: number) => boolean;
  sleep: (ms: number) => Promise<void>;
};

export class RetryError extends Error {
  readonly attempts: number;
  readonly retryable: boolean;

  constructor(attempts: number, retryable: boolean, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${reason}`, { cause });
    this.name = "RetryError";
    this.attempts = attempts;
    this.retryable = retryable;
  }
}

export const isTransientStatus = (status: number): boolean =>
  status === 408 || status === 429 || status >= 500;

/**
 * Errors may carry an explicit `retryable` flag or an HTTP `status`. Anything
 * else is retried only when it is the `TypeError` fetch rejects with on
 * network failure.
 */
export const defaultShouldRetry = (error: unknown): boolean => {
  if (typeof error === "object" && error !== null) {
    if ("retryable" in error && typeof error.retryable === "boolean") {
      return error.retryable;
    }
    if ("status" in error && typeof error.status === "number") {
      return isTransientStatus(error.status);
    }
  }
  return error instanceof TypeError;
};

const wait = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export const defaultRetryPolicy: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 500,
  backoffFactor: 2,
  maxDelayMs: 8_000,
  shouldRetry: defaultShouldRetry,
  sleep: wait
};

export const backoffDelay = (policy: RetryPolicy, failedAttempt: number): number =>
  Math.min(
    policy.maxDelayMs,
    policy.initialDelayMs * policy.backoffFactor ** (failedAttempt - 1)
  );

export type RetryResult<T> = {
  value: T;
  attempts: number;
};

export const withRetry = async <T>(
  task: (attempt: number) => Promise<T>,
  overrides: Partial<RetryPolicy> = {}
): Promise<RetryResult<T>> => {
  const policy: RetryPolicy = { ...defaultRetryPolicy, ...overrides };
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; ; attempt += 1) {
    try {
      const value = await task(attempt);
      return { value, attempts: attempt };
    } catch (error) {
      const retryable = policy.shouldRetry(error, attempt);
      if (!retryable || attempt >= maxAttempts) {
        throw new RetryError(attempt, retryable, error);
      }
      const delay = backoffDelay(policy, attempt);
      console.warn("[summarize] retrying after failure", {
        attempt,
        delayMs: delay,
        message: error instanceof Error ? error.message : String(error)
      });
      await policy.sleep(delay);
    }
  }
};
