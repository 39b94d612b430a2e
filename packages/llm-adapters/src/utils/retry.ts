/**
 * Retry with exponential backoff and jitter.
 *
 *   - Backoff: `min(baseDelay * multiplier^attempt, maxDelay)`
 *   - Jitter: `delay * random(0.5, 1.5)`
 *   - A `retry_after` on the error replaces the computed delay
 *   - Only errors with `retryable === true` are retried
 *
 * Each attempt calls `fn` afresh, so a retried stream starts its decode from
 * a clean state.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RetryPolicy {
  /** Retries after the initial call. Default: 2. */
  maxRetries: number;
  /** Initial delay in milliseconds. Default: 1000. */
  baseDelay: number;
  /** Upper bound for one delay in milliseconds. Default: 60000. */
  maxDelay: number;
  /** Default: 2. */
  backoffMultiplier: number;
  /** Add +/- 50% random jitter. Default: true. */
  jitter: boolean;
  /** Stops waiting and re-throws the last error when aborted. */
  signal?: AbortSignal;
  /** Called before each retry with the error, attempt number, and delay. */
  onRetry?: (error: Error, attempt: number, delay: number) => void;
}

interface RetryableError extends Error {
  retryable?: boolean;
  retry_after?: number;
}

const DEFAULT_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseDelay: 1000,
  maxDelay: 60000,
  backoffMultiplier: 2,
  jitter: true,
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Delay before retry number `attempt` (0-indexed). */
export function calculateDelay(attempt: number, policy: RetryPolicy): number {
  const delay = Math.min(
    policy.baseDelay * Math.pow(policy.backoffMultiplier, attempt),
    policy.maxDelay,
  );
  return policy.jitter ? delay * (0.5 + Math.random()) : delay;
}

/** Resolves after `ms`, or early (false) when `signal` aborts. */
function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function isRetryableError(err: unknown): err is RetryableError {
  return err instanceof Error && "retryable" in err;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Execute `fn`, retrying retryable failures according to `policy`.
 *
 * A `retry_after` (seconds) longer than `maxDelay` is re-thrown immediately
 * rather than waited out.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  policy?: Partial<RetryPolicy>,
): Promise<T> {
  const p: RetryPolicy = { ...DEFAULT_POLICY, ...policy };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new Error(String(err));

      if (attempt >= p.maxRetries || !isRetryableError(error) || !error.retryable) {
        throw error;
      }

      let delay: number;
      if (error.retry_after != null && error.retry_after > 0) {
        const retryAfterMs = error.retry_after * 1000;
        if (retryAfterMs > p.maxDelay) {
          throw error;
        }
        delay = retryAfterMs;
      } else {
        delay = calculateDelay(attempt, p);
      }

      p.onRetry?.(error, attempt, delay);

      if (!(await sleep(delay, p.signal))) {
        throw error;
      }
    }
  }
}
