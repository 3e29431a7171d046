/**
 * Bounded Retry
 *
 * Fixed attempt count, fixed interval, early exit on success.
 */

/**
 * Pause used between attempts. Injected so tests do not wait.
 */
export type Sleep = (ms: number) => Promise<void>;

/**
 * Sleep on a timer.
 */
export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryPolicy {
  /** Maximum number of attempts, at least 1 */
  attempts: number;
  /** Pause between attempts in milliseconds */
  intervalMs: number;
  sleep: Sleep;
}

/**
 * Result of a bounded retry.
 *
 * `exhausted` is distinct from the error of any single attempt: it means
 * every allowed attempt was made and none succeeded.
 */
export type RetryResult<T> =
  | { status: 'ok'; value: T; attempts: number }
  | { status: 'exhausted'; attempts: number; lastError: unknown };

/**
 * Called after each failed attempt with the 1-based attempt number.
 */
export type AttemptHook = (attempt: number, error: unknown) => Promise<void> | void;

/**
 * Call `fn` until it resolves or the attempt budget is spent.
 *
 * There is no pause after the last attempt.
 */
export async function retryFixed<T>(
  policy: RetryPolicy,
  fn: (attempt: number) => Promise<T>,
  onFailedAttempt?: AttemptHook
): Promise<RetryResult<T>> {
  const attempts = Math.max(1, Math.floor(policy.attempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const value = await fn(attempt);
      return { status: 'ok', value, attempts: attempt };
    } catch (error) {
      lastError = error;
      await onFailedAttempt?.(attempt, error);
    }
    if (attempt < attempts) {
      await policy.sleep(policy.intervalMs);
    }
  }

  return { status: 'exhausted', attempts, lastError };
}
