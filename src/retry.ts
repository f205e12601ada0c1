/**
 * Retry helpers shared by the transport worker and the sink dispatcher.
 *
 * Backoff is exponential: base * 2^(attempt - 1), capped at maxMs.
 */
import type { Result } from "neverthrow";

export type RetryPolicy = Readonly<{
  /** Total attempts, including the first one */
  maxAttempts: number;
  /** Delay after the first failed attempt */
  backoffMs: number;
  /** Upper bound for any single delay */
  maxBackoffMs?: number;
}>;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Delay to wait after the given (1-based) failed attempt.
 */
export function computeBackoffMs(
  attempt: number,
  baseMs: number,
  maxMs = Number.POSITIVE_INFINITY,
): number {
  if (attempt < 1 || baseMs <= 0) return 0;
  return Math.min(baseMs * 2 ** (attempt - 1), maxMs);
}

/**
 * Outcome of a retried operation: the last result plus how many attempts it took.
 */
export type RetryOutcome<T, E> = Readonly<{
  result: Result<T, E>;
  attempts: number;
}>;

/**
 * Run `operation` until it returns ok or the policy is exhausted.
 * `isRetryable` lets callers stop early on errors that will never succeed.
 */
export async function retryResult<T, E>(
  operation: (attempt: number) => Promise<Result<T, E>>,
  policy: RetryPolicy,
  options: {
    isRetryable?: (error: E) => boolean;
    onRetry?: (error: E, attempt: number, delayMs: number) => void;
    wait?: Sleep;
  } = {},
): Promise<RetryOutcome<T, E>> {
  const wait = options.wait ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  let attempt = 1;
  for (;;) {
    const result = await operation(attempt);
    if (result.isOk()) return { result, attempts: attempt };

    const retryable = options.isRetryable?.(result.error) ?? true;
    if (!retryable || attempt >= maxAttempts) {
      return { result, attempts: attempt };
    }

    const delayMs = computeBackoffMs(
      attempt,
      policy.backoffMs,
      policy.maxBackoffMs,
    );
    options.onRetry?.(result.error, attempt, delayMs);
    await wait(delayMs);
    attempt++;
  }
}
