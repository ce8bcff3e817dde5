/**
 * Retry with exponential backoff.
 *
 * The operation reports its own result; `shouldRetry` decides whether that
 * result is transient. Thrown errors are not caught here.
 */

export interface RetryOptions<T> {
  /** Additional attempts after the first (default: 2) */
  maxRetries?: number;
  /** Base delay; attempt n waits baseDelayMs * 2^(n-1) before attempt n+1 */
  baseDelayMs?: number;
  /** Upper bound for a single wait */
  maxDelayMs?: number;
  shouldRetry: (result: T) => boolean;
  /** Stops further attempts and interrupts a pending wait */
  signal?: AbortSignal;
  onRetry?: (info: { attempt: number; delayMs: number; result: T }) => void;
  /** Injected for tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface RetryResult<T> {
  result: T;
  attempts: number;
}

/**
 * Backoff delay after the given (1-based) failed attempt
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs = Infinity): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Delay helper that resolves early when the signal aborts
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `operation` until it yields a non-retryable result, retries run out,
 * or the signal aborts. The first attempt always runs.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions<T>
): Promise<RetryResult<T>> {
  const {
    maxRetries = 2,
    baseDelayMs = 500,
    maxDelayMs = 30000,
    shouldRetry,
    signal,
    onRetry,
    sleep = delay,
  } = options;

  let attempt = 1;
  let result = await operation(attempt);

  while (attempt <= maxRetries && shouldRetry(result) && !signal?.aborted) {
    const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs);
    onRetry?.({ attempt, delayMs, result });
    await sleep(delayMs, signal);

    if (signal?.aborted) {
      break;
    }

    attempt++;
    result = await operation(attempt);
  }

  return { result, attempts: attempt };
}
