/**
 * Retry utility with exponential backoff
 */

export interface RetryOptions {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Delay before the first retry in milliseconds */
  initialDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
  /** Upper bound of the random jitter added to each delay */
  maxJitterMs: number;
  /** Decides whether a failure is worth another attempt */
  isRetryable: (error: Error) => boolean;
  /** Waits between attempts */
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Source of randomness for jitter, in [0, 1) */
  random: () => number;
  /** Stops further attempts and pending waits once aborted */
  signal?: AbortSignal;
}

/**
 * Network error codes and SDK error names treated as transient
 */
export const TRANSIENT_ERRORS = [
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "TimeoutError",
  "RequestTimeout",
  "RequestTimeoutException",
  "NetworkingError",
] as const;

/**
 * Check if an error looks like a network or timeout failure
 */
export function isTransientError(error: Error): boolean {
  const code =
    "code" in error && typeof error.code === "string" ? error.code : "";
  const message = error.message || "";

  return TRANSIENT_ERRORS.some(
    (e) => error.name === e || code === e || message.includes(e)
  );
}

/**
 * Error thrown when a retry loop or its wait is aborted
 */
export function abortError(): Error {
  return Object.assign(new Error("Operation aborted"), { name: "AbortError" });
}

/**
 * Sleep for a given number of milliseconds, ending early on abort
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 300,
  backoffMultiplier: 2.3,
  maxJitterMs: 100,
  isRetryable: isTransientError,
  sleep,
  random: Math.random,
};

/**
 * Delay before retry number `retry` (1-based), without jitter
 */
export function backoffDelay(
  retry: number,
  options: Pick<RetryOptions, "initialDelayMs" | "backoffMultiplier"> = DEFAULT_OPTIONS
): number {
  return Math.round(
    options.initialDelayMs * Math.pow(options.backoffMultiplier, retry - 1)
  );
}

/**
 * Execute an operation with retry logic and exponential backoff
 *
 * @param operation - Async function to execute
 * @param options - Retry configuration options
 * @param onRetry - Optional callback called before each retry
 * @returns The result of the operation
 * @throws The last error if all attempts are exhausted, the first
 * non-retryable error, or an AbortError once `options.signal` aborts
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: Partial<RetryOptions> = {},
  onRetry?: (attempt: number, error: Error, delayMs: number) => void
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_OPTIONS, ...options };
  const { maxAttempts, maxJitterMs, isRetryable, random, signal } = opts;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw abortError();
    }

    try {
      return await operation();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (signal?.aborted || !isRetryable(lastError)) {
        throw lastError;
      }

      // If this was the last attempt, don't retry
      if (attempt === maxAttempts) {
        break;
      }

      const delay =
        backoffDelay(attempt, opts) + Math.floor(random() * maxJitterMs);

      onRetry?.(attempt, lastError, delay);

      await opts.sleep(delay, signal);
    }
  }

  throw lastError ?? new Error("Retry attempts exhausted");
}
