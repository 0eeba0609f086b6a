/**
 * @spanline/core — Retry with exponential backoff
 *
 * Used by the export pipeline to resend a batch after a transient
 * transport failure.
 */

export interface RetryOptions {
  /** Total attempts including the first one (default: 5) */
  maxAttempts?: number;
  /** Delay before the second attempt in ms (default: 1000) */
  initialDelayMs?: number;
  /** Upper bound for a single delay in ms (default: 5000) */
  maxDelayMs?: number;
  /** Backoff multiplier (default: 1.5) */
  backoffMultiplier?: number;
  /** Errors not matching this are rethrown immediately */
  isRetryable?: (error: unknown) => boolean;
  /** Called before each wait */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  /** Aborting stops further attempts and interrupts the current wait */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'isRetryable' | 'onRetry' | 'signal'>> = {
  maxAttempts: 5,
  initialDelayMs: 1000,
  maxDelayMs: 5000,
  backoffMultiplier: 1.5,
};

export class RetryAbortedError extends Error {
  public override readonly name = 'RetryAbortedError';

  constructor(public readonly attempts: number) {
    super(`Retry aborted after ${attempts} attempt(s)`);
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Exponential delay capped at maxDelayMs, with ±25% jitter so that many
 * processes recovering from one collector outage do not retry in lockstep.
 */
export function calculateDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  multiplier: number,
): number {
  const exponentialDelay = initialDelayMs * Math.pow(multiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = cappedDelay * 0.25 * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Retry an async operation with exponential backoff.
 *
 * @example
 * await withRetry(() => transport.send('traces', payload, opts), {
 *   maxAttempts: 5,
 *   isRetryable: (err) => err instanceof TransportError && err.retryable,
 * });
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const { maxAttempts, initialDelayMs, maxDelayMs, backoffMultiplier } = {
    ...DEFAULT_OPTIONS,
    ...options,
  };
  const isRetryable = options?.isRetryable ?? (() => false);
  const signal = options?.signal;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) throw new RetryAbortedError(attempt - 1);

    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts || !isRetryable(error)) {
        throw error;
      }

      const delayMs = calculateDelay(attempt, initialDelayMs, maxDelayMs, backoffMultiplier);
      options?.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs, signal);
    }
  }

  throw lastError;
}
