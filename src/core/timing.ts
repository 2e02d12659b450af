/**
 * Timeout, sleep and retry helpers shared by provisioning, the pipeline
 * deadline and launcher health checks.
 */

// ---------------------------------------------------------------------------
// Timeout
// ---------------------------------------------------------------------------

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Race `promise` against a timer. The timer is cleared whichever side
 * wins; the losing promise keeps running and its outcome is ignored.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(`${label} timed out after ${ms}ms`));
    }, ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Resolve after `ms` milliseconds. */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ---------------------------------------------------------------------------
// Retry
// ---------------------------------------------------------------------------

export interface RetryOptions {
  /** Additional attempts after the first. 0 means a single attempt. */
  retries: number;
  /** Delay before the first retry; doubles on each further retry. */
  backoffMs: number;
  /** Upper bound for a single delay. */
  maxBackoffMs?: number;
  /** Called after a failed attempt that will be retried. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const DEFAULT_MAX_BACKOFF_MS = 30_000;

/**
 * Run `fn` until it resolves or `retries + 1` attempts have failed, with
 * exponential backoff between attempts. Rejects with the last error.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const maxBackoff = options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS;
  let delay = options.backoffMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt > options.retries) {
        throw err;
      }
      const wait = Math.min(delay, maxBackoff);
      options.onRetry?.(err, attempt, wait);
      await sleep(wait);
      delay *= 2;
    }
  }
}
