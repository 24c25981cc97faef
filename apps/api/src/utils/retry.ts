/**
 * Retry helper with exponential backoff
 */

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'onRetry' | 'shouldRetry'>> = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 2000,
  backoffMultiplier: 2,
};

export class RetryExhaustedError extends Error {
  public readonly attempts: number;
  public readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Gave up after ${attempts} attempt(s): ${reason}`);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(attempt: number, options: RetryOptions = {}): number {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  return Math.min(
    opts.initialDelayMs * Math.pow(opts.backoffMultiplier, attempt - 1),
    opts.maxDelayMs
  );
}

/**
 * Run fn until it resolves or attempts run out.
 * Throws RetryExhaustedError carrying the last failure and the attempt count.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const shouldRetry = options.shouldRetry ?? (() => true);

  let lastError: unknown;
  let attempt = 0;

  while (attempt < opts.maxAttempts) {
    attempt++;
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt >= opts.maxAttempts || !shouldRetry(error, attempt)) {
        break;
      }

      const delay = backoffDelay(attempt, opts);
      options.onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }

  throw new RetryExhaustedError(attempt, lastError);
}
