/**
 * Retry Logic with Exponential Backoff
 * Callers decide which failures are retryable (e.g. 429s and network errors)
 */

export interface RetryOptions {
  /** Retries after the first attempt; 4 means at most 5 attempts */
  maxRetries?: number;
  initialDelay?: number;
  maxDelay?: number;
  backoffMultiplier?: number;
  /** Spread each delay over 50-100% of its base value */
  jitter?: boolean;
  shouldRetry?: (error: unknown) => boolean;
  /** Lower bound for the next delay, e.g. from a Retry-After header; capped at maxDelay */
  minDelayFor?: (error: unknown) => number | undefined;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 4,
  initialDelay: 1000, // 1 second
  maxDelay: 30000, // 30 seconds
  backoffMultiplier: 2,
  jitter: true,
  shouldRetry: () => true,
  minDelayFor: () => undefined,
  onRetry: () => undefined,
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
  random: Math.random,
};

/**
 * Calculate delay with exponential backoff
 */
export function calculateDelay(
  attempt: number,
  initialDelay: number,
  maxDelay: number,
  multiplier: number
): number {
  const delay = initialDelay * Math.pow(multiplier, attempt);
  return Math.min(delay, maxDelay);
}

/**
 * Retry a function with exponential backoff (and jitter unless disabled).
 * The function receives the zero-based attempt number.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      // Don't retry if it's the last attempt
      if (attempt === opts.maxRetries) {
        break;
      }

      if (!opts.shouldRetry(error)) {
        throw error;
      }

      const baseDelay = calculateDelay(
        attempt,
        opts.initialDelay,
        opts.maxDelay,
        opts.backoffMultiplier
      );
      const jittered = opts.jitter ? baseDelay * (0.5 + opts.random() * 0.5) : baseDelay;
      // A demanded delay (Retry-After) never exceeds maxDelay
      const demanded = Math.min(opts.minDelayFor(error) ?? 0, opts.maxDelay);
      const delay = Math.max(jittered, demanded);

      opts.onRetry(error, attempt + 1, delay);
      await opts.sleep(delay);
    }
  }

  // All retries exhausted
  throw lastError;
}
