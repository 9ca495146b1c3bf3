export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 4000,
  multiplier: 2,
};

export interface RetryLog {
  attempt: number;
  error: string;
  nextRetryInMs?: number;
}

export interface RetryOptions {
  config?: RetryConfig;
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (log: RetryLog) => void;
}

/**
 * Provider call failure carrying the HTTP status when there was one.
 */
export class ProviderError extends Error {
  readonly provider: string;
  readonly status?: number;

  constructor(provider: string, message: string, status?: number) {
    super(message);
    this.provider = provider;
    this.status = status;
    this.name = "ProviderError";
  }
}

const RETRYABLE_PATTERNS = [
  "timeout",
  "econnrefused",
  "econnreset",
  "service unavailable",
  "temporarily unavailable",
  "socket hang up",
  "other side closed",
];

export function isRetryableError(error: unknown): boolean {
  if (error instanceof Error && error.name === "AbortError") {
    return false;
  }
  if (error instanceof ProviderError && error.status !== undefined) {
    return error.status === 429 || error.status >= 500;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  return RETRYABLE_PATTERNS.some((pattern) => message.includes(pattern));
}

/**
 * Runs `fn` with exponential backoff. Non-retryable errors and an aborted
 * signal end the loop at once with the original error.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const config = options.config ?? DEFAULT_RETRY_CONFIG;
  const shouldRetry = options.shouldRetry ?? isRetryableError;
  let delay = config.initialDelayMs;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn();
    } catch (error) {
      const lastAttempt = attempt >= config.maxAttempts;
      if (lastAttempt || options.signal?.aborted || !shouldRetry(error)) {
        throw error;
      }
      options.onRetry?.({
        attempt,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: delay,
      });
      await sleep(delay, options.signal);
      options.signal?.throwIfAborted();
      delay = Math.min(delay * config.multiplier, config.maxDelayMs);
    }
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });
}
