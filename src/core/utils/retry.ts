/**
 * Reusable retry logic utility
 */

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  backoffMultiplier?: number;
  jitterMs?: number;
  retryCondition?: (error: Error) => boolean;
}

export class RetryError extends Error {
  constructor(
    message: string,
    public originalError: Error,
    public attempt: number,
  ) {
    super(message);
    this.name = "RetryError";
  }
}

/**
 * Executes an operation with retry logic
 * @param operation - The operation to retry
 * @param options - Retry configuration
 * @returns Promise that resolves with the operation result
 * @throws RetryError if all retries are exhausted
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxRetries,
    baseDelayMs,
    backoffMultiplier = 2,
    jitterMs = 250,
    retryCondition = () => true,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      // Non-retryable errors surface unchanged
      if (!retryCondition(lastError)) {
        throw lastError;
      }

      if (attempt >= maxRetries) {
        if (maxRetries === 0) throw lastError;
        throw new RetryError(
          `Operation failed after ${attempt + 1} attempts`,
          lastError,
          attempt + 1,
        );
      }

      // Exponential backoff with jitter
      const jitter = jitterMs > 0 ? Math.floor(Math.random() * jitterMs) : 0;
      const delay = baseDelayMs * Math.pow(backoffMultiplier, attempt) + jitter;

      await sleep(delay);
    }
  }
}

/**
 * Default retry options for image downloads
 */
export const HTTP_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 2,
  baseDelayMs: 800,
  backoffMultiplier: 2,
  jitterMs: 250,
  retryCondition: (error) => {
    // Retry on network errors, timeouts, and 5xx errors
    const message = error.message.toLowerCase();
    return (
      error.name === "TimeoutError" ||
      message.includes("timeout") ||
      message.includes("network") ||
      message.includes("connection") ||
      message.includes("fetch failed") ||
      message.includes("http 5")
    );
  },
};

/**
 * Default retry options for browser navigation
 */
export const BROWSER_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 2,
  baseDelayMs: 1000,
  backoffMultiplier: 1.5,
  jitterMs: 500,
  retryCondition: (error) => {
    // Retry on navigation timeouts and page load errors
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("navigation") ||
      message.includes("page load")
    );
  },
};

/** No retries at all; used by tests and single-shot callers */
export const NO_RETRY: RetryOptions = { maxRetries: 0, baseDelayMs: 0 };

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));
