/**
 * Retry configuration for reasoning provider calls.
 *
 * Exponential backoff with jitter for transient failures such as rate limits
 * (429), server errors (5xx) and dropped connections.
 */

/**
 * Configuration options for retry behavior.
 *
 * @example
 * ```typescript
 * const session = new Session({
 *   instruction: "fix the failing test",
 *   projectRoot: "/work/repo",
 *   provider,
 *   config: { retry: { retries: 5, minTimeout: 2000 } },
 * });
 * ```
 */
export interface RetryConfig {
  /**
   * Whether retry is enabled.
   * @default true
   */
  enabled?: boolean;

  /**
   * Maximum number of retry attempts.
   * @default 3
   */
  retries?: number;

  /**
   * Minimum delay before the first retry in milliseconds.
   * @default 1000
   */
  minTimeout?: number;

  /**
   * Maximum delay between retries in milliseconds.
   * @default 30000
   */
  maxTimeout?: number;

  /**
   * Exponential factor for backoff calculation.
   * @default 2
   */
  factor?: number;

  /**
   * Whether to add random jitter to the delays.
   * @default true
   */
  randomize?: boolean;

  /**
   * Called before each retry attempt.
   */
  onRetry?: (error: Error, attempt: number) => void;

  /**
   * Custom classification. Defaults to `isRetryableError`.
   */
  shouldRetry?: (error: Error) => boolean;
}

export interface ResolvedRetryConfig {
  enabled: boolean;
  retries: number;
  minTimeout: number;
  maxTimeout: number;
  factor: number;
  randomize: boolean;
  onRetry?: (error: Error, attempt: number) => void;
  shouldRetry?: (error: Error) => boolean;
}

export const DEFAULT_RETRY_CONFIG: Omit<ResolvedRetryConfig, "onRetry" | "shouldRetry"> = {
  enabled: true,
  retries: 3,
  minTimeout: 1000,
  maxTimeout: 30000,
  factor: 2,
  randomize: true,
};

/**
 * Resolves a partial retry configuration by applying defaults.
 */
export function resolveRetryConfig(config?: RetryConfig): ResolvedRetryConfig {
  if (!config) {
    return { ...DEFAULT_RETRY_CONFIG };
  }

  return {
    enabled: config.enabled ?? DEFAULT_RETRY_CONFIG.enabled,
    retries: config.retries ?? DEFAULT_RETRY_CONFIG.retries,
    minTimeout: config.minTimeout ?? DEFAULT_RETRY_CONFIG.minTimeout,
    maxTimeout: config.maxTimeout ?? DEFAULT_RETRY_CONFIG.maxTimeout,
    factor: config.factor ?? DEFAULT_RETRY_CONFIG.factor,
    randomize: config.randomize ?? DEFAULT_RETRY_CONFIG.randomize,
    onRetry: config.onRetry,
    shouldRetry: config.shouldRetry,
  };
}

/**
 * Determines if a provider error is transient.
 *
 * Retryable: rate limits (429), server errors (500-504), timeouts, connection
 * errors and the OpenAI SDK's transient error classes.
 * Everything else, authentication and bad requests included, is not.
 */
export function isRetryableError(error: Error): boolean {
  const message = error.message.toLowerCase();
  const name = error.name;

  if (message.includes("429") || message.includes("rate limit") || message.includes("rate_limit")) {
    return true;
  }

  if (
    message.includes("500") ||
    message.includes("502") ||
    message.includes("503") ||
    message.includes("504") ||
    message.includes("internal server error") ||
    message.includes("bad gateway") ||
    message.includes("service unavailable") ||
    message.includes("gateway timeout")
  ) {
    return true;
  }

  if (
    message.includes("timeout") ||
    message.includes("etimedout") ||
    message.includes("timed out")
  ) {
    return true;
  }

  if (
    message.includes("econnreset") ||
    message.includes("econnrefused") ||
    message.includes("enotfound") ||
    message.includes("connection") ||
    message.includes("network")
  ) {
    return true;
  }

  if (
    name === "APIConnectionError" ||
    name === "RateLimitError" ||
    name === "InternalServerError" ||
    name === "APIConnectionTimeoutError"
  ) {
    return true;
  }

  if (message.includes("overloaded") || message.includes("capacity")) {
    return true;
  }

  return false;
}
