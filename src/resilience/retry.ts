/**
 * Retry executor with exponential backoff for Discord API.
 */

import { RetryConfig, DEFAULT_RETRY_CONFIG } from '../config/index.js';
import { DiscordError, RateLimitedError, isRetryableError } from '../errors/index.js';

export interface RetryHooks {
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Called when all retries are exhausted */
  onExhausted?: (error: Error, attempts: number) => void;
}

/**
 * Retries operations that fail with a retryable error.
 *
 * A rate limited attempt waits exactly the `retry_after` Discord sent; other
 * retryable failures back off exponentially with jitter.
 */
export class RetryExecutor {
  private readonly config: RetryConfig;
  private readonly hooks: RetryHooks;

  constructor(config: RetryConfig, hooks: RetryHooks = {}) {
    this.config = config;
    this.hooks = hooks;
  }

  /**
   * @throws The last error once retries are exhausted, or the first non-retryable one
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    const maxAttempts = this.config.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));

        if (!isRetryableError(failure)) {
          throw failure;
        }
        if (attempt >= maxAttempts) {
          this.hooks.onExhausted?.(failure, attempt);
          throw failure;
        }

        const delayMs = this.calculateDelay(failure, attempt);
        this.hooks.onRetry?.(attempt, failure, delayMs);
        await this.sleep(delayMs);
      }
    }
  }

  /**
   * Delay before the attempt following `attempt`.
   */
  calculateDelay(error: Error, attempt: number): number {
    if (error instanceof RateLimitedError) {
      return error.retryAfterMs ?? this.config.initialBackoffMs;
    }
    if (error instanceof DiscordError && error.retryAfterMs) {
      return error.retryAfterMs;
    }

    const exponentialDelay =
      this.config.initialBackoffMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxBackoffMs);
    const jitter = cappedDelay * this.config.jitterFactor * Math.random();

    return Math.floor(cappedDelay + jitter);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Creates a retry executor, filling unset fields from the defaults.
 */
export function createRetryExecutor(
  config: Partial<RetryConfig> = {},
  hooks: RetryHooks = {}
): RetryExecutor {
  return new RetryExecutor({ ...DEFAULT_RETRY_CONFIG, ...config }, hooks);
}
