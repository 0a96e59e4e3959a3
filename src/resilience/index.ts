/**
 * Resilience components - public exports.
 */

export { GLOBAL_WINDOW_MS, RateLimitBucket, RateLimiter } from './rate-limiter.js';
export type { RateLimitBucketOptions, BucketStats, RateLimiterStats } from './rate-limiter.js';

export { RetryExecutor, createRetryExecutor } from './retry.js';
export type { RetryHooks } from './retry.js';
