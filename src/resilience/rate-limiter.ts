/**
 * Discord rate limit handling with bucket-based scheduling.
 *
 * Discord limits requests per bucket (route template + major parameter) and
 * globally per bot. Each bucket runs its requests one at a time so the
 * headers of one response are known before the next request leaves, and
 * sleeps until reset once it is exhausted. Routes that Discord reports under
 * the same `X-RateLimit-Bucket` hash share one bucket per major parameter.
 */

import { RateLimitConfig } from '../config/index.js';
import {
  RateLimitedError,
  RateLimitTimeoutError,
  QueueFullError,
  QueueTimeoutError,
} from '../errors/index.js';
import { CompiledRoute } from '../routes/index.js';
import {
  Logger,
  MetricsCollector,
  MetricNames,
  NoopLogger,
  NoopMetricsCollector,
} from '../observability/index.js';

/** Length of the global rate limit window */
export const GLOBAL_WINDOW_MS = 1000;

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export interface RateLimitBucketOptions {
  queueTimeout: number;
  maxQueueSize: number;
  /** Called with the time a request sleeps for this bucket's reset */
  onWait?: (waitMs: number) => void;
}

export interface BucketStats {
  key: string;
  route: string;
  hash?: string;
  limit: number;
  remaining: number;
  resetAt: number;
  queueSize: number;
  busy: boolean;
}

export interface RateLimiterStats {
  globalLimited: boolean;
  globalResetAt: number;
  bucketCount: number;
  totalQueueSize: number;
  buckets: BucketStats[];
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * A single Discord rate limit bucket.
 */
export class RateLimitBucket {
  readonly key: string;
  /** Bucket route of the request that created this bucket */
  readonly route: string;

  private limit: number = Infinity;
  private remaining: number = Infinity;
  /** Epoch milliseconds */
  private resetAt: number = 0;
  private hash?: string;
  private lastUsedAt: number = Date.now();

  private busy: boolean = false;
  private readonly waiters: Waiter[] = [];
  private readonly options: RateLimitBucketOptions;

  constructor(key: string, route: string, options: RateLimitBucketOptions) {
    this.key = key;
    this.route = route;
    this.options = options;
  }

  getLimit(): number {
    return this.limit;
  }

  getRemaining(): number {
    return this.remaining;
  }

  getResetAt(): number {
    return this.resetAt;
  }

  getHash(): string | undefined {
    return this.hash;
  }

  getQueueSize(): number {
    return this.waiters.length;
  }

  isBusy(): boolean {
    return this.busy;
  }

  /**
   * Whether the bucket holds no work and its window has passed.
   */
  isIdle(idleMs: number, now: number = Date.now()): boolean {
    return (
      !this.busy &&
      this.waiters.length === 0 &&
      this.resetAt <= now &&
      now - this.lastUsedAt >= idleMs
    );
  }

  /**
   * Runs `task` once every earlier task of this bucket has settled and the
   * bucket has capacity.
   *
   * @param beforeSend - awaited once the bucket has capacity, immediately before `task`
   * @throws QueueFullError when the queue is at capacity
   * @throws QueueTimeoutError when the request waited too long for its turn
   * @throws RateLimitTimeoutError when the reset is further away than the queue timeout
   */
  async schedule<T>(task: () => Promise<T>, beforeSend?: () => Promise<void>): Promise<T> {
    await this.enter();
    try {
      await this.waitForCapacity();
      if (beforeSend) {
        await beforeSend();
      }
      this.lastUsedAt = Date.now();
      return await task();
    } finally {
      this.lastUsedAt = Date.now();
      this.leave();
    }
  }

  /**
   * Updates bucket state from response headers. `Reset-After` is preferred
   * over `Reset` since it does not depend on clock skew.
   */
  updateFromHeaders(headers: Headers, now: number = Date.now()): void {
    const limit = headers.get('X-RateLimit-Limit');
    if (limit !== null && !Number.isNaN(parseInt(limit, 10))) {
      this.limit = parseInt(limit, 10);
    }

    const remaining = headers.get('X-RateLimit-Remaining');
    if (remaining !== null && !Number.isNaN(parseInt(remaining, 10))) {
      this.remaining = parseInt(remaining, 10);
    }

    const resetAfter = headers.get('X-RateLimit-Reset-After');
    const reset = headers.get('X-RateLimit-Reset');
    if (resetAfter !== null && !Number.isNaN(parseFloat(resetAfter))) {
      this.resetAt = now + parseFloat(resetAfter) * 1000;
    } else if (reset !== null && !Number.isNaN(parseFloat(reset))) {
      this.resetAt = parseFloat(reset) * 1000;
    }

    const hash = headers.get('X-RateLimit-Bucket');
    if (hash) {
      this.hash = hash;
    }
  }

  /**
   * Marks the bucket exhausted after a 429.
   */
  markExhausted(retryAfterMs: number, now: number = Date.now()): void {
    this.remaining = 0;
    this.resetAt = Math.max(this.resetAt, now + retryAfterMs);
  }

  private enter(): Promise<void> {
    if (!this.busy) {
      this.busy = true;
      return Promise.resolve();
    }

    if (this.waiters.length >= this.options.maxQueueSize) {
      return Promise.reject(new QueueFullError(this.waiters.length, this.options.maxQueueSize));
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          reject(new QueueTimeoutError(this.options.queueTimeout));
        }, this.options.queueTimeout),
      };
      this.waiters.push(waiter);
    });
  }

  private leave(): void {
    const next = this.waiters.shift();
    if (next) {
      clearTimeout(next.timer);
      next.resolve();
      return;
    }
    this.busy = false;
  }

  private async waitForCapacity(): Promise<void> {
    if (this.remaining <= 0) {
      const waitMs = this.resetAt - Date.now();
      if (waitMs > 0) {
        if (waitMs > this.options.queueTimeout) {
          throw new RateLimitTimeoutError(waitMs, this.options.queueTimeout);
        }
        this.options.onWait?.(waitMs);
        await sleep(waitMs);
      }
      this.remaining = this.limit;
    }
    this.remaining -= 1;
  }
}

/**
 * Coordinates buckets and the global limit.
 */
export class RateLimiter {
  private readonly config: RateLimitConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  private readonly buckets: Map<string, RateLimitBucket> = new Map();
  /** Bucket route -> Discord bucket hash */
  private readonly hashes: Map<string, string> = new Map();

  private globalResetAt: number = 0;
  private windowStart: number = 0;
  private windowCount: number = 0;

  constructor(
    config: RateLimitConfig,
    options: { logger?: Logger; metrics?: MetricsCollector } = {}
  ) {
    this.config = config;
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics ?? new NoopMetricsCollector();
  }

  /**
   * Key of the bucket a route currently maps to.
   */
  bucketKey(route: CompiledRoute): string {
    const id = this.hashes.get(route.bucketRoute) ?? route.bucketRoute;
    return `${id}:${route.majorParameter}`;
  }

  /**
   * Gets or creates the bucket for a route.
   */
  resolveBucket(route: CompiledRoute): RateLimitBucket {
    const key = this.bucketKey(route);
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = new RateLimitBucket(key, route.bucketRoute, {
        queueTimeout: this.config.queueTimeout,
        maxQueueSize: this.config.maxQueueSize,
        onWait: (waitMs) => {
          this.metrics.recordHistogram(MetricNames.BUCKET_WAIT, waitMs / 1000, {
            route: route.bucketRoute,
          });
          this.logger.debug('Waiting for bucket reset', { bucket: key, waitMs });
        },
      });
      this.buckets.set(key, bucket);
    }
    return bucket;
  }

  /**
   * Runs `task` inside the route's bucket. The global lock and window are
   * checked after any bucket wait, so the window slot is counted when the
   * request is sent. Token routes skip the window but still respect the lock.
   */
  async schedule<T>(route: CompiledRoute, task: (bucket: RateLimitBucket) => Promise<T>): Promise<T> {
    const bucket = this.resolveBucket(route);
    this.metrics.setGauge(MetricNames.QUEUE_DEPTH, bucket.getQueueSize(), {
      route: route.bucketRoute,
    });
    return bucket.schedule(
      () => task(bucket),
      () => this.acquireGlobal(!route.usesToken)
    );
  }

  /**
   * Applies response headers to the bucket that sent the request and records
   * the Discord hash for its route.
   */
  updateFromResponse(route: CompiledRoute, bucket: RateLimitBucket, headers: Headers): void {
    bucket.updateFromHeaders(headers);

    const hash = headers.get('X-RateLimit-Bucket');
    if (!hash || this.hashes.get(route.bucketRoute) === hash) {
      return;
    }

    const previousKey = this.bucketKey(route);
    this.hashes.set(route.bucketRoute, hash);
    const nextKey = this.bucketKey(route);

    if (this.buckets.get(previousKey) === bucket) {
      this.buckets.delete(previousKey);
    }
    if (!this.buckets.has(nextKey)) {
      this.buckets.set(nextKey, bucket);
    }

    this.logger.debug('Learned bucket hash', { route: route.bucketRoute, hash });
  }

  /**
   * Handles a 429 response.
   */
  handleRateLimit(
    route: CompiledRoute,
    bucket: RateLimitBucket | undefined,
    retryAfterMs: number,
    isGlobal: boolean
  ): RateLimitedError {
    if (isGlobal) {
      this.globalResetAt = Math.max(this.globalResetAt, Date.now() + retryAfterMs);
      this.metrics.incrementCounter(MetricNames.GLOBAL_RATE_LIMITS_HIT, 1);
      this.logger.warn('Global rate limit hit', { retryAfterMs });
    } else {
      (bucket ?? this.resolveBucket(route)).markExhausted(retryAfterMs);
      this.logger.warn('Route rate limit hit', { route: route.bucketRoute, retryAfterMs });
    }
    this.metrics.incrementCounter(MetricNames.RATE_LIMITS_HIT, 1, { route: route.bucketRoute });

    return new RateLimitedError(retryAfterMs, isGlobal, route.bucketRoute);
  }

  isGloballyLimited(now: number = Date.now()): boolean {
    return this.globalResetAt > now;
  }

  /**
   * Drops buckets that have been idle for at least `idleMs`.
   * @returns The number of buckets removed
   */
  sweep(idleMs: number): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, bucket] of this.buckets) {
      if (bucket.isIdle(idleMs, now)) {
        this.buckets.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.debug('Swept idle buckets', { removed, remaining: this.buckets.size });
    }
    return removed;
  }

  getStats(): RateLimiterStats {
    let totalQueueSize = 0;
    const buckets: BucketStats[] = [];

    for (const [key, bucket] of this.buckets) {
      const queueSize = bucket.getQueueSize();
      totalQueueSize += queueSize;
      buckets.push({
        key,
        route: bucket.route,
        hash: bucket.getHash(),
        limit: bucket.getLimit(),
        remaining: bucket.getRemaining(),
        resetAt: bucket.getResetAt(),
        queueSize,
        busy: bucket.isBusy(),
      });
    }

    return {
      globalLimited: this.isGloballyLimited(),
      globalResetAt: this.globalResetAt,
      bucketCount: this.buckets.size,
      totalQueueSize,
      buckets,
    };
  }

  /**
   * Forgets all buckets, hashes and global state.
   */
  reset(): void {
    this.buckets.clear();
    this.hashes.clear();
    this.globalResetAt = 0;
    this.windowStart = 0;
    this.windowCount = 0;
  }

  private async acquireGlobal(counted: boolean): Promise<void> {
    for (;;) {
      const now = Date.now();

      const lockMs = this.globalResetAt - now;
      if (lockMs > 0) {
        if (lockMs > this.config.queueTimeout) {
          throw new RateLimitTimeoutError(lockMs, this.config.queueTimeout);
        }
        await sleep(lockMs);
        continue;
      }

      if (!counted) return;

      if (now - this.windowStart >= GLOBAL_WINDOW_MS) {
        this.windowStart = now;
        this.windowCount = 0;
      }
      if (this.windowCount < this.config.globalLimit) {
        this.windowCount++;
        return;
      }
      await sleep(this.windowStart + GLOBAL_WINDOW_MS - now);
    }
  }
}
