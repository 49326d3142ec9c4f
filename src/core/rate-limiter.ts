/**
 * Token-bucket admission control, one bucket per endpoint class.
 *
 * `admit` never blocks: it either consumes a token or tells the caller how
 * long to wait before asking again. Check-and-consume happens synchronously,
 * so concurrent workers on the event loop can never jointly overdraw a bucket.
 */

import type { RateLimitConfig } from '../types/run-config.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('rate-limiter');

export type Admission =
  | { granted: true }
  | { granted: false; waitMs: number };

interface Bucket {
  capacity: number;
  refillPerMs: number;
  tokens: number;
  updatedAt: number;
}

export class RateLimiter {
  private readonly buckets = new Map<string, Bucket>();

  constructor(
    limits: Record<string, RateLimitConfig>,
    private readonly clock: Clock = systemClock
  ) {
    const now = clock.now();
    for (const [endpointClass, limit] of Object.entries(limits)) {
      this.buckets.set(endpointClass, {
        capacity: limit.burst,
        refillPerMs: limit.requests / limit.intervalMs,
        tokens: limit.burst,
        updatedAt: now
      });
      log.debug(`${endpointClass}: ${limit.requests} req / ${limit.intervalMs}ms, burst ${limit.burst}`);
    }
  }

  admit(endpointClass: string): Admission {
    const bucket = this.buckets.get(endpointClass);
    if (!bucket) {
      // No configured limit means unlimited
      return { granted: true };
    }

    this.refill(bucket);

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return { granted: true };
    }

    const waitMs = Math.ceil((1 - bucket.tokens) / bucket.refillPerMs);
    return { granted: false, waitMs: Math.max(1, waitMs) };
  }

  /**
   * Give back a token from a grant that was never used for a request.
   */
  refund(endpointClass: string): void {
    const bucket = this.buckets.get(endpointClass);
    if (!bucket) return;

    this.refill(bucket);
    bucket.tokens = Math.min(bucket.capacity, bucket.tokens + 1);
  }

  isLimited(endpointClass: string): boolean {
    return this.buckets.has(endpointClass);
  }

  snapshot(): Record<string, number> {
    const levels: Record<string, number> = {};
    for (const [endpointClass, bucket] of this.buckets) {
      this.refill(bucket);
      levels[endpointClass] = bucket.tokens;
    }
    return levels;
  }

  private refill(bucket: Bucket): void {
    const now = this.clock.now();
    const elapsed = now - bucket.updatedAt;
    if (elapsed > 0) {
      bucket.tokens = Math.min(bucket.capacity, bucket.tokens + elapsed * bucket.refillPerMs);
      bucket.updatedAt = now;
    }
  }
}
