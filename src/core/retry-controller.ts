/**
 * Retry Controller
 *
 * Pure decision logic: classifies an attempt's error and computes the
 * backoff before the next attempt. The worker pool consumes the returned
 * decision; nothing here schedules or sleeps.
 */

import type { RetryPolicy } from '../types/run-config.js';
import type { ErrorKind } from '../types/task.js';

export type ErrorClass = 'RETRYABLE' | 'PERMANENT';

export type RetryDecision =
  | { action: 'retry'; delayMs: number }
  | { action: 'fail'; reason: 'permanent_error' | 'retries_exhausted' };

export class RetryController {
  private readonly retryableStatuses: Set<number>;

  constructor(
    private readonly policy: RetryPolicy,
    private readonly random: () => number = Math.random
  ) {
    this.retryableStatuses = new Set(policy.retryableStatusCodes);
  }

  get maxRetries(): number {
    return this.policy.maxRetries;
  }

  classify(error: ErrorKind): ErrorClass {
    switch (error.kind) {
      case 'timeout':
      case 'connection_failed':
        return 'RETRYABLE';
      case 'http_status':
        return this.retryableStatuses.has(error.status) ? 'RETRYABLE' : 'PERMANENT';
      case 'blocked':
        return this.policy.retryBlocked ? 'RETRYABLE' : 'PERMANENT';
      case 'parse_failure':
        return 'PERMANENT';
    }
  }

  /**
   * base * factor^attemptCount, capped, plus jitter in [0, delay * jitterFraction).
   * With the same jitter draw the result never decreases as attemptCount grows.
   */
  nextDelay(attemptCount: number, jitterDraw: number = this.random()): number {
    const exponential = this.policy.baseDelayMs * Math.pow(this.policy.backoffFactor, attemptCount);
    const delay = Math.min(this.policy.maxDelayMs, exponential);
    const jitter = delay * this.policy.jitterFraction * clampDraw(jitterDraw);
    return Math.round(delay + jitter);
  }

  /**
   * @param attemptCount - attempts made so far, including the one that just failed
   */
  decide(error: ErrorKind, attemptCount: number): RetryDecision {
    if (this.classify(error) === 'PERMANENT') {
      return { action: 'fail', reason: 'permanent_error' };
    }
    if (attemptCount >= this.policy.maxRetries) {
      return { action: 'fail', reason: 'retries_exhausted' };
    }
    return { action: 'retry', delayMs: this.nextDelay(attemptCount) };
  }
}

// Keeps jitter strictly below delay * jitterFraction
function clampDraw(draw: number): number {
  if (!Number.isFinite(draw) || draw < 0) return 0;
  return Math.min(draw, 1 - Number.EPSILON);
}
