import { describe, it, expect, afterEach } from 'vitest';
import { buildIdentities, IdentityRotator } from '../src/core/identity-rotator.js';
import { RateLimiter } from '../src/core/rate-limiter.js';
import { RetryController } from '../src/core/retry-controller.js';
import { TaskQueue } from '../src/core/task-queue.js';
import { identityOutcome, toErrorKind, WorkerPool, type PayloadValidator } from '../src/core/worker-pool.js';
import type { ExtractionExecutor } from '../src/types/executor.js';
import type { RateLimitConfig, RetryPolicy } from '../src/types/run-config.js';
import { ManualClock, waitUntil } from './helpers/manual-clock.js';
import { connectionFailed, FakeExecutor, httpStatus, ok, RecordingMetrics, type ExecuteHandler } from './helpers/fakes.js';

const retryPolicy: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 100,
  backoffFactor: 2,
  maxDelayMs: 10000,
  jitterFraction: 0,
  retryableStatusCodes: [429, 500, 502, 503, 504],
  retryBlocked: false
};

interface Harness {
  clock: ManualClock;
  queue: TaskQueue;
  rateLimiter: RateLimiter;
  rotator: IdentityRotator;
  metrics: RecordingMetrics;
  pool: WorkerPool;
}

describe('WorkerPool', () => {
  let running: WorkerPool | null = null;

  const harness = (
    executor: ExtractionExecutor,
    options: {
      workers?: number;
      userAgents?: string[];
      limits?: Record<string, RateLimitConfig>;
      requestTimeoutMs?: number;
      abortGraceMs?: number;
      validatePayload?: PayloadValidator;
      retry?: Partial<RetryPolicy>;
    } = {}
  ): Harness => {
    const clock = new ManualClock();
    const queue = new TaskQueue();
    const rateLimiter = new RateLimiter(options.limits ?? {}, clock);
    const rotator = new IdentityRotator(buildIdentities([], options.userAgents ?? ['agent-a', 'agent-b']), {
      rotation: { strategy: 'round-robin' },
      failureThreshold: 3,
      cooldownMs: 1000,
      clock
    });
    const metrics = new RecordingMetrics();
    const pool = new WorkerPool(
      { queue, rateLimiter, rotator, retry: new RetryController({ ...retryPolicy, ...options.retry }, () => 0), executor, metrics },
      {
        workers: options.workers ?? 2,
        requestTimeoutMs: options.requestTimeoutMs ?? 5000,
        stallRetryMs: 250,
        abortGraceMs: options.abortGraceMs,
        validatePayload: options.validatePayload,
        clock
      }
    );
    running = pool;
    return { clock, queue, rateLimiter, rotator, metrics, pool };
  };

  const enqueue = (queue: TaskQueue, ...targets: string[]): string[] =>
    targets.map(target => queue.enqueue({ stage: 'CATEGORY', target, endpointClass: 'html' }).id);

  afterEach(async () => {
    await running?.stop();
    running = null;
  });

  it('should reject a non-positive worker count', () => {
    const executor = new FakeExecutor(() => ok());
    expect(() => harness(executor, { workers: 0 })).toThrow('Worker count must be a positive integer');
  });

  it('should never run the same task on two workers at once', async () => {
    const inFlight = new Set<string>();
    let overlaps = 0;
    let clock: ManualClock | null = null;

    const handler: ExecuteHandler = async task => {
      if (inFlight.has(task.id)) overlaps++;
      inFlight.add(task.id);
      await clock?.sleep(1);
      inFlight.delete(task.id);
      return task.target.endsWith('-3') && task.attempts < 2 ? httpStatus(503) : ok();
    };
    const executor = new FakeExecutor(handler);
    const h = harness(executor, { workers: 4, userAgents: ['a', 'b', 'c', 'd'] });
    clock = h.clock;

    const ids = enqueue(h.queue, ...Array.from({ length: 20 }, (_, i) => `/b/cat-${i + 1}`));
    h.pool.start();
    await h.queue.whenSettled('CATEGORY');

    expect(overlaps).toBe(0);
    expect(ids.every(id => h.queue.get(id)?.status === 'SUCCEEDED')).toBe(true);
    // cat-3 and cat-13 fail once each
    expect(executor.calls).toHaveLength(22);
  });

  it('should fail a task permanently after exactly maxRetries retryable errors', async () => {
    const executor = new FakeExecutor(() => httpStatus(503));
    const h = harness(executor);
    const [id] = enqueue(h.queue, '/b/flaky');

    h.pool.start();
    await h.queue.whenSettled('CATEGORY');

    expect(h.queue.get(id)).toMatchObject({ status: 'FAILED_PERMANENT', attempts: 3, lastError: { kind: 'http_status', status: 503 } });
    expect(h.metrics.events.map(event => event.outcome)).toEqual(['retry_scheduled', 'retry_scheduled', 'failed_permanent']);
  });

  it('should wait out the backoff between attempts', async () => {
    const executor = new FakeExecutor(task => (task.attempts < 3 ? httpStatus(503) : ok({ products: [] })));
    const h = harness(executor);
    const startedAt = h.clock.now();
    const [id] = enqueue(h.queue, '/b/recovering');

    h.pool.start();
    await h.queue.whenSettled('CATEGORY');

    expect(h.queue.get(id)).toMatchObject({ status: 'SUCCEEDED', attempts: 3, payload: { products: [] } });
    // nextDelay(1) + nextDelay(2) = 200 + 400
    expect(h.clock.now() - startedAt).toBeGreaterThanOrEqual(600);
  });

  it('should fail permanent errors without retrying', async () => {
    const executor = new FakeExecutor(() => httpStatus(404));
    const h = harness(executor);
    const [id] = enqueue(h.queue, '/b/missing');

    h.pool.start();
    await h.queue.whenSettled('CATEGORY');

    expect(h.queue.get(id)).toMatchObject({ status: 'FAILED_PERMANENT', attempts: 1 });
  });

  it('should turn an executor that outlives the request timeout into a timeout error', async () => {
    const executor = new FakeExecutor((_task, _identity, { signal }) =>
      new Promise(resolve => {
        signal.addEventListener('abort', () => resolve(ok()), { once: true });
      })
    );
    const h = harness(executor, { requestTimeoutMs: 20, retry: { maxRetries: 1 } });
    const [id] = enqueue(h.queue, '/b/slow');

    h.pool.start();
    await h.queue.whenSettled('CATEGORY');

    expect(h.queue.get(id)).toMatchObject({ status: 'FAILED_PERMANENT', lastError: { kind: 'timeout' } });
  });

  it('should keep the identity checked out until a timed-out executor lets go of it', async () => {
    let rotator: IdentityRotator | null = null;
    let heldAfterAbort: boolean | undefined;
    const executor = new FakeExecutor((_task, _identity, { signal }) =>
      new Promise(resolve => {
        signal.addEventListener('abort', () => {
          setTimeout(() => {
            heldAfterAbort = rotator?.stats()[0].inUse;
            resolve(ok());
          }, 10);
        }, { once: true });
      })
    );
    const h = harness(executor, { userAgents: ['agent-a'], requestTimeoutMs: 20, retry: { maxRetries: 1 } });
    rotator = h.rotator;
    const [id] = enqueue(h.queue, '/b/slow');

    h.pool.start();
    await h.queue.whenSettled('CATEGORY');

    expect(heldAfterAbort).toBe(true);
    expect(h.rotator.stats()[0].inUse).toBe(false);
    expect(h.queue.get(id)).toMatchObject({ status: 'FAILED_PERMANENT', lastError: { kind: 'timeout' } });
  });

  it('should give up on an executor that ignores the abort once the grace runs out', async () => {
    const executor = new FakeExecutor(() => new Promise(() => undefined));
    const h = harness(executor, { requestTimeoutMs: 20, abortGraceMs: 30, retry: { maxRetries: 1 } });
    const [id] = enqueue(h.queue, '/b/stuck');

    h.pool.start();
    await h.queue.whenSettled('CATEGORY');

    expect(h.queue.get(id)).toMatchObject({ status: 'FAILED_PERMANENT', lastError: { kind: 'timeout' } });
    expect(h.rotator.stats().every(stats => !stats.inUse)).toBe(true);
  });

  it('should map a thrown executor error to a connection failure against the identity', async () => {
    const executor = new FakeExecutor(() => {
      throw new Error('socket hang up');
    });
    const h = harness(executor, { userAgents: ['agent-a'], retry: { maxRetries: 1 } });
    const [id] = enqueue(h.queue, '/b/broken');

    h.pool.start();
    await h.queue.whenSettled('CATEGORY');

    expect(h.queue.get(id)?.lastError).toEqual({ kind: 'connection_failed', message: 'socket hang up' });
    expect(h.rotator.stats()[0]).toMatchObject({ consecutiveFailures: 1, totalFailures: 1, inUse: false });
  });

  it('should fail a payload the validator rejects as a parse failure', async () => {
    const executor = new FakeExecutor(() => ok({ unexpected: true }));
    const h = harness(executor, { validatePayload: () => 'products: Required' });
    const [id] = enqueue(h.queue, '/b/odd');

    h.pool.start();
    await h.queue.whenSettled('CATEGORY');

    expect(h.queue.get(id)).toMatchObject({
      status: 'FAILED_PERMANENT',
      attempts: 1,
      lastError: { kind: 'parse_failure', message: 'products: Required' }
    });
  });

  it('should hand a task back without consuming an attempt while the identity pool is exhausted', async () => {
    const executor = new FakeExecutor(() => ok());
    const h = harness(executor, {
      userAgents: ['agent-a'],
      limits: { html: { requests: 1, intervalMs: 1_000_000, burst: 5 } }
    });
    const held = h.rotator.checkout('html');
    const [id] = enqueue(h.queue, '/b/waiting');

    h.pool.start();
    await waitUntil(() => h.pool.getStats().stalls >= 2);

    expect(h.queue.get(id)?.attempts).toBe(0);
    expect(executor.calls).toHaveLength(0);

    h.rotator.release(held, 'success');
    await h.queue.whenSettled('CATEGORY');

    expect(h.queue.get(id)).toMatchObject({ status: 'SUCCEEDED', attempts: 1 });
    // Only the attempt that ran kept its token
    expect(Math.floor(h.rateLimiter.snapshot().html)).toBe(4);
  });

  it('should wait for rate-limit admission before dispatching', async () => {
    const executor = new FakeExecutor(() => ok());
    const h = harness(executor, { limits: { html: { requests: 1, intervalMs: 1000, burst: 1 } } });
    const startedAt = h.clock.now();
    enqueue(h.queue, '/b/a', '/b/b', '/b/c');

    h.pool.start();
    await h.queue.whenSettled('CATEGORY');

    expect(executor.calls).toHaveLength(3);
    expect(h.clock.now() - startedAt).toBeGreaterThanOrEqual(2000);
    expect(h.pool.getStats().rateLimitWaits).toBeGreaterThan(0);
  });

  it('should surface an unexpected worker error through whenFailed', async () => {
    const executor = new FakeExecutor(() => ok());
    const h = harness(executor, { workers: 1 });
    h.metrics.recordAttempt = () => {
      throw new Error('metrics sink down');
    };
    enqueue(h.queue, '/b/a');

    const failed = h.pool.whenFailed();
    h.pool.start();

    await expect(failed).rejects.toThrow('metrics sink down');
    expect(h.queue.isHalted()).toBe(true);
    expect(h.pool.failure()).toEqual({ error: new Error('metrics sink down') });
  });

  it('should release the identity without a health penalty when an attempt blows up', async () => {
    const executor = new FakeExecutor(() => ok());
    const h = harness(executor, {
      workers: 1,
      userAgents: ['agent-a'],
      validatePayload: () => {
        throw new Error('validator broke');
      }
    });
    enqueue(h.queue, '/b/a');

    const failed = h.pool.whenFailed();
    h.pool.start();

    await expect(failed).rejects.toThrow('validator broke');
    expect(h.rotator.stats()[0]).toMatchObject({ inUse: false, consecutiveFailures: 0, totalFailures: 0 });
  });
});

describe('worker-pool helpers', () => {
  it('should treat connection failures, blocks and proxy auth as identity failures', () => {
    expect(identityOutcome(ok())).toBe('success');
    expect(identityOutcome(connectionFailed())).toBe('identity_failure');
    expect(identityOutcome({ ok: false, error: { kind: 'blocked', reason: 'captcha' } })).toBe('identity_failure');
    expect(identityOutcome(httpStatus(407))).toBe('identity_failure');
    expect(identityOutcome(httpStatus(503))).toBe('target_failure');
    expect(identityOutcome({ ok: false, error: { kind: 'timeout' } })).toBe('target_failure');
  });

  it('should map thrown errors to error kinds', () => {
    const timeout = new Error('Navigation timeout');
    timeout.name = 'TimeoutError';

    expect(toErrorKind(timeout)).toEqual({ kind: 'timeout' });
    expect(toErrorKind(new Error('ECONNREFUSED'))).toEqual({ kind: 'connection_failed', message: 'ECONNREFUSED' });
    expect(toErrorKind('plain string')).toEqual({ kind: 'connection_failed', message: 'plain string' });
  });
});
