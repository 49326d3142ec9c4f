/**
 * Worker Pool
 *
 * A fixed number of async workers sharing one queue, rate limiter and
 * identity pool. Each worker, per task:
 *   1. waits for rate-limit admission (suspending only itself)
 *   2. checks out an identity; an exhausted pool hands the task back untouched
 *   3. runs the executor under the per-request timeout
 *   4. releases the identity with the outcome
 *   5. marks the task succeeded, or asks the retry controller what to do
 */

import type { ExecuteOptions, ExtractionExecutor } from '../types/executor.js';
import type { Identity, ReleaseOutcome } from '../types/identity.js';
import type { AttemptOutcome, MetricsSink } from '../types/report.js';
import type { ErrorKind, ExtractionResult, Payload, Stage, Task } from '../types/task.js';
import { describeError } from '../types/task.js';
import { sleep, systemClock, type Clock } from '../utils/clock.js';
import { errorMessage, logger } from '../utils/logger.js';
import { ExhaustedPoolError, type IdentityRotator } from './identity-rotator.js';
import type { RateLimiter } from './rate-limiter.js';
import type { RetryController } from './retry-controller.js';
import type { TaskQueue } from './task-queue.js';

const log = logger.createContext('worker-pool');

const DEFAULT_ABORT_GRACE_MS = 1000;

/** Returns a reason when the payload is unusable, null when it is fine. */
export type PayloadValidator = (stage: Stage, payload: Payload) => string | null;

export interface WorkerPoolOptions {
  workers: number;
  requestTimeoutMs: number;
  stallRetryMs: number;
  /** How long a timed-out executor gets to let go of its identity after the abort. */
  abortGraceMs?: number;
  validatePayload?: PayloadValidator;
  clock?: Clock;
}

export interface WorkerPoolDeps {
  queue: TaskQueue;
  rateLimiter: RateLimiter;
  rotator: IdentityRotator;
  retry: RetryController;
  executor: ExtractionExecutor;
  metrics: MetricsSink;
}

export interface WorkerPoolStats {
  attempts: number;
  stalls: number;
  rateLimitWaits: number;
}

/**
 * Map anything an executor throws onto the error taxonomy.
 */
export function toErrorKind(error: unknown): ErrorKind {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return { kind: 'timeout' };
  }
  return { kind: 'connection_failed', message: errorMessage(error) };
}

/**
 * Connection failures, block pages and proxy auth rejections count
 * against the identity; everything else is about the target.
 */
export function identityOutcome(result: ExtractionResult): ReleaseOutcome {
  if (result.ok) return 'success';

  switch (result.error.kind) {
    case 'connection_failed':
    case 'blocked':
      return 'identity_failure';
    case 'http_status':
      return result.error.status === 407 ? 'identity_failure' : 'target_failure';
    default:
      return 'target_failure';
  }
}

export class WorkerPool {
  private readonly clock: Clock;
  private readonly haltController = new AbortController();
  private readonly loops: Promise<void>[] = [];
  private readonly failureRejecters: Array<(error: unknown) => void> = [];
  private stopping = false;
  private fatalError: unknown = undefined;
  private hasFailed = false;
  private readonly stats: WorkerPoolStats = { attempts: 0, stalls: 0, rateLimitWaits: 0 };

  constructor(
    private readonly deps: WorkerPoolDeps,
    private readonly options: WorkerPoolOptions
  ) {
    if (!Number.isInteger(options.workers) || options.workers < 1) {
      throw new Error(`Worker count must be a positive integer, got ${options.workers}`);
    }
    this.clock = options.clock ?? systemClock;
  }

  start(): void {
    if (this.loops.length > 0) {
      throw new Error('Worker pool already started');
    }

    log.verbose(`Starting ${this.options.workers} workers`);
    for (let index = 0; index < this.options.workers; index++) {
      this.loops.push(this.workerLoop(index + 1));
    }
  }

  /**
   * Stop admitting new attempts. Attempts already sent run to completion.
   */
  halt(): void {
    if (this.haltController.signal.aborted) return;
    this.haltController.abort();
    this.deps.queue.halt();
  }

  /**
   * Halt, then wait for every worker to exit.
   */
  async stop(): Promise<void> {
    this.halt();
    this.stopping = true;
    this.deps.queue.notifyChange();
    await Promise.all(this.loops);
    log.debug('All workers exited');
  }

  /**
   * Rejects with the first unexpected error raised inside a worker.
   */
  whenFailed(): Promise<never> {
    return new Promise<never>((_, reject) => {
      if (this.hasFailed) {
        reject(this.fatalError);
        return;
      }
      this.failureRejecters.push(reject);
    });
  }

  /** The first unexpected worker error, or null while none has happened. */
  failure(): { error: unknown } | null {
    return this.hasFailed ? { error: this.fatalError } : null;
  }

  getStats(): WorkerPoolStats {
    return { ...this.stats };
  }

  private async workerLoop(workerId: number): Promise<void> {
    while (!this.stopping) {
      const task = this.deps.queue.dequeueEligible(this.clock.now());
      if (!task) {
        await this.waitForWork();
        continue;
      }

      try {
        await this.process(task);
      } catch (error) {
        this.fail(workerId, task, error);
        return;
      }
    }
  }

  private async waitForWork(): Promise<void> {
    const next = this.deps.queue.nextEligibleAt();
    const wake = new AbortController();
    const waits: Promise<void>[] = [this.deps.queue.changed()];

    if (next !== null) {
      waits.push(this.clock.sleep(Math.max(0, next - this.clock.now()), wake.signal));
    }

    await Promise.race(waits);
    wake.abort();
  }

  private async process(task: Task): Promise<void> {
    const admitted = await this.awaitAdmission(task);
    if (!admitted) {
      this.deps.queue.requeue(task.id, task.nextEligibleAt);
      return;
    }

    let identity: Identity;
    try {
      identity = this.deps.rotator.checkout(task.endpointClass);
    } catch (error) {
      if (!(error instanceof ExhaustedPoolError)) throw error;

      // Pool-level stall: not the task's fault, so no attempt is consumed
      this.deps.rateLimiter.refund(task.endpointClass);
      this.stats.stalls++;
      const delay = error.retryAfterMs ?? this.options.stallRetryMs;
      log.verbose(`${task.id} stalled, identity pool exhausted; retrying in ${delay}ms`);
      this.deps.queue.requeue(task.id, this.clock.now() + delay);
      return;
    }

    const attempt = this.deps.queue.recordAttempt(task.id);
    this.stats.attempts++;
    const startedAt = this.clock.now();

    const result = await this.attemptWith(task, identity);
    const durationMs = this.clock.now() - startedAt;

    if (result.ok) {
      this.deps.queue.markSucceeded(task.id, result.payload);
      this.emit(task, attempt, 'succeeded', durationMs, identity);
      log.debug(`${task.id} succeeded on attempt ${attempt}`);
      return;
    }

    const decision = this.deps.retry.decide(result.error, attempt);
    if (decision.action === 'retry') {
      this.deps.queue.scheduleRetry(task.id, this.clock.now() + decision.delayMs, result.error);
      this.emit(task, attempt, 'retry_scheduled', durationMs, identity, result.error);
      log.verbose(`${task.id} ${describeError(result.error)}, retry ${attempt + 1}/${this.deps.retry.maxRetries} in ${decision.delayMs}ms`);
    } else {
      this.deps.queue.markFailed(task.id, result.error);
      this.emit(task, attempt, 'failed_permanent', durationMs, identity, result.error);
      log.normal(`${task.id} failed permanently (${describeError(result.error)}, ${decision.reason}) ${task.target}`);
    }
  }

  /**
   * Resolves true once a token is granted, false if the pool halted first.
   */
  private async awaitAdmission(task: Task): Promise<boolean> {
    while (!this.haltController.signal.aborted) {
      const admission = this.deps.rateLimiter.admit(task.endpointClass);
      if (admission.granted) return true;

      this.stats.rateLimitWaits++;
      log.debug(`${task.id} waiting ${admission.waitMs}ms for ${task.endpointClass} admission`);
      await this.clock.sleep(admission.waitMs, this.haltController.signal);
    }
    return false;
  }

  /**
   * Runs one attempt holding `identity`. An attempt that never produced a
   * result releases it as a target failure so the identity's health is left alone.
   */
  private async attemptWith(task: Task, identity: Identity): Promise<ExtractionResult> {
    let outcome: ReleaseOutcome = 'target_failure';
    try {
      const result = this.validate(task, await this.runAttempt(task, identity));
      outcome = identityOutcome(result);
      return result;
    } finally {
      this.deps.rotator.release(identity, outcome);
    }
  }

  private async runAttempt(task: Task, identity: Identity): Promise<ExtractionResult> {
    const controller = new AbortController();
    const options: ExecuteOptions = { signal: controller.signal, timeoutMs: this.options.requestTimeoutMs };
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<ExtractionResult>(resolve => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ ok: false, error: { kind: 'timeout' } });
      }, this.options.requestTimeoutMs);
    });

    const execution = this.deps.executor
      .execute(task, identity, options)
      .catch((error: unknown): ExtractionResult => ({ ok: false, error: toErrorKind(error) }));

    const result = await Promise.race([execution, timeout]).finally(() => clearTimeout(timer));

    if (controller.signal.aborted) {
      // The identity stays checked out until the executor settles or the grace runs out
      const grace = new AbortController();
      await Promise.race([execution, sleep(this.options.abortGraceMs ?? DEFAULT_ABORT_GRACE_MS, grace.signal)]);
      grace.abort();
    }
    return result;
  }

  private validate(task: Task, result: ExtractionResult): ExtractionResult {
    if (!result.ok || !this.options.validatePayload) return result;

    const problem = this.options.validatePayload(task.stage, result.payload);
    return problem === null ? result : { ok: false, error: { kind: 'parse_failure', message: problem } };
  }

  private emit(
    task: Task,
    attempt: number,
    outcome: AttemptOutcome,
    durationMs: number,
    identity: Identity,
    error?: ErrorKind
  ): void {
    this.deps.metrics.recordAttempt({
      taskId: task.id,
      stage: task.stage,
      target: task.target,
      attempt,
      outcome,
      durationMs,
      identityId: identity.id,
      error
    });
  }

  private fail(workerId: number, task: Task, error: unknown): void {
    log.error(`Worker ${workerId} crashed on ${task.id}: ${errorMessage(error)}`);
    if (!this.hasFailed) {
      this.hasFailed = true;
      this.fatalError = error;
    }
    // Reject waiters before halting: a halt can settle the stage barrier they race against
    for (const reject of this.failureRejecters.splice(0)) {
      reject(error);
    }
    this.halt();
  }
}
