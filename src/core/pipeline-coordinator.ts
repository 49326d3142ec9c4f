/**
 * Pipeline Coordinator
 *
 * Drives CATEGORY -> PRODUCT -> REVIEW. Each stage is a hard barrier: the
 * next one is seeded only from the previous stage's succeeded tasks, after
 * every one of its tasks is terminal. A circuit breaker aborts the run when
 * a stage's permanent-failure ratio passes the configured threshold.
 */

import type { RecordSink, FinalState, MetricsSink, PipelineState, RunReport, StageCounts } from '../types/report.js';
import { emptyStageCounts } from '../types/report.js';
import type { StageConfig } from '../types/run-config.js';
import { STAGES, type Stage, type Task, type TaskSeed } from '../types/task.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { errorMessage, formatTime, logger } from '../utils/logger.js';
import { deriveNextStage, nextPageTarget, targetKey } from './derivation.js';
import type { TaskQueue } from './task-queue.js';
import type { WorkerPool } from './worker-pool.js';

const log = logger.createContext('pipeline');

const STAGE_STATE: Record<Stage, PipelineState> = {
  CATEGORY: 'STAGE_CATEGORY',
  PRODUCT: 'STAGE_PRODUCT',
  REVIEW: 'STAGE_REVIEW',
};

export class PipelineAbortedError extends Error {
  override readonly name = 'PipelineAbortedError';

  constructor(readonly report: RunReport, options?: ErrorOptions) {
    super(`Pipeline aborted: permanent failure ratio exceeded the abort threshold`, options);
  }
}

export interface PipelineCoordinatorOptions {
  stages: Record<Stage, StageConfig>;
  /** Fraction of a stage's tasks allowed to fail permanently, 0..1 */
  abortThreshold: number;
  signal?: AbortSignal;
  clock?: Clock;
}

export interface PipelineCoordinatorDeps {
  queue: TaskQueue;
  pool: WorkerPool;
  metrics: MetricsSink;
  records?: RecordSink;
}

type StopReason = Extract<FinalState, 'ABORTED' | 'CANCELLED'>;

export class PipelineCoordinator {
  private readonly clock: Clock;
  private readonly counts: Record<Stage, StageCounts> = {
    CATEGORY: emptyStageCounts(),
    PRODUCT: emptyStageCounts(),
    REVIEW: emptyStageCounts(),
  };
  private readonly written = new Set<string>();
  private readonly paged = new Set<string>();
  private pendingWrites: Promise<void>[] = [];
  private writeError: unknown = undefined;
  private state: PipelineState = 'INIT';
  private stopReason: StopReason | null = null;

  constructor(
    private readonly deps: PipelineCoordinatorDeps,
    private readonly options: PipelineCoordinatorOptions
  ) {
    this.clock = options.clock ?? systemClock;
  }

  get currentState(): PipelineState {
    return this.state;
  }

  /**
   * Stop admitting work. In-flight attempts finish; the run resolves CANCELLED.
   */
  cancel(): void {
    if (this.stopReason) return;
    this.stopReason = 'CANCELLED';
    log.normal('Cancellation requested, letting in-flight attempts finish');
    this.deps.pool.halt();
  }

  /**
   * Resolves with the frozen report on COMPLETE or CANCELLED.
   * Rejects with PipelineAbortedError (carrying the partial report) on ABORTED.
   * A worker crash or record sink failure rejects with that error; the report
   * is still emitted first, as ABORTED.
   */
  async run(): Promise<RunReport> {
    if (this.state !== 'INIT') {
      throw new Error(`Pipeline already ran (state ${this.state})`);
    }

    const startedAt = this.clock.now();
    const { signal } = this.options;
    const onAbort = (): void => this.cancel();
    const unsubscribe = this.deps.queue.subscribe(task => this.onTerminal(task));

    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) this.cancel();

    this.deps.pool.start();

    let finalState: FinalState = 'ABORTED';
    let failure: { error: unknown } | null = null;
    try {
      finalState = await this.runStages();
    } catch (error) {
      failure = { error };
    } finally {
      unsubscribe();
      signal?.removeEventListener('abort', onAbort);
      await this.deps.pool.stop();
    }
    // A worker can crash after its task turned terminal and the barrier let go
    failure ??= this.deps.pool.failure();

    try {
      await this.deps.records?.flush();
    } catch (error) {
      log.error(`Failed to flush records: ${errorMessage(error)}`);
      failure ??= { error };
    }

    if (failure) {
      // Whatever the interrupted stage left behind still counts toward the report
      for (const stage of STAGES) this.collect(stage);
      finalState = 'ABORTED';
    }

    const report = this.buildReport(startedAt, finalState);
    this.state = finalState;
    log.normal(`Pipeline ${finalState} in ${formatTime(report.elapsedMs)}`);

    await this.deps.metrics.recordReport(report);

    if (failure && this.stopReason !== 'ABORTED') {
      throw failure.error;
    }
    if (finalState === 'ABORTED') {
      throw new PipelineAbortedError(report, failure ? { cause: failure.error } : undefined);
    }
    return report;
  }

  private async runStages(): Promise<FinalState> {
    let previous: Task[] = [];

    for (const stage of STAGES) {
      if (this.stopReason) break;

      this.state = STAGE_STATE[stage];
      const seeds = deriveNextStage(previous, stage, this.stageConfig(stage));
      for (const seed of seeds) {
        this.enqueue(seed);
      }
      log.normal(`Stage ${stage}: ${seeds.length} tasks`);

      await Promise.race([this.deps.queue.whenSettled(stage), this.deps.pool.whenFailed()]);
      const crashed = this.deps.pool.failure();
      if (crashed) throw crashed.error;
      await this.drainWrites();

      previous = this.collect(stage);
      const counts = this.counts[stage];
      log.normal(`Stage ${stage} done: ${counts.succeeded} succeeded, ${counts.failedPermanent} failed, ${counts.abandoned} abandoned`);
    }

    return this.stopReason ?? 'COMPLETE';
  }

  private stageConfig(stage: Stage): StageConfig {
    return this.options.stages[stage];
  }

  private enqueue(seed: TaskSeed): void {
    if (this.deps.queue.isHalted()) return;
    this.deps.queue.enqueue(seed);
  }

  /**
   * Runs synchronously inside the queue's terminal transition, before the
   * stage's settle check, so follow-up pages land in the same stage.
   */
  private onTerminal(task: Readonly<Task>): void {
    if (task.status === 'FAILED_PERMANENT') {
      this.checkBreaker(task.stage);
      return;
    }
    if (task.status !== 'SUCCEEDED' || !task.payload) return;

    this.write(task);

    const config = this.stageConfig(task.stage);
    const next = nextPageTarget(task, task.payload, config.maxPages);
    if (next && !this.paged.has(`${task.stage}:${targetKey(next)}`)) {
      this.paged.add(`${task.stage}:${targetKey(next)}`);
      this.enqueue({
        stage: task.stage,
        target: next,
        endpointClass: config.endpointClass,
        page: task.page + 1,
        parentId: task.id,
      });
    }
  }

  private checkBreaker(stage: Stage): void {
    if (this.stopReason) return;

    const { total, failedPermanent } = this.deps.queue.counts(stage);
    if (total === 0 || failedPermanent / total <= this.options.abortThreshold) return;

    this.stopReason = 'ABORTED';
    log.error(
      `Circuit breaker tripped on ${stage}: ${failedPermanent}/${total} failed permanently ` +
      `(threshold ${Math.round(this.options.abortThreshold * 100)}%)`
    );
    this.deps.pool.halt();
  }

  private write(task: Readonly<Task>): void {
    const sink = this.deps.records;
    if (!sink || !task.payload) return;

    const key = `${task.stage}:${task.target}`;
    if (this.written.has(key)) return;
    this.written.add(key);

    const record = {
      stage: task.stage,
      target: task.target,
      taskId: task.id,
      scrapedAt: new Date(this.clock.now()).toISOString(),
      payload: task.payload,
    };

    this.pendingWrites.push(
      Promise.resolve()
        .then(() => sink.write(record))
        .then(
          () => undefined,
          (error: unknown) => {
            log.error(`Failed to write record for ${task.id}: ${errorMessage(error)}`);
            this.writeError ??= error;
          }
        )
    );
  }

  private async drainWrites(): Promise<void> {
    const writes = this.pendingWrites;
    this.pendingWrites = [];
    await Promise.all(writes);

    if (this.writeError !== undefined) {
      throw this.writeError;
    }
  }

  private collect(stage: Stage): Task[] {
    const { terminal, abandoned } = this.deps.queue.collectTerminal(stage);
    const counts = this.counts[stage];

    for (const task of [...terminal, ...abandoned]) {
      counts.attempts += task.attempts;
      if (task.attempts > 0) counts.attempted++;
    }
    for (const task of terminal) {
      if (task.status === 'SUCCEEDED') counts.succeeded++;
      else counts.failedPermanent++;
    }
    counts.abandoned += abandoned.length;

    return terminal;
  }

  private buildReport(startedAt: number, finalState: FinalState): RunReport {
    const finishedAt = this.clock.now();
    const stages: Record<Stage, StageCounts> = {
      CATEGORY: Object.freeze({ ...this.counts.CATEGORY }),
      PRODUCT: Object.freeze({ ...this.counts.PRODUCT }),
      REVIEW: Object.freeze({ ...this.counts.REVIEW }),
    };

    return Object.freeze({
      stages: Object.freeze(stages),
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
      elapsedMs: finishedAt - startedAt,
      finalState,
    });
  }
}
