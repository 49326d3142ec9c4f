import { buildIdentities, IdentityRotator } from '../core/identity-rotator.js';
import { PipelineCoordinator } from '../core/pipeline-coordinator.js';
import { RateLimiter } from '../core/rate-limiter.js';
import { RetryController } from '../core/retry-controller.js';
import { TaskQueue } from '../core/task-queue.js';
import { WorkerPool } from '../core/worker-pool.js';
import { validatePayload } from '../core/derivation.js';
import { RunMetrics } from '../services/run-metrics.js';
import type { ExtractionExecutor } from '../types/executor.js';
import type { MetricsSink, RecordSink, RunReport } from '../types/report.js';
import type { RunConfig } from '../types/run-config.js';
import { errorMessage, formatTime, logger } from '../utils/logger.js';
import { systemClock, type Clock } from '../utils/clock.js';

const log = logger.createContext('crawl-engine');

export interface CrawlEngineOptions {
  config: RunConfig;
  executor: ExtractionExecutor;
  metrics?: MetricsSink;
  records?: RecordSink;
  signal?: AbortSignal;
  clock?: Clock;
  random?: () => number;
}

/**
 * Builds one run's components from configuration and drives the pipeline.
 * Rate limiter, identity pool and retry policy live exactly as long as the run.
 */
export class CrawlEngine {
  readonly queue = new TaskQueue();
  readonly rateLimiter: RateLimiter;
  readonly rotator: IdentityRotator;
  readonly retry: RetryController;
  readonly pool: WorkerPool;
  readonly coordinator: PipelineCoordinator;
  readonly metrics: MetricsSink;

  constructor(private readonly options: CrawlEngineOptions) {
    const { config } = options;
    const clock = options.clock ?? systemClock;
    const random = options.random ?? Math.random;

    this.metrics = options.metrics ?? new RunMetrics();
    this.rateLimiter = new RateLimiter(config.rateLimits, clock);
    this.rotator = new IdentityRotator(buildIdentities(config.identities.proxies, config.identities.userAgents), {
      rotation: config.identities.rotation,
      failureThreshold: config.identities.failureThreshold,
      cooldownMs: config.identities.cooldownMs,
      clock,
      random
    });
    this.retry = new RetryController(config.retry, random);

    this.pool = new WorkerPool(
      {
        queue: this.queue,
        rateLimiter: this.rateLimiter,
        rotator: this.rotator,
        retry: this.retry,
        executor: options.executor,
        metrics: this.metrics
      },
      {
        workers: config.workers,
        requestTimeoutMs: config.requestTimeoutMs,
        stallRetryMs: config.identities.stallRetryMs,
        validatePayload,
        clock
      }
    );

    this.coordinator = new PipelineCoordinator(
      { queue: this.queue, pool: this.pool, metrics: this.metrics, records: options.records },
      {
        stages: {
          CATEGORY: config.stages.category,
          PRODUCT: config.stages.product,
          REVIEW: config.stages.review
        },
        abortThreshold: config.abortThreshold,
        signal: options.signal,
        clock
      }
    );
  }

  async run(): Promise<RunReport> {
    this.logConfiguration();

    try {
      return await this.coordinator.run();
    } finally {
      this.logIdentities();
      await this.closeExecutor();
    }
  }

  private logConfiguration(): void {
    const { config } = this.options;
    log.normal('Crawl configuration:');
    log.normal(`  Workers: ${config.workers}`);
    log.normal(`  Request timeout: ${formatTime(config.requestTimeoutMs)}`);
    log.normal(`  Identities: ${this.rotator.size} (${config.identities.rotation.strategy})`);
    log.normal(`  Max attempts per task: ${config.retry.maxRetries}`);
    log.normal(`  Abort threshold: ${Math.round(config.abortThreshold * 100)}%`);
    for (const [endpointClass, limit] of Object.entries(config.rateLimits)) {
      log.verbose(`  Rate limit ${endpointClass}: ${limit.requests} per ${formatTime(limit.intervalMs)}, burst ${limit.burst}`);
    }
  }

  private logIdentities(): void {
    for (const stats of this.rotator.stats()) {
      log.verbose(
        `  Identity ${stats.id}: ${stats.checkouts} checkouts, ${stats.totalFailures} failures` +
        (stats.degradedUntil !== null ? ' (degraded)' : '')
      );
    }
    const pool = this.pool.getStats();
    log.verbose(`  Pool: ${pool.attempts} attempts, ${pool.stalls} identity stalls, ${pool.rateLimitWaits} rate-limit waits`);
  }

  private async closeExecutor(): Promise<void> {
    if (!this.options.executor.close) return;
    try {
      await this.options.executor.close();
    } catch (error) {
      // Never masks the run's own outcome
      log.error(`Failed to close executor: ${errorMessage(error)}`);
    }
  }
}
