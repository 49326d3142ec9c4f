import type { AttemptEvent, MetricsSink, RunReport } from '../types/report.js';
import { STAGES, type ErrorKind, type Stage } from '../types/task.js';
import { formatProgress, formatTime, logger } from '../utils/logger.js';

const log = logger.createContext('metrics');

export interface TimingStats {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  avgMs: number;
}

export interface RunMetricsSummary {
  attempts: number;
  succeeded: number;
  retried: number;
  failedPermanent: number;
  errors: Record<string, number>;
  timings: Record<Stage, TimingStats>;
  identityAttempts: Record<string, number>;
  report: RunReport | null;
}

/** Key an error is counted under, e.g. "http_503" or "timeout". */
export function errorLabel(error: ErrorKind): string {
  return error.kind === 'http_status' ? `http_${error.status}` : error.kind;
}

function emptyTiming(): TimingStats {
  return { count: 0, totalMs: 0, minMs: 0, maxMs: 0, avgMs: 0 };
}

/**
 * In-process metrics sink: counts attempt outcomes, errors by kind,
 * per-stage attempt timings and per-identity usage.
 */
export class RunMetrics implements MetricsSink {
  private attempts = 0;
  private succeeded = 0;
  private retried = 0;
  private failedPermanent = 0;
  private readonly errors = new Map<string, number>();
  private readonly identityAttempts = new Map<string, number>();
  private readonly timings: Record<Stage, TimingStats> = {
    CATEGORY: emptyTiming(),
    PRODUCT: emptyTiming(),
    REVIEW: emptyTiming(),
  };
  private report: RunReport | null = null;

  recordAttempt(event: AttemptEvent): void {
    this.attempts++;
    switch (event.outcome) {
      case 'succeeded': this.succeeded++; break;
      case 'retry_scheduled': this.retried++; break;
      case 'failed_permanent': this.failedPermanent++; break;
    }

    if (event.error) {
      const label = errorLabel(event.error);
      this.errors.set(label, (this.errors.get(label) ?? 0) + 1);
    }
    this.identityAttempts.set(event.identityId, (this.identityAttempts.get(event.identityId) ?? 0) + 1);

    const timing = this.timings[event.stage];
    timing.minMs = timing.count === 0 ? event.durationMs : Math.min(timing.minMs, event.durationMs);
    timing.maxMs = Math.max(timing.maxMs, event.durationMs);
    timing.count++;
    timing.totalMs += event.durationMs;
    timing.avgMs = timing.totalMs / timing.count;
  }

  recordReport(report: RunReport): void {
    this.report = report;
    this.logSummary();
  }

  summary(): RunMetricsSummary {
    return {
      attempts: this.attempts,
      succeeded: this.succeeded,
      retried: this.retried,
      failedPermanent: this.failedPermanent,
      errors: Object.fromEntries(this.errors),
      timings: {
        CATEGORY: { ...this.timings.CATEGORY },
        PRODUCT: { ...this.timings.PRODUCT },
        REVIEW: { ...this.timings.REVIEW },
      },
      identityAttempts: Object.fromEntries(this.identityAttempts),
      report: this.report,
    };
  }

  logSummary(): void {
    log.normal(`Attempts: ${this.attempts} (${this.succeeded} succeeded, ${this.retried} retried, ${this.failedPermanent} failed)`);

    for (const stage of STAGES) {
      const counts = this.report?.stages[stage];
      const timing = this.timings[stage];
      if (!counts || counts.attempted === 0) continue;
      log.normal(
        `  ${stage.padEnd(8)} ${formatProgress(counts.succeeded, counts.attempted)} succeeded, ` +
        `avg ${formatTime(timing.avgMs)} (min ${formatTime(timing.minMs)}, max ${formatTime(timing.maxMs)})`
      );
    }

    if (this.errors.size > 0) {
      log.verbose(`Errors: ${Array.from(this.errors, ([label, count]) => `${label}=${count}`).join(', ')}`);
    }
  }
}
