import type { ErrorKind, Payload, Stage } from './task.js';

export type PipelineState =
  | 'INIT'
  | 'STAGE_CATEGORY'
  | 'STAGE_PRODUCT'
  | 'STAGE_REVIEW'
  | 'COMPLETE'
  | 'ABORTED'
  | 'CANCELLED';

export type FinalState = Extract<PipelineState, 'COMPLETE' | 'ABORTED' | 'CANCELLED'>;

export interface StageCounts {
  attempted: number;        // tasks with at least one attempt
  succeeded: number;
  failedPermanent: number;
  attempts: number;         // total attempts, retries included
  abandoned: number;        // tasks left unfinished by an abort or cancellation
}

export interface RunReport {
  stages: Record<Stage, StageCounts>;
  startedAt: string;
  finishedAt: string;
  elapsedMs: number;
  finalState: FinalState;
}

export type AttemptOutcome = 'succeeded' | 'retry_scheduled' | 'failed_permanent';

export interface AttemptEvent {
  taskId: string;
  stage: Stage;
  target: string;
  attempt: number;
  outcome: AttemptOutcome;
  durationMs: number;
  identityId: string;
  error?: ErrorKind;
}

export interface MetricsSink {
  recordAttempt(event: AttemptEvent): void;
  recordReport(report: RunReport): void | Promise<void>;
}

export interface ExtractedRecord {
  stage: Stage;
  target: string;
  taskId: string;
  scrapedAt: string;
  payload: Payload;
}

export interface RecordSink {
  write(record: ExtractedRecord): void | Promise<void>;
  flush(): Promise<void>;
}

export function emptyStageCounts(): StageCounts {
  return { attempted: 0, succeeded: 0, failedPermanent: 0, attempts: 0, abandoned: 0 };
}
