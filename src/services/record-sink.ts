import type { ExtractedRecord, RecordSink } from '../types/report.js';
import { STAGES, type Stage } from '../types/task.js';
import { logger } from '../utils/logger.js';
import { uploadObject } from '../providers/s3.js';

const log = logger.createContext('record-sink');

export type ObjectUploader = (bucket: string, key: string, body: string, contentType: string) => Promise<string>;

/**
 * Keeps every record in memory. Used by --no-save runs and tests.
 */
export class MemoryRecordSink implements RecordSink {
  readonly records: ExtractedRecord[] = [];

  write(record: ExtractedRecord): void {
    this.records.push(record);
  }

  async flush(): Promise<void> {
    log.debug(`${this.records.length} records held in memory`);
  }

  byStage(stage: Stage): ExtractedRecord[] {
    return this.records.filter(record => record.stage === stage);
  }
}

export interface S3RecordSinkOptions {
  bucket: string;
  prefix: string;
  runId: string;
  upload?: ObjectUploader;
}

/**
 * Buffers records per stage and uploads each stage as one JSON-lines object
 * per flush: {prefix}/{runId}/{stage}-{part}.jsonl
 */
export class S3RecordSink implements RecordSink {
  private readonly buffers = new Map<Stage, string[]>();
  private readonly parts = new Map<Stage, number>();
  private readonly upload: ObjectUploader;
  readonly uploaded: string[] = [];

  constructor(private readonly options: S3RecordSinkOptions) {
    this.upload = options.upload ?? uploadObject;
  }

  write(record: ExtractedRecord): void {
    const lines = this.buffers.get(record.stage) ?? [];
    lines.push(JSON.stringify(record));
    this.buffers.set(record.stage, lines);
  }

  async flush(): Promise<void> {
    for (const stage of STAGES) {
      const lines = this.buffers.get(stage);
      if (!lines || lines.length === 0) continue;

      const part = (this.parts.get(stage) ?? 0) + 1;
      const key = `${this.options.prefix}/${this.options.runId}/${stage.toLowerCase()}-${part}.jsonl`;
      const url = await this.upload(this.options.bucket, key, `${lines.join('\n')}\n`, 'application/x-ndjson');

      this.parts.set(stage, part);
      this.buffers.delete(stage);
      this.uploaded.push(url);
      log.normal(`Uploaded ${lines.length} ${stage} records to ${url}`);
    }
  }
}
