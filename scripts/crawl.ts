#!/usr/bin/env tsx

/**
 * CLI script for crawl runs
 * Usage:
 *   npm run crawl -- [options]
 *
 * Options:
 *   --config <file>          Run configuration under db/ (default run-config.json)
 *   --extractor <site>       Extractor module under src/extractors (default amazon.com)
 *   --workers <n>            Override worker count
 *   --max-retries <n>        Override maximum attempts per task
 *   --request-timeout <dur>  Override per-request timeout (e.g. 30s)
 *   --executable-path <path> Chromium binary to launch
 *   --local-headed           Show the browser window
 *   --no-save                Keep records in memory instead of uploading to S3
 *   --log-level <level>      quiet | normal | verbose | debug
 */

import { randomUUID } from 'crypto';
import { PipelineAbortedError } from '../src/core/pipeline-coordinator.js';
import { loadExtractor } from '../src/drivers/extractor-loader.js';
import { PlaywrightExecutor } from '../src/drivers/playwright-executor.js';
import { CrawlEngine } from '../src/engines/crawl-engine.js';
import { ConfigError, DEFAULT_RUN_CONFIG, loadRunConfig } from '../src/providers/local-db.js';
import { defaultBucket } from '../src/providers/s3.js';
import { MemoryRecordSink, S3RecordSink } from '../src/services/record-sink.js';
import type { RecordSink, RunReport } from '../src/types/report.js';
import type { RunConfig } from '../src/types/run-config.js';
import { STAGES } from '../src/types/task.js';
import { parseArgs, type CrawlArgs } from '../src/utils/cli-args.js';
import { installGlobalErrorHandlers } from '../src/utils/error-handlers.js';
import { errorMessage, formatTime, logger, parseLogLevel } from '../src/utils/logger.js';
import { formatDate } from '../src/utils/time-parser.js';

installGlobalErrorHandlers();

const log = logger.createContext('crawl-cli');

function applyOverrides(config: RunConfig, options: CrawlArgs): RunConfig {
  return {
    ...config,
    workers: options.workers ?? config.workers,
    requestTimeoutMs: options.requestTimeoutMs ?? config.requestTimeoutMs,
    retry: { ...config.retry, maxRetries: options.maxRetries ?? config.retry.maxRetries }
  };
}

function createRecordSink(config: RunConfig, options: CrawlArgs, runId: string): RecordSink {
  const bucket = config.output.s3?.bucket ?? defaultBucket();
  if (options.noSave || !bucket) {
    log.normal('Records: kept in memory (not uploaded)');
    return new MemoryRecordSink();
  }

  const prefix = config.output.s3?.prefix ?? 'crawl';
  log.normal(`Records: s3://${bucket}/${prefix}/${runId}/`);
  return new S3RecordSink({ bucket, prefix, runId });
}

async function runCrawl(options: CrawlArgs): Promise<RunReport> {
  const config = applyOverrides(await loadRunConfig(options.config ?? DEFAULT_RUN_CONFIG), options);
  const extractor = await loadExtractor(options.extractor ?? 'amazon.com');
  const runId = `${new Date().toISOString().slice(0, 10)}-${randomUUID().slice(0, 8)}`;

  const controller = new AbortController();
  process.once('SIGINT', () => {
    log.normal('\nSIGINT received, finishing in-flight requests (Ctrl+C again to force)');
    controller.abort();
    process.once('SIGINT', () => process.exit(130));
  });

  const engine = new CrawlEngine({
    config,
    executor: new PlaywrightExecutor({
      baseUrl: config.baseUrl,
      extractor,
      headless: !options.localHeaded,
      executablePath: options.executablePath
    }),
    records: createRecordSink(config, options, runId),
    signal: controller.signal
  });

  log.normal(`Run ${runId} started ${formatDate(new Date())}`);
  return engine.run();
}

function printReport(report: RunReport): void {
  logger.separator();
  for (const stage of STAGES) {
    const counts = report.stages[stage];
    const line = `${counts.succeeded}/${counts.attempted} succeeded, ${counts.failedPermanent} failed, ` +
      `${counts.abandoned} abandoned, ${counts.attempts} attempts`;
    if (counts.failedPermanent > 0 || counts.abandoned > 0) {
      logger.failure(stage, line);
    } else {
      logger.success(stage, line);
    }
  }
  logger.separator();
  log.quiet(`${report.finalState} in ${formatTime(report.elapsedMs)}`);
}

async function main(): Promise<void> {
  let command: string;
  let options: CrawlArgs;
  try {
    ({ command, options } = parseArgs(process.argv.slice(2)));
  } catch (error) {
    console.error(errorMessage(error));
    process.exit(1);
  }

  logger.setLevel(parseLogLevel(options.logLevel ?? process.env.LOG_LEVEL));

  if (command !== 'run') {
    console.error(`Unknown command: ${command}. Usage: crawl run [options]`);
    process.exit(1);
  }

  try {
    const report = await runCrawl(options);
    printReport(report);
    // COMPLETE and CANCELLED both end cleanly
    process.exit(0);
  } catch (error) {
    if (error instanceof PipelineAbortedError) {
      log.error(error.message);
      printReport(error.report);
    } else if (error instanceof ConfigError) {
      log.error(error.message);
    } else {
      log.error(`Crawl failed: ${errorMessage(error)}`, error);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  log.error(`Fatal: ${errorMessage(error)}`);
  process.exit(1);
});
