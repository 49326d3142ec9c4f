import type { Page } from 'playwright-core';
import type { Identity } from './identity.js';
import type { ExtractionResult, Payload, Stage, Task } from './task.js';

export interface ExecuteOptions {
  signal: AbortSignal;
  timeoutMs: number;
}

/**
 * Performs the page fetch and field parsing for one task.
 * The engine only looks at the typed outcome, never at page content.
 */
export interface ExtractionExecutor {
  execute(task: Task, identity: Identity, options: ExecuteOptions): Promise<ExtractionResult>;
  close?(): Promise<void>;
}

/**
 * Field rules for one site, one function per stage.
 * The page is already navigated to the task's URL when called.
 */
export interface PageExtractor {
  extract(stage: Stage, page: Page, task: Task): Promise<Payload>;
}
