/**
 * Playwright Executor
 *
 * One shared Chromium for the run, one browser context per attempt so every
 * attempt carries exactly its identity's proxy and user agent.
 */

import { chromium, errors } from 'playwright-core';
import type { Browser, BrowserContext, Response } from 'playwright-core';
import type { ExecuteOptions, ExtractionExecutor, PageExtractor } from '../types/executor.js';
import type { Identity, PlaywrightProxy, Proxy } from '../types/identity.js';
import type { ErrorKind, ExtractionResult, Payload, Task } from '../types/task.js';
import { errorMessage, logger } from '../utils/logger.js';
import { resolveTargetUrl } from '../utils/url-utils.js';

const log = logger.createContext('playwright-executor');

const BLOCK_MARKERS: Array<{ reason: string; test: (html: string, status: number) => boolean }> = [
  { reason: 'captcha', test: (html, status) => status === 200 && html.toLowerCase().includes('captcha') },
  { reason: 'robot check', test: html => html.toLowerCase().includes('robot check') },
  { reason: 'automated access notice', test: html => html.includes('To discuss automated access to Amazon data please contact') },
];

const MAX_REDIRECTS = 2;

export interface PlaywrightExecutorOptions {
  baseUrl: string;
  extractor: PageExtractor;
  headless?: boolean;
  /** Path to a Chromium binary; playwright-core ships none */
  executablePath?: string;
}

/**
 * Convert proxy to Playwright format
 */
export function formatProxyForPlaywright(proxy: Proxy): PlaywrightProxy {
  return {
    server: proxy.url,
    username: proxy.username,
    password: proxy.password
  };
}

/**
 * Name the block page the HTML looks like, or null for a normal page.
 */
export function detectBlock(html: string, status: number): string | null {
  const marker = BLOCK_MARKERS.find(candidate => candidate.test(html, status));
  return marker ? marker.reason : null;
}

/**
 * Map a navigation error thrown by Playwright onto the error taxonomy.
 */
export function navigationError(error: unknown): ErrorKind {
  if (error instanceof errors.TimeoutError) {
    return { kind: 'timeout' };
  }
  return { kind: 'connection_failed', message: errorMessage(error).split('\n')[0] };
}

function redirectCount(response: Response): number {
  let hops = 0;
  let request = response.request().redirectedFrom();
  while (request) {
    hops++;
    request = request.redirectedFrom();
  }
  return hops;
}

export class PlaywrightExecutor implements ExtractionExecutor {
  private browser: Promise<Browser> | null = null;

  constructor(private readonly options: PlaywrightExecutorOptions) {}

  async execute(task: Task, identity: Identity, { signal, timeoutMs }: ExecuteOptions): Promise<ExtractionResult> {
    const browser = await this.getBrowser();
    const context = await browser.newContext({
      userAgent: identity.userAgent,
      proxy: identity.proxy ? formatProxyForPlaywright(identity.proxy) : undefined
    });

    const onAbort = (): void => {
      this.closeContext(context, task);
    };
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      return await this.visit(context, task, timeoutMs);
    } finally {
      signal.removeEventListener('abort', onAbort);
      this.closeContext(context, task);
    }
  }

  async close(): Promise<void> {
    if (!this.browser) return;
    const browser = await this.browser;
    this.browser = null;
    await browser.close();
    log.debug('Browser closed');
  }

  private async visit(context: BrowserContext, task: Task, timeoutMs: number): Promise<ExtractionResult> {
    const page = await context.newPage();
    const url = resolveTargetUrl(this.options.baseUrl, task.stage, task.target);
    log.debug(`${task.id} -> ${url}`);

    let response: Response | null;
    try {
      response = await page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' });
    } catch (error) {
      return { ok: false, error: navigationError(error) };
    }

    const status = response?.status() ?? 200;
    if (status >= 400) {
      return { ok: false, error: { kind: 'http_status', status } };
    }
    if (response && redirectCount(response) > MAX_REDIRECTS) {
      return { ok: false, error: { kind: 'blocked', reason: 'redirect chain' } };
    }

    const blocked = detectBlock(await page.content(), status);
    if (blocked) {
      return { ok: false, error: { kind: 'blocked', reason: blocked } };
    }

    let payload: Payload;
    try {
      payload = await this.options.extractor.extract(task.stage, page, task);
    } catch (error) {
      return { ok: false, error: { kind: 'parse_failure', message: errorMessage(error) } };
    }
    return { ok: true, payload };
  }

  private getBrowser(): Promise<Browser> {
    if (!this.browser) {
      log.verbose(`Launching chromium (${this.options.headless === false ? 'headed' : 'headless'})`);
      this.browser = chromium.launch({
        headless: this.options.headless ?? true,
        executablePath: this.options.executablePath
      });
    }
    return this.browser;
  }

  private closeContext(context: BrowserContext, task: Task): void {
    context.close().catch((error: unknown) => {
      log.debug(`Context close for ${task.id} failed: ${errorMessage(error)}`);
    });
  }
}
