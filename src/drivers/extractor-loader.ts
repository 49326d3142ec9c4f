import type { PageExtractor } from '../types/executor.js';
import { errorMessage, logger } from '../utils/logger.js';

const log = logger.createContext('extractor-loader');

/**
 * Driver for loading page extractors dynamically
 */

export class ExtractorLoadError extends Error {
  override readonly name = 'ExtractorLoadError';

  constructor(readonly site: string, message: string) {
    super(`Failed to load extractor for ${site}: ${message}`);
  }
}

function isPageExtractor(value: unknown): value is PageExtractor {
  return typeof value === 'object' && value !== null && 'extract' in value && typeof value.extract === 'function';
}

/**
 * Load the extractor module for a site
 * @param site The site to load the extractor for (e.g., 'amazon.com')
 * @throws ExtractorLoadError if the module is missing or has no usable default export
 */
export async function loadExtractor(site: string): Promise<PageExtractor> {
  let extractorModule: unknown;
  try {
    extractorModule = await import(`../extractors/${site}.js`);
  } catch (error) {
    log.error(`Failed to import extractor for ${site}`);
    throw new ExtractorLoadError(site, errorMessage(error));
  }

  const extractor = typeof extractorModule === 'object' && extractorModule !== null && 'default' in extractorModule
    ? extractorModule.default
    : undefined;

  if (!isPageExtractor(extractor)) {
    throw new ExtractorLoadError(site, 'module has no default export with an extract() method');
  }

  log.debug(`Successfully loaded extractor for ${site}`);
  return extractor;
}
