/**
 * Local Database Provider
 *
 * Loads JSON files from the db/ directory with a per-file cache and
 * validates run configuration against its schema.
 */

import { readFile } from 'fs/promises';
import { isAbsolute, join } from 'path';
import type { ZodError } from 'zod';
import { RunConfigSchema, type RunConfig } from '../types/run-config.js';
import { errorMessage, logger } from '../utils/logger.js';

const log = logger.createContext('local-db');

export const DEFAULT_RUN_CONFIG = 'run-config.json';

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(readonly source: string, readonly issues: string[]) {
    super(`Invalid configuration in ${source}:\n  ${issues.join('\n  ')}`);
  }

  static fromZod(source: string, error: ZodError): ConfigError {
    return new ConfigError(
      source,
      error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    );
  }
}

// Cache for loaded data
const cache = new Map<string, unknown>();

function resolveDbPath(filename: string): string {
  return isAbsolute(filename) ? filename : join(process.cwd(), 'db', filename);
}

/**
 * Load a JSON file from the db directory (or an absolute path)
 * @param filename - The name of the file to load (e.g., 'run-config.json')
 */
export async function loadJsonFile(filename: string): Promise<unknown> {
  const filePath = resolveDbPath(filename);
  if (cache.has(filePath)) {
    log.debug(`Returning cached data for ${filename}`);
    return cache.get(filePath);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(filePath, [`could not read JSON: ${errorMessage(error)}`]);
  }

  cache.set(filePath, parsed);
  log.debug(`Loaded and cached ${filename}`);
  return parsed;
}

/**
 * Validate raw configuration data
 * @throws ConfigError listing every invalid field
 */
export function parseRunConfig(data: unknown, source = 'run configuration'): RunConfig {
  const result = RunConfigSchema.safeParse(data);
  if (!result.success) {
    throw ConfigError.fromZod(source, result.error);
  }
  return result.data;
}

/**
 * Load and validate the run configuration
 */
export async function loadRunConfig(filename: string = DEFAULT_RUN_CONFIG): Promise<RunConfig> {
  const config = parseRunConfig(await loadJsonFile(filename), filename);
  log.debug(`Run configuration: ${config.workers} workers, ${config.identities.proxies.length} proxies`);
  return config;
}

/**
 * Clear the cache for a specific file or all files
 * @param filename - Optional filename to clear from cache. If not provided, clears all cache.
 */
export function clearCache(filename?: string): void {
  if (filename) {
    cache.delete(resolveDbPath(filename));
    log.debug(`Cleared cache for ${filename}`);
  } else {
    cache.clear();
    log.debug('Cleared all cache');
  }
}
