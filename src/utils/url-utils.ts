/**
 * URL utility functions
 */

import type { Stage } from '../types/task.js';

const ASIN_PATTERNS = [
  /\/dp\/([A-Z0-9]{10})(?:[/?#]|$)/,
  /\/gp\/product\/([A-Z0-9]{10})(?:[/?#]|$)/,
  /\/ASIN\/([A-Z0-9]{10})(?:[/?#]|$)/,
  /\/product-reviews\/([A-Z0-9]{10})(?:[/?#]|$)/
];

const BARE_ASIN = /^[A-Z0-9]{10}$/;

/**
 * Extract the 10-character product id (ASIN) from a product URL or a bare id
 * @returns ASIN, or null when the input carries none
 */
export function extractAsin(urlOrAsin: string): string | null {
  const value = urlOrAsin.trim();
  if (BARE_ASIN.test(value)) {
    return value;
  }

  for (const pattern of ASIN_PATTERNS) {
    const match = pattern.exec(value);
    if (match) {
      return match[1];
    }
  }
  return null;
}

/**
 * Ensure URL has protocol
 * @param url - URL that may or may not have protocol
 * @returns URL with https:// protocol
 */
export function ensureProtocol(url: string): string {
  if (url.startsWith('http://') || url.startsWith('https://')) {
    return url;
  }
  return `https://${url}`;
}

/**
 * Join a site-relative path and optional query onto the base URL
 */
export function buildUrl(baseUrl: string, path: string, params?: Record<string, string>): string {
  const url = new URL(path.startsWith('/') ? path : `/${path}`, ensureProtocol(baseUrl));
  for (const [key, value] of Object.entries(params ?? {})) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

/**
 * Turn a task target into the URL to load.
 *
 * Absolute URLs pass through; site paths are joined to the base URL; a bare
 * ASIN becomes its product or review page; anything else on the category
 * stage is treated as a search keyword.
 */
export function resolveTargetUrl(baseUrl: string, stage: Stage, target: string): string {
  if (target.startsWith('http://') || target.startsWith('https://')) {
    return target;
  }
  if (target.startsWith('/')) {
    return buildUrl(baseUrl, target);
  }

  if (BARE_ASIN.test(target)) {
    if (stage === 'REVIEW') return buildUrl(baseUrl, `/product-reviews/${target}`);
    if (stage === 'PRODUCT') return buildUrl(baseUrl, `/dp/${target}`);
  }

  if (stage === 'CATEGORY') {
    return buildUrl(baseUrl, '/s', { k: target });
  }

  throw new Error(`Cannot resolve ${stage} target to a URL: ${target}`);
}

/**
 * Validate if a string is a valid URL
 * @param str - String to validate
 * @returns True if valid URL
 */
export function isValidUrl(str: string): boolean {
  try {
    new URL(str);
    return true;
  } catch {
    return false;
  }
}
