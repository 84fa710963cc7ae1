/**
 * Linkmap Input Validation
 * Normalizes user-supplied depth values and seed URLs for the API and CLI
 */

import { isLocalFileUrl, isValidUrl } from '../../lib/crawling';

/**
 * Parse a max depth; anything that is not a whole number falls back to the default
 */
export function parseMaxDepth(value: unknown, fallback: number): number {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : fallback;
  }
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  return fallback;
}

export type SeedUrlCheck = { ok: true; url: string } | { ok: false; reason: string };

/**
 * Validate a seed URL: network URLs need a scheme and host,
 * local file URLs are only accepted when allowed
 */
export function checkSeedUrl(value: unknown, allowLocalFiles: boolean): SeedUrlCheck {
  if (typeof value !== 'string' || !value.trim()) {
    return { ok: false, reason: 'URL is required' };
  }

  const url = value.trim();
  if (isLocalFileUrl(url)) {
    return allowLocalFiles ? { ok: true, url } : { ok: false, reason: 'Local file URLs are not allowed' };
  }
  if (!isValidUrl(url)) {
    return { ok: false, reason: `Invalid URL format: ${url}` };
  }
  return { ok: true, url };
}
