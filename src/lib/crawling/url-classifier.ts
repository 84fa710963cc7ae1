/**
 * URL Classification Utilities
 * Parsing, validation and crawl-scope checks for URL strings.
 * URLs are compared as written: no trailing-slash, case or default-port normalization.
 */

import { fileURLToPath } from 'url';
import { ParsedUrl } from './crawling.types';

export const LOCAL_FILE_PREFIX = 'file://';

// Generic URI split from RFC 3986, appendix B
const URI_PATTERN = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/s;

/**
 * Split a URL string into its components without normalizing any of them
 */
export function parseUrl(url: string): ParsedUrl {
  const match = URI_PATTERN.exec(url);
  if (!match) {
    return { scheme: '', netloc: '', path: url, query: '', fragment: '' };
  }

  return {
    scheme: (match[1] ?? '').toLowerCase(),
    netloc: match[2] ?? '',
    path: match[3] ?? '',
    query: match[4] ?? '',
    fragment: match[5] ?? '',
  };
}

/**
 * A URL is valid when it has both a scheme and a network location
 */
export function isValidUrl(url: string): boolean {
  const { scheme, netloc } = parseUrl(url);
  return scheme.length > 0 && netloc.length > 0;
}

export function isLocalFileUrl(url: string): boolean {
  return url.startsWith(LOCAL_FILE_PREFIX);
}

/**
 * Network location (host plus optional port and credentials) as written
 */
export function getNetloc(url: string): string {
  return parseUrl(url).netloc;
}

/**
 * Check whether a candidate belongs to the same crawl scope as the base URL.
 * Local files are always in scope; network URLs must share the base's exact netloc.
 */
export function isInScope(candidate: string, baseUrl: string): boolean {
  if (isLocalFileUrl(candidate)) {
    return true;
  }
  return isValidUrl(candidate) && getNetloc(candidate) === getNetloc(baseUrl);
}

/**
 * Resolve relative URL to absolute
 */
export function resolveUrl(url: string, baseUrl: string): string {
  try {
    if (url.startsWith('http://') || url.startsWith('https://')) {
      return url;
    }
    return new URL(url, baseUrl).href;
  } catch {
    return url;
  }
}

/**
 * Convert a file:// URL into a decoded local filesystem path
 */
export function fileUrlToPath(url: string): string {
  try {
    return fileURLToPath(url);
  } catch {
    // Hosts other than localhost are rejected by fileURLToPath; fall back to the raw path
    return decodeURIComponent(parseUrl(url).path);
  }
}
