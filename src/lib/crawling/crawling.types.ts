/**
 * Crawling Types
 * Type definitions for link discovery and traversal
 */

/**
 * URL components as written in the source string
 */
export interface ParsedUrl {
  scheme: string;
  netloc: string;
  path: string;
  query: string;
  fragment: string;
}

/**
 * Which discovered URLs the extractor keeps.
 * - same-site: local files, or network URLs on the base URL's host (crawl tree)
 * - any: every valid or local-file URL (broken-link audit)
 */
export type LinkScope = 'same-site' | 'any';

/**
 * Link extractor configuration
 */
export interface LinkExtractorOptions {
  scope: LinkScope;

  /**
   * Element attributes scanned for URLs
   */
  attributes: readonly string[];
}

/**
 * Crawling statistics interface
 */
export interface CrawlingStatistics {
  /**
   * Number of pages fetched successfully
   */
  pagesVisited: number;

  /**
   * Number of pages whose fetch failed
   */
  pagesFailed: number;

  /**
   * Number of URLs skipped because they were already visited
   */
  duplicatesSkipped: number;

  /**
   * Number of links discovered across all fetched pages
   */
  linksDiscovered: number;

  /**
   * Deepest level that produced a node (0 = seed page)
   */
  depthReached: number;

  /**
   * Total crawling time in milliseconds
   */
  totalTime: number;

  /**
   * Success rate (0-1)
   */
  successRate: number;
}
