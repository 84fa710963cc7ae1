/**
 * Linkmap Module Types
 * Page data, link tree and broken-link records shared by the crawl and audit modes
 */

import { CrawlingStatistics } from '../../lib/crawling';
import { FetchFailure } from '../../lib/fetching/errors';

// ============================================================================
// Transport
// ============================================================================

export type HttpMethod = 'GET' | 'HEAD';

export interface HttpRequestInit {
  method: HttpMethod;
  headers: Record<string, string>;
  redirect: 'follow';
  signal: AbortSignal;
}

/**
 * The part of a fetch Response the fetcher and checker read
 */
export interface HttpResponse {
  status: number;
  text(): Promise<string>;
}

export type HttpTransport = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

// ============================================================================
// Pages
// ============================================================================

export interface PageImage {
  originalUrl: string;
  altText: string;
}

export interface PageData {
  readonly url: string;
  readonly title: string;
  readonly text: string;
  readonly images: readonly PageImage[];
  readonly links: ReadonlySet<string>;
}

export type FetchResult =
  | { ok: true; page: PageData }
  | { ok: false; failure: FetchFailure };

/**
 * Anything that can turn a URL into page data
 */
export interface PageSource {
  fetchPage(url: string): Promise<FetchResult>;
}

// ============================================================================
// Crawl tree
// ============================================================================

export interface TreeNode {
  readonly url: string;
  readonly title: string;
  readonly links: readonly string[];
  readonly children: readonly TreeNode[];
}

export interface LinkTreeResult {
  tree: TreeNode | null;
  statistics: CrawlingStatistics;
}

// ============================================================================
// Link health
// ============================================================================

export interface LinkCheckResult {
  /**
   * Final status code, or null when it could not be determined
   */
  status: number | null;
  error: string;
}

export interface BrokenLinkRecord {
  parentUrl: string;
  brokenLink: string;
  status: number | null;
  error: string;
}

// ============================================================================
// API
// ============================================================================

export interface ICreateTreeRequest {
  url?: unknown;
  maxDepth?: unknown;
}

export interface ICreateScanRequest {
  urls?: unknown;
}

export interface ITreeResponse extends LinkTreeResult {
  success: true;
}

export interface IScanResponse {
  success: true;
  records: BrokenLinkRecord[];
  total: number;
}
