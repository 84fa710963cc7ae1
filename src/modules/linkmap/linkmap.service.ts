/**
 * Linkmap Service
 * Wires fetchers, the tree builder and the link-health scanner for both modes
 */

import { env } from '../../config/env';
import { createAuditLinkExtractor, createCrawlLinkExtractor } from '../../lib/crawling';
import { LinkChecker } from './link-checker';
import { LinkHealthScanner } from './link-health.scanner';
import { PageFetcher } from './page-fetcher';
import { TreeBuilder } from './tree-builder';
import type { BrokenLinkRecord, HttpTransport, LinkTreeResult } from './linkmap.types';

export interface LinkmapServiceOptions {
  transport?: HttpTransport;
  timeout?: number;
  errorStatusCodes?: Iterable<number>;
  allowLocalFiles?: boolean;
  pageConcurrency?: number;
  linkConcurrency?: number;
}

export class LinkmapService {
  private readonly treeBuilder: TreeBuilder;
  private readonly scanner: LinkHealthScanner;

  constructor(options: LinkmapServiceOptions = {}) {
    const { transport, timeout } = options;

    this.treeBuilder = new TreeBuilder(
      new PageFetcher({ extractor: createCrawlLinkExtractor(), transport, timeout })
    );

    this.scanner = new LinkHealthScanner(
      new PageFetcher({ extractor: createAuditLinkExtractor(), transport, timeout }),
      new LinkChecker({
        errorStatusCodes: options.errorStatusCodes,
        allowLocalFiles: options.allowLocalFiles,
        transport,
        timeout,
      }),
      { pageConcurrency: options.pageConcurrency, linkConcurrency: options.linkConcurrency }
    );
  }

  /**
   * Build the link tree rooted at `url`, `maxDepth` levels deep
   */
  async crawlTree(url: string, maxDepth: number = env.DEFAULT_MAX_DEPTH): Promise<LinkTreeResult> {
    const result = await this.treeBuilder.build(url, maxDepth);
    const { pagesVisited, pagesFailed, totalTime } = result.statistics;
    console.log(`Link tree for ${url}: ${pagesVisited} page(s), ${pagesFailed} failed, ${totalTime}ms`);
    return result;
  }

  /**
   * Check every seed page and its links; only error-status records are returned
   */
  async scanBrokenLinks(urls: readonly string[]): Promise<BrokenLinkRecord[]> {
    const records = await this.scanner.scanAll(urls);
    console.log(`Broken-link scan of ${urls.length} URL(s) found ${records.length} broken link(s)`);
    return records;
  }
}

export const linkmapService = new LinkmapService();
