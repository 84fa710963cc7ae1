/**
 * Link-Health Scanner
 * Fetches each seed page and checks the page and every link on it,
 * keeping only results whose status is in the checker's error-status set.
 *
 * Two bounded pools: seeds fan out over the page pool, and each page's links
 * fan out over their own link pool. Records are collected in completion order.
 */

import pLimit from 'p-limit';
import { env } from '../../config/env';
import { describeError } from '../../lib/fetching/errors';
import { LinkChecker } from './link-checker';
import type { BrokenLinkRecord, LinkCheckResult, PageSource } from './linkmap.types';

export const BROKEN_MAIN_PAGE = 'Broken main page';

export interface LinkHealthScannerOptions {
  pageConcurrency?: number;
  linkConcurrency?: number;
}

export class LinkHealthScanner {
  private readonly pageConcurrency: number;
  private readonly linkConcurrency: number;

  constructor(
    private readonly pages: PageSource,
    private readonly checker: LinkChecker,
    options: LinkHealthScannerOptions = {}
  ) {
    this.pageConcurrency = Math.max(1, options.pageConcurrency ?? env.SCAN_PAGE_CONCURRENCY);
    this.linkConcurrency = Math.max(1, options.linkConcurrency ?? env.SCAN_LINK_CONCURRENCY);
  }

  /**
   * Scan every seed URL; the result is in task-completion order
   */
  async scanAll(urls: readonly string[]): Promise<BrokenLinkRecord[]> {
    const limit = pLimit(this.pageConcurrency);
    const records: BrokenLinkRecord[] = [];

    console.log(`Processing ${urls.length} URLs concurrently...`);
    await Promise.all(
      urls.map((url) =>
        limit(() => this.scanPage(url)).then((pageRecords) => {
          records.push(...pageRecords);
        })
      )
    );

    return records;
  }

  /**
   * Scan a single page, one level deep
   */
  async scanPage(url: string): Promise<BrokenLinkRecord[]> {
    const records: BrokenLinkRecord[] = [];
    console.log(`Processing: ${url}`);

    const result = await this.pages.fetchPage(url);
    if (!result.ok) {
      return records;
    }

    const main = await this.safeCheck(url);
    if (this.checker.isErrorStatus(main.status)) {
      records.push({
        parentUrl: url,
        brokenLink: url,
        status: main.status,
        error: main.error || BROKEN_MAIN_PAGE,
      });
    }

    const links = Array.from(result.page.links);
    console.log(`Found ${links.length} links on ${url}. Checking concurrently...`);

    const limit = pLimit(this.linkConcurrency);
    await Promise.all(
      links.map((link) =>
        limit(() => this.safeCheck(link)).then(({ status, error }) => {
          // Checks without a status (transport failures) are not reported
          if (this.checker.isErrorStatus(status)) {
            records.push({ parentUrl: url, brokenLink: link, status, error });
          }
        })
      )
    );

    return records;
  }

  private async safeCheck(url: string): Promise<LinkCheckResult> {
    try {
      return await this.checker.check(url);
    } catch (error) {
      return { status: null, error: describeError(error) };
    }
  }
}
