/**
 * Page Fetcher
 * Loads a page over HTTP (GET) or from disk (file://) and parses it with Cheerio.
 * Fetch failures are logged as warnings and returned as values, never thrown.
 */

import * as cheerio from 'cheerio';
import { hasChildren, isTag, isText } from 'domhandler';
import type { AnyNode } from 'domhandler';
import { access, readFile } from 'fs/promises';
import { env } from '../../config/env';
import { LinkExtractor, fileUrlToPath, isLocalFileUrl, resolveUrl } from '../../lib/crawling';
import { FetchErrorType, FetchFailure, classifyError } from '../../lib/fetching/errors';
import type { FetchResult, HttpTransport, PageData, PageImage, PageSource } from './linkmap.types';

const NON_VISIBLE_TAGS = new Set(['script', 'style', 'template']);
const BOM = '\uFEFF';

export const fetchTransport: HttpTransport = (url, init) => fetch(url, init);

export interface PageFetcherOptions {
  extractor: LinkExtractor;
  transport?: HttpTransport;
  timeout?: number;
  userAgent?: string;
}

/**
 * Collect trimmed, non-empty text nodes in document order
 */
function collectText(nodes: AnyNode[], parts: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      const text = node.data.trim();
      if (text) parts.push(text);
    } else if (isTag(node) && NON_VISIBLE_TAGS.has(node.name)) {
      continue;
    } else if (hasChildren(node)) {
      collectText(node.children, parts);
    }
  }
}

export class PageFetcher implements PageSource {
  private readonly extractor: LinkExtractor;
  private readonly transport: HttpTransport;
  private readonly timeout: number;
  private readonly userAgent: string;

  constructor(options: PageFetcherOptions) {
    this.extractor = options.extractor;
    this.transport = options.transport ?? fetchTransport;
    this.timeout = options.timeout ?? env.HTTP_TIMEOUT;
    this.userAgent = options.userAgent ?? env.USER_AGENT;
  }

  async fetchPage(url: string): Promise<FetchResult> {
    try {
      const content = isLocalFileUrl(url) ? await this.readLocal(url) : await this.download(url);
      if (typeof content !== 'string') {
        console.warn(`Warning: ${content.message}`);
        return { ok: false, failure: content };
      }
      return { ok: true, page: this.parse(url, content) };
    } catch (error) {
      const failure = classifyError(error);
      console.warn(`Warning: Error fetching ${url}: ${failure.message}`);
      return { ok: false, failure };
    }
  }

  /**
   * Parse page content into title, visible text, images and links
   */
  parse(url: string, html: string): PageData {
    const $ = cheerio.load(html);

    const title = $('title').first().text().trim();

    const textParts: string[] = [];
    collectText($.root().toArray(), textParts);

    const images: PageImage[] = [];
    $('img[src]').each((_, el) => {
      images.push({
        originalUrl: resolveUrl($(el).attr('src') || '', url),
        altText: ($(el).attr('alt') || '').trim(),
      });
    });

    return {
      url,
      title,
      text: textParts.join(' '),
      images,
      links: this.extractor.extract(html, url),
    };
  }

  private async readLocal(url: string): Promise<string | FetchFailure> {
    const path = fileUrlToPath(url);

    try {
      await access(path);
    } catch {
      return { type: FetchErrorType.NOT_FOUND, message: `Local file not found: ${url}` };
    }

    const content = await readFile(path, 'utf-8');
    return content.startsWith(BOM) ? content.slice(BOM.length) : content;
  }

  private async download(url: string): Promise<string | FetchFailure> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.transport(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.userAgent,
          'Accept': 'text/html, */*',
        },
        redirect: 'follow',
        signal: controller.signal,
      });

      if (response.status !== 200) {
        return {
          type: FetchErrorType.HTTP_STATUS,
          message: `Received status code ${response.status} for URL: ${url}`,
          statusCode: response.status,
        };
      }

      // Response.text() always decodes as UTF-8
      return await response.text();
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
