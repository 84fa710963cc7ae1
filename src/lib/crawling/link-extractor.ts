/**
 * Link Extractor
 * Collects candidate URLs from HTML with several independent strategies:
 * element attributes, meta refresh, inline CSS url() and a raw-text regex fallback.
 */

import * as cheerio from 'cheerio';
import { decodeHTML } from 'entities';
import { LinkExtractorOptions } from './crawling.types';
import { isInScope, isLocalFileUrl, isValidUrl, resolveUrl } from './url-classifier';

export const LINK_ATTRIBUTES = [
  'href',
  'src',
  'action',
  'data-href',
  'data-src',
  'data-url',
  'data-link',
] as const;

// Crawl pages also carry URLs in a custom click-handler attribute
export const CRAWL_LINK_ATTRIBUTES = [...LINK_ATTRIBUTES, 'oneclick'] as const;

const META_REFRESH_URL = /url=(\S+)/i;
const CSS_URL = /url\(([^)]+)\)/g;
const RAW_URL = /https?:\/\/[^\s"'<>]+/g;

/**
 * Strip surrounding whitespace and any mix of single/double quotes
 */
function stripQuotes(value: string): string {
  return value.trim().replace(/^['"]+|['"]+$/g, '');
}

export class LinkExtractor {
  constructor(private readonly options: LinkExtractorOptions) {}

  /**
   * Extract the set of accepted absolute URLs from an HTML document
   */
  extract(html: string, baseUrl: string): Set<string> {
    const $ = cheerio.load(html);
    const links = new Set<string>();

    const candidates = [
      ...this.fromAttributes($),
      ...this.fromMetaRefresh($),
      ...this.fromInlineCss(html),
      ...this.fromRawText(html),
    ];

    for (const candidate of candidates) {
      const absoluteUrl = resolveUrl(candidate, baseUrl);
      if (this.accepts(absoluteUrl, baseUrl)) {
        links.add(absoluteUrl);
      }
    }

    return links;
  }

  /**
   * Apply the scope policy to a resolved URL
   */
  accepts(url: string, baseUrl: string): boolean {
    if (this.options.scope === 'same-site') {
      return isInScope(url, baseUrl);
    }
    return isLocalFileUrl(url) || isValidUrl(url);
  }

  // Attribute values come back from the parser with entities already decoded
  private fromAttributes($: cheerio.CheerioAPI): string[] {
    const candidates: string[] = [];

    $('*').each((_, el) => {
      for (const attr of this.options.attributes) {
        const value = $(el).attr(attr)?.trim();
        if (value) {
          candidates.push(value);
        }
      }
    });

    return candidates;
  }

  private fromMetaRefresh($: cheerio.CheerioAPI): string[] {
    const candidates: string[] = [];

    $('meta[http-equiv]').each((_, el) => {
      const httpEquiv = $(el).attr('http-equiv') || '';
      if (httpEquiv.toLowerCase() !== 'refresh') return;

      const content = $(el).attr('content') || '';
      const match = META_REFRESH_URL.exec(content);
      if (!match) return;

      const url = stripQuotes(match[1]);
      if (url) {
        candidates.push(url);
      }
    });

    return candidates;
  }

  private fromInlineCss(html: string): string[] {
    const candidates: string[] = [];

    for (const match of html.matchAll(CSS_URL)) {
      const url = decodeHTML(stripQuotes(match[1]));
      if (url) {
        candidates.push(url);
      }
    }

    return candidates;
  }

  private fromRawText(html: string): string[] {
    return Array.from(html.matchAll(RAW_URL), (match) => decodeHTML(match[0]));
  }
}

/**
 * Extractor used by the crawl tree: same-site links plus the click-handler attribute
 */
export function createCrawlLinkExtractor(): LinkExtractor {
  return new LinkExtractor({ scope: 'same-site', attributes: CRAWL_LINK_ATTRIBUTES });
}

/**
 * Extractor used by the broken-link audit: every valid outbound link
 */
export function createAuditLinkExtractor(): LinkExtractor {
  return new LinkExtractor({ scope: 'any', attributes: LINK_ATTRIBUTES });
}
