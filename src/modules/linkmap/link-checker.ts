/**
 * Link Checker
 * Lightweight existence check for a single URL (HEAD, redirects followed).
 * Local file URLs are checked against the filesystem instead, when allowed.
 */

import { access } from 'fs/promises';
import { env } from '../../config/env';
import { fileUrlToPath, isLocalFileUrl } from '../../lib/crawling';
import { describeError } from '../../lib/fetching/errors';
import { fetchTransport } from './page-fetcher';
import type { HttpTransport, LinkCheckResult } from './linkmap.types';

export const LOCAL_FILES_NOT_ALLOWED = 'Local file URLs are not allowed';

export interface LinkCheckerOptions {
  errorStatusCodes?: Iterable<number>;
  allowLocalFiles?: boolean;
  transport?: HttpTransport;
  timeout?: number;
  userAgent?: string;
}

export class LinkChecker {
  readonly errorStatusCodes: ReadonlySet<number>;
  private readonly allowLocalFiles: boolean;
  private readonly transport: HttpTransport;
  private readonly timeout: number;
  private readonly userAgent: string;

  constructor(options: LinkCheckerOptions = {}) {
    this.errorStatusCodes = new Set(options.errorStatusCodes ?? env.ERROR_STATUS_CODES);
    this.allowLocalFiles = options.allowLocalFiles ?? env.ALLOW_LOCAL_FILES;
    this.transport = options.transport ?? fetchTransport;
    this.timeout = options.timeout ?? env.HTTP_TIMEOUT;
    this.userAgent = options.userAgent ?? env.USER_AGENT;
  }

  isErrorStatus(status: number | null): status is number {
    return status !== null && this.errorStatusCodes.has(status);
  }

  /**
   * Check a URL. A null status means the check itself failed and `error`
   * holds the reason; otherwise `error` is only set for error statuses.
   */
  async check(url: string): Promise<LinkCheckResult> {
    if (isLocalFileUrl(url) && !this.allowLocalFiles) {
      return { status: null, error: LOCAL_FILES_NOT_ALLOWED };
    }

    try {
      const status = isLocalFileUrl(url) ? await this.checkLocal(url) : await this.checkRemote(url);
      return { status, error: this.isErrorStatus(status) ? `Status ${status}` : '' };
    } catch (error) {
      return { status: null, error: describeError(error) };
    }
  }

  private async checkLocal(url: string): Promise<number> {
    try {
      await access(fileUrlToPath(url));
      return 200;
    } catch {
      return 404;
    }
  }

  private async checkRemote(url: string): Promise<number> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.transport(url, {
        method: 'HEAD',
        headers: { 'User-Agent': this.userAgent },
        redirect: 'follow',
        signal: controller.signal,
      });
      return response.status;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
