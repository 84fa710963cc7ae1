/**
 * Linkmap Controller
 * HTTP request/response handling for crawl-tree and broken-link endpoints
 */

import { Request, Response } from 'express';
import { env } from '../../config/env';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import { linkmapService } from './linkmap.service';
import { toBrokenLinksCsv, toUniqueLinksCsv } from './linkmap.export';
import { checkSeedUrl, parseMaxDepth } from './linkmap.validation';
import type { ICreateScanRequest, ICreateTreeRequest, IScanResponse, ITreeResponse } from './linkmap.types';

function wantsCsv(req: Request): boolean {
  return req.query.format === 'csv';
}

function requireSeedUrl(value: unknown): string {
  const check = checkSeedUrl(value, env.ALLOW_LOCAL_FILES);
  if (!check.ok) {
    throw new ApiError(400, check.reason);
  }
  return check.url;
}

export class LinkmapController {
  /**
   * POST /api/linkmap/tree
   * Crawl a site into a depth-bounded link tree
   */
  createTree = asyncHandler(async (req: Request, res: Response) => {
    const body: ICreateTreeRequest = req.body ?? {};
    const url = requireSeedUrl(body.url);
    const maxDepth = parseMaxDepth(body.maxDepth, env.DEFAULT_MAX_DEPTH);

    const result = await linkmapService.crawlTree(url, maxDepth);

    if (wantsCsv(req)) {
      res.type('text/csv').send(toUniqueLinksCsv(result.tree));
      return;
    }

    const response: ITreeResponse = {
      success: true,
      ...result,
    };

    res.json(response);
  });

  /**
   * POST /api/linkmap/broken-links
   * Report broken links reachable from a list of seed pages
   */
  scanBrokenLinks = asyncHandler(async (req: Request, res: Response) => {
    const body: ICreateScanRequest = req.body ?? {};

    if (!Array.isArray(body.urls) || body.urls.length === 0) {
      throw new ApiError(400, 'urls must be a non-empty array');
    }

    const urls = body.urls.map((url: unknown) => requireSeedUrl(url));
    const records = await linkmapService.scanBrokenLinks(urls);

    if (wantsCsv(req)) {
      res.type('text/csv').send(toBrokenLinksCsv(records));
      return;
    }

    const response: IScanResponse = {
      success: true,
      records,
      total: records.length,
    };

    res.json(response);
  });
}

export const linkmapController = new LinkmapController();
