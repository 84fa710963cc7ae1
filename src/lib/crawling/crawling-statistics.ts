/**
 * Crawling Statistics Tracker
 * Counters collected while a link tree is built
 */

import { CrawlingStatistics } from './crawling.types';

export class CrawlingStatisticsTracker {
  private startTime: number;
  private pagesVisited: number = 0;
  private pagesFailed: number = 0;
  private duplicatesSkipped: number = 0;
  private linksDiscovered: number = 0;
  private maxDepthReached: number = 0;

  constructor() {
    this.startTime = Date.now();
  }

  /**
   * Record a successfully fetched page at the given level
   */
  recordPageVisit(depth: number): void {
    this.pagesVisited++;
    this.maxDepthReached = Math.max(this.maxDepthReached, depth);
  }

  recordFailed(): void {
    this.pagesFailed++;
  }

  recordDuplicate(): void {
    this.duplicatesSkipped++;
  }

  recordLinkDiscovery(count: number): void {
    this.linksDiscovered += count;
  }

  /**
   * Get final statistics
   */
  getStatistics(): CrawlingStatistics {
    const totalAttempts = this.pagesVisited + this.pagesFailed;
    const successRate = totalAttempts > 0 ? this.pagesVisited / totalAttempts : 0;

    return {
      pagesVisited: this.pagesVisited,
      pagesFailed: this.pagesFailed,
      duplicatesSkipped: this.duplicatesSkipped,
      linksDiscovered: this.linksDiscovered,
      depthReached: this.maxDepthReached,
      totalTime: Date.now() - this.startTime,
      successRate,
    };
  }
}
