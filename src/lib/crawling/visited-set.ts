/**
 * Visited Set
 * At-most-once ledger of URLs for a single traversal run
 */

export class VisitedSet {
  private visitedUrls: Set<string> = new Set();
  private duplicatesCount: number = 0;

  /**
   * Insert the URL if absent. Returns true when this call added it,
   * false when it was already visited.
   */
  markVisited(url: string): boolean {
    if (this.visitedUrls.has(url)) {
      this.duplicatesCount++;
      return false;
    }

    this.visitedUrls.add(url);
    return true;
  }

  /**
   * Get statistics
   */
  getStats(): { total: number; duplicates: number } {
    return {
      total: this.visitedUrls.size,
      duplicates: this.duplicatesCount,
    };
  }

  /**
   * Get all visited URLs, in visit order
   */
  getVisitedUrls(): string[] {
    return Array.from(this.visitedUrls);
  }

  size(): number {
    return this.visitedUrls.size;
  }
}
