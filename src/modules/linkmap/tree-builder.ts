/**
 * Tree Builder
 * Depth-bounded, depth-first crawl producing a deduplicated link tree.
 *
 * Walks an explicit work stack instead of recursing. A URL is checked against
 * the visited set when its task is popped, so visit order and child order are
 * the same as a recursive pre-order walk over each page's sorted links.
 */

import {
  CrawlStack,
  CrawlingStatisticsTracker,
  VisitedSet,
  getNetloc,
  isLocalFileUrl,
} from '../../lib/crawling';
import type { LinkTreeResult, PageSource, TreeNode } from './linkmap.types';

interface TreeNodeDraft {
  url: string;
  title: string;
  links: string[];
  children: TreeNodeDraft[];
}

/**
 * Follow rule for a traversal rooted at `seedUrl`: file roots only follow
 * file links; network roots only follow links on the exact same netloc.
 */
export function createScopeFilter(seedUrl: string): (link: string) => boolean {
  if (isLocalFileUrl(seedUrl)) {
    return (link) => isLocalFileUrl(link);
  }
  const baseNetloc = getNetloc(seedUrl);
  return (link) => !isLocalFileUrl(link) && getNetloc(link) === baseNetloc;
}

export class TreeBuilder {
  constructor(private readonly pages: PageSource) {}

  async build(seedUrl: string, maxDepth: number, visited: VisitedSet = new VisitedSet()): Promise<LinkTreeResult> {
    const statistics = new CrawlingStatisticsTracker();
    const inScope = createScopeFilter(seedUrl);
    const stack = new CrawlStack<TreeNodeDraft>();
    let root: TreeNodeDraft | null = null;

    stack.push({ url: seedUrl, remainingDepth: maxDepth, parent: null });

    while (!stack.isEmpty()) {
      const task = stack.pop();
      if (!task) break;

      if (!visited.markVisited(task.url)) {
        statistics.recordDuplicate();
        continue;
      }

      console.log(`Scraping: ${task.url}`);
      const result = await this.pages.fetchPage(task.url);
      if (!result.ok) {
        statistics.recordFailed();
        continue;
      }

      const links = Array.from(result.page.links).sort();
      const node: TreeNodeDraft = {
        url: result.page.url,
        title: result.page.title,
        links,
        children: [],
      };

      statistics.recordPageVisit(maxDepth - task.remainingDepth);
      statistics.recordLinkDiscovery(links.length);

      if (task.parent) {
        task.parent.children.push(node);
      } else {
        root = node;
      }

      if (task.remainingDepth > 0) {
        stack.pushAll(
          links
            .filter(inScope)
            .map((link) => ({ url: link, remainingDepth: task.remainingDepth - 1, parent: node }))
        );
      }
    }

    const tree: TreeNode | null = root;
    return { tree, statistics: statistics.getStatistics() };
  }
}

/**
 * Collect every unique URL in the tree with its title, in pre-order.
 * The first title seen for a URL wins.
 */
export function flattenTree(tree: TreeNode | null): Map<string, string> {
  const uniqueLinks = new Map<string, string>();
  if (!tree) return uniqueLinks;

  const pending: TreeNode[] = [tree];
  while (pending.length > 0) {
    const node = pending.pop();
    if (!node) break;

    if (node.url && !uniqueLinks.has(node.url)) {
      uniqueLinks.set(node.url, node.title);
    }
    for (let i = node.children.length - 1; i >= 0; i--) {
      pending.push(node.children[i]);
    }
  }

  return uniqueLinks;
}
