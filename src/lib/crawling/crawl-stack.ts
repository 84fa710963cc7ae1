/**
 * Crawl Stack
 * Depth-tagged LIFO work stack for depth-first traversal without recursion
 */

export interface CrawlTask<TParent> {
  url: string;

  /**
   * Levels still allowed below this URL (0 = do not follow its links)
   */
  remainingDepth: number;

  /**
   * Node the result is attached to, or null for the seed
   */
  parent: TParent | null;
}

export class CrawlStack<TParent> {
  private tasks: CrawlTask<TParent>[] = [];

  push(task: CrawlTask<TParent>): void {
    this.tasks.push(task);
  }

  /**
   * Push tasks so that the first one is popped first
   */
  pushAll(tasks: CrawlTask<TParent>[]): void {
    for (let i = tasks.length - 1; i >= 0; i--) {
      this.tasks.push(tasks[i]);
    }
  }

  pop(): CrawlTask<TParent> | undefined {
    return this.tasks.pop();
  }

  isEmpty(): boolean {
    return this.tasks.length === 0;
  }

  size(): number {
    return this.tasks.length;
  }
}
