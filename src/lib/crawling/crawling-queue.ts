/**
 * Crawling Queue
 * FIFO work queue of scheduled pages for one domain
 */

import { CrawlPage } from './crawling.types';

export class CrawlingQueue {
  private queue: CrawlPage[] = [];

  /**
   * Add page to queue (BFS order)
   */
  enqueue(page: CrawlPage): void {
    this.queue.push(page);
  }

  /**
   * Get next page from queue (FIFO for BFS)
   */
  dequeue(): CrawlPage | null {
    return this.queue.shift() ?? null;
  }

  /**
   * Drop all pending pages, returning them
   */
  drain(): CrawlPage[] {
    const pending = this.queue;
    this.queue = [];
    return pending;
  }
}
