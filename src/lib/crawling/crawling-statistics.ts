/**
 * Crawling Statistics Tracker
 * Track per-domain crawl statistics
 */

import { CrawlingStatistics } from './crawling.types';

export class CrawlingStatisticsTracker {
  private startTime: number;
  private endTime: number | null = null;
  private pagesClassified: number = 0;
  private pagesFailed: number = 0;
  private linksDiscovered: number = 0;
  private linksDropped: number = 0;
  private maxDepthReached: number = 0;
  private pageTimes: number[] = [];

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = now();
  }

  /**
   * Record a classified page
   */
  recordPageClassified(depth: number, time: number): void {
    this.pagesClassified++;
    this.maxDepthReached = Math.max(this.maxDepthReached, depth);
    this.pageTimes.push(time);
  }

  recordFailed(): void {
    this.pagesFailed++;
  }

  recordLinkDiscovery(count: number): void {
    this.linksDiscovered += count;
  }

  recordDropped(count: number = 1): void {
    this.linksDropped += count;
  }

  /**
   * Freeze totalTime at the current instant
   */
  finish(): void {
    this.endTime = this.now();
  }

  getStatistics(): CrawlingStatistics {
    const totalTime = (this.endTime ?? this.now()) - this.startTime;
    const averagePageTime =
      this.pageTimes.length > 0
        ? this.pageTimes.reduce((sum, time) => sum + time, 0) / this.pageTimes.length
        : 0;

    const totalAttempts = this.pagesClassified + this.pagesFailed;
    const successRate = totalAttempts > 0 ? this.pagesClassified / totalAttempts : 0;

    return {
      pagesClassified: this.pagesClassified,
      pagesFailed: this.pagesFailed,
      linksDiscovered: this.linksDiscovered,
      linksDropped: this.linksDropped,
      depthReached: this.maxDepthReached,
      totalTime,
      averagePageTime,
      successRate,
    };
  }
}
