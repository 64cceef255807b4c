/**
 * Frontier Tracker
 * Per-domain scheduling gate over the seen-URL set
 */

import { CrawlConfig } from './crawling.types';

export type ScheduleRejection = 'depth' | 'duplicate' | 'budget';

/**
 * Check-and-insert for one URL. Returns the rejection reason, or null when
 * the URL was accepted and recorded as seen.
 *
 * Runs without yielding, so no other branch can observe the set between the
 * check and the insert.
 */
export function trySchedule(
  seenUrls: Set<string>,
  url: string,
  depth: number,
  config: CrawlConfig
): ScheduleRejection | null {
  if (depth > config.maxDepth) return 'depth';
  if (seenUrls.has(url)) return 'duplicate';
  if (seenUrls.size >= config.maxPages) return 'budget';

  seenUrls.add(url);
  return null;
}

export function shouldSchedule(
  seenUrls: Set<string>,
  url: string,
  depth: number,
  config: CrawlConfig
): boolean {
  return trySchedule(seenUrls, url, depth, config) === null;
}

export class FrontierTracker {
  private readonly config: CrawlConfig;
  private readonly seenUrls: Set<string>;
  private readonly rejections: Record<ScheduleRejection, number> = {
    depth: 0,
    duplicate: 0,
    budget: 0,
  };

  constructor(config: CrawlConfig, seenUrls: Set<string> = new Set()) {
    this.config = config;
    this.seenUrls = seenUrls;
  }

  /**
   * Accept the URL for scheduling and mark it seen, or reject it
   */
  shouldSchedule(url: string, depth: number): boolean {
    const rejection = trySchedule(this.seenUrls, url, depth, this.config);
    if (rejection) {
      this.rejections[rejection]++;
      return false;
    }
    return true;
  }

  /**
   * Whether any further URL could still be accepted
   */
  hasBudget(): boolean {
    return this.seenUrls.size < this.config.maxPages;
  }

  has(url: string): boolean {
    return this.seenUrls.has(url);
  }

  size(): number {
    return this.seenUrls.size;
  }

  getSeenUrls(): string[] {
    return Array.from(this.seenUrls);
  }

  getRejections(): Record<ScheduleRejection, number> {
    return { ...this.rejections };
  }

  totalRejections(): number {
    return this.rejections.depth + this.rejections.duplicate + this.rejections.budget;
  }
}
