/**
 * Crawling Types
 * Type definitions for the product URL crawler
 */

/**
 * Per-domain crawl configuration (see createCrawlConfig)
 */
export interface CrawlConfig {
  /**
   * Bare host, no scheme
   */
  readonly domain: string;

  /**
   * Patterns that mark a URL as product-like, matched case-insensitively
   */
  readonly productPatterns: readonly RegExp[];

  /**
   * Maximum crawl depth (0 = seed only)
   */
  readonly maxDepth: number;

  /**
   * Maximum number of URLs scheduled for the domain
   */
  readonly maxPages: number;
}

/**
 * Raw configuration input, before validation
 */
export interface CrawlConfigInput {
  domain: string;
  productPatterns?: string[];
  maxDepth?: number;
  maxPages?: number;
}

export interface ClassificationResult {
  isProduct: boolean;

  /**
   * Sum of the fired rule weights, in [0, 1]
   */
  confidence: number;

  /**
   * Names of the rules that fired
   */
  signals: string[];
}

export type PageVisitStatus = 'pending' | 'fetching' | 'classified' | 'failed';

/**
 * Crawl page interface
 */
export interface CrawlPage {
  url: string;

  /**
   * Crawl depth (0 = seed page)
   */
  depth: number;
}

/**
 * Outcome of a single page visit
 */
export interface PageVisit {
  url: string;
  depth: number;
  status: PageVisitStatus;
  statusCode?: number;

  /**
   * Where the fetch ended up, when redirects moved it. Links still resolve
   * against url.
   */
  finalUrl?: string;

  confidence?: number;
  error?: string;
}

/**
 * Detailed statistics for one domain crawl
 */
export interface CrawlingStatistics {
  pagesClassified: number;
  pagesFailed: number;

  /**
   * Same-host links found across all classified pages
   */
  linksDiscovered: number;

  /**
   * Links rejected by the frontier (already seen, too deep or over budget)
   */
  linksDropped: number;

  depthReached: number;

  /**
   * Total crawling time in milliseconds
   */
  totalTime: number;

  /**
   * Average fetch-to-classified time per page in milliseconds
   */
  averagePageTime: number;

  /**
   * Classified pages over fetched pages (0-1)
   */
  successRate: number;
}

export interface DomainCrawlState {
  domain: string;
  seedUrl: string;

  /**
   * Every URL ever scheduled, regardless of outcome
   */
  seenUrls: Set<string>;

  /**
   * Confirmed product pages (always a subset of seenUrls)
   */
  productUrls: Set<string>;

  pages: Map<string, PageVisit>;
  statistics: CrawlingStatistics;

  /**
   * Set when the crawl failed or was cancelled at the domain level
   */
  error?: string;
}

/**
 * Summary view returned to callers
 */
export interface DomainStatistics {
  productUrlCount: number;
  totalPagesCrawled: number;
}

export type CrawlStatistics = Record<string, DomainStatistics>;

/**
 * Persisted result shape: domain -> sorted product URLs
 */
export type CrawlResults = Record<string, string[]>;
