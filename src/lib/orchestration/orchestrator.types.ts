/**
 * Orchestrator Types
 * Type definitions for multi-domain crawl orchestration
 */

import { CrawlConfig, DomainCrawlState } from '../crawling/crawling.types';
import { Logger } from '../logging';
import { ResultStore } from '../storage';

/**
 * Anything that can crawl a single domain
 */
export interface DomainCrawlRunner {
  crawlDomain(config: CrawlConfig, signal?: AbortSignal): Promise<DomainCrawlState>;
}

export interface OrchestratorDependencies {
  crawler: DomainCrawlRunner;
  store: ResultStore;
  logger: Logger;
}

export interface OrchestratorOptions {
  /**
   * Domains crawled side by side within one batch
   */
  maxConcurrentDomains: number;

  /**
   * Deadline for a whole crawlAll run in milliseconds (0 = none)
   */
  timeoutMs: number;
}
