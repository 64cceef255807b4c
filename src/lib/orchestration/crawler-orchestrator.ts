/**
 * Crawler Orchestrator
 * Runs domain crawls in bounded batches and aggregates their results
 */

import { describeError } from '../crawling/crawl-errors';
import { seedUrlFor } from '../crawling/url-normalizer';
import {
  CrawlConfig,
  CrawlResults,
  CrawlStatistics,
  CrawlingStatistics,
  DomainCrawlState,
} from '../crawling/crawling.types';
import { DomainCrawler } from '../crawling/domain-crawler';
import { env } from '../../config/env';
import { HttpPageFetcher } from '../http';
import { Logger } from '../logging';
import { ResultStore, timestampedFilename } from '../storage';
import {
  DomainCrawlRunner,
  OrchestratorDependencies,
  OrchestratorOptions,
} from './orchestrator.types';

export class CrawlerOrchestrator {
  private readonly crawler: DomainCrawlRunner;
  private readonly store: ResultStore;
  private readonly logger: Logger;
  private readonly options: OrchestratorOptions;
  private results: Map<string, DomainCrawlState> = new Map();

  constructor(dependencies: OrchestratorDependencies, options: Partial<OrchestratorOptions> = {}) {
    this.crawler = dependencies.crawler;
    this.store = dependencies.store;
    this.logger = dependencies.logger;
    this.options = {
      maxConcurrentDomains: options.maxConcurrentDomains || 5,
      timeoutMs: options.timeoutMs || 0,
    };
  }

  /**
   * Crawl all configured domains, maxConcurrentDomains at a time.
   * Each batch finishes before the next one starts.
   */
  async crawlAll(
    configs: CrawlConfig[],
    maxConcurrentDomains: number = this.options.maxConcurrentDomains,
    signal?: AbortSignal
  ): Promise<Map<string, DomainCrawlState>> {
    const batchSize = Math.max(1, Math.floor(maxConcurrentDomains));
    const controller = new AbortController();

    const onExternalAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    let deadline: NodeJS.Timeout | undefined;
    if (this.options.timeoutMs > 0) {
      deadline = setTimeout(() => {
        this.logger.warn(`Crawl deadline of ${this.options.timeoutMs}ms reached, cancelling`);
        controller.abort();
      }, this.options.timeoutMs);
    }

    const unique = this.uniqueByDomain(configs);

    try {
      for (let i = 0; i < unique.length; i += batchSize) {
        const batch = unique.slice(i, i + batchSize);
        const states = await Promise.all(
          batch.map((config) => this.crawlSafely(config, controller.signal))
        );
        for (const state of states) {
          this.results.set(state.domain, state);
        }
      }
    } finally {
      if (deadline) clearTimeout(deadline);
      signal?.removeEventListener('abort', onExternalAbort);
    }

    return this.results;
  }

  /**
   * First config wins when a domain is listed more than once
   */
  private uniqueByDomain(configs: CrawlConfig[]): CrawlConfig[] {
    const seen = new Set<string>();
    return configs.filter((config) => {
      if (seen.has(config.domain)) {
        this.logger.warn(`Skipping duplicate domain ${config.domain}`);
        return false;
      }
      seen.add(config.domain);
      return true;
    });
  }

  /**
   * Domain boundary: a failing domain yields an empty state with its error
   */
  private async crawlSafely(config: CrawlConfig, signal: AbortSignal): Promise<DomainCrawlState> {
    try {
      return await this.crawler.crawlDomain(config, signal);
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`Error crawling site ${config.domain}: ${message}`);
      return {
        domain: config.domain,
        seedUrl: seedUrlFor(config.domain),
        seenUrls: new Set(),
        productUrls: new Set(),
        pages: new Map(),
        statistics: emptyStatistics(),
        error: message,
      };
    }
  }

  getStatistics(): CrawlStatistics {
    const statistics: CrawlStatistics = {};
    for (const [domain, state] of this.results) {
      statistics[domain] = {
        productUrlCount: state.productUrls.size,
        totalPagesCrawled: state.seenUrls.size,
      };
    }
    return statistics;
  }

  getDetailedStatistics(): Record<string, CrawlingStatistics & { error?: string }> {
    const statistics: Record<string, CrawlingStatistics & { error?: string }> = {};
    for (const [domain, state] of this.results) {
      statistics[domain] = { ...state.statistics, error: state.error };
    }
    return statistics;
  }

  /**
   * Domain -> sorted product URLs
   */
  getResults(): CrawlResults {
    const results: CrawlResults = {};
    for (const [domain, state] of this.results) {
      results[domain] = Array.from(state.productUrls).sort();
    }
    return results;
  }

  getDomainState(domain: string): DomainCrawlState | null {
    return this.results.get(domain) || null;
  }

  async saveResults(filename: string = timestampedFilename()): Promise<string | null> {
    return this.store.save(filename, this.getResults());
  }
}

function emptyStatistics(): CrawlingStatistics {
  return {
    pagesClassified: 0,
    pagesFailed: 0,
    linksDiscovered: 0,
    linksDropped: 0,
    depthReached: 0,
    totalTime: 0,
    averagePageTime: 0,
    successRate: 0,
  };
}

/**
 * Orchestrator wired to the HTTP fetcher and file store, configured from env
 */
export function createCrawlerOrchestrator(logger: Logger): CrawlerOrchestrator {
  const crawler = new DomainCrawler({
    fetcher: new HttpPageFetcher(),
    logger,
    concurrency: env.CRAWL_CONCURRENT_PAGES,
  });

  return new CrawlerOrchestrator(
    { crawler, store: new ResultStore(logger), logger },
    {
      maxConcurrentDomains: env.CRAWL_CONCURRENT_SITES,
      timeoutMs: env.CRAWL_TIMEOUT_MS,
    }
  );
}
