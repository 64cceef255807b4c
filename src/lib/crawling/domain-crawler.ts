/**
 * Domain Crawler
 * Bounded worker-pool traversal of one domain: fetch, classify, expand.
 *
 * All bookkeeping (seen set, product set, queue) is touched only between
 * awaits, so mutations from different workers never interleave.
 */

import { Logger } from '../logging';
import { PageFetcher } from '../http/http.types';
import { FetchErrorType, classifyFetchError, describeError } from './crawl-errors';
import { CrawlingQueue } from './crawling-queue';
import { CrawlingStatisticsTracker } from './crawling-statistics';
import { CrawlConfig, CrawlPage, DomainCrawlState, PageVisit } from './crawling.types';
import { FrontierTracker } from './frontier-tracker';
import { LinkExtractor, extractLinks } from './link-discoverer';
import { ProductClassifier, createProductClassifier } from './product-classifier';
import { seedUrlFor } from './url-normalizer';

export interface DomainCrawlerOptions {
  fetcher: PageFetcher;
  logger: Logger;

  /**
   * Concurrent fetches per domain
   */
  concurrency: number;

  linkExtractor?: LinkExtractor;

  /**
   * Builds the classifier for a domain's product patterns
   */
  classifierFactory?: (config: CrawlConfig) => ProductClassifier;
}

/**
 * Mutable run state shared by the workers of one domain crawl
 */
interface CrawlRun {
  state: DomainCrawlState;
  frontier: FrontierTracker;
  queue: CrawlingQueue;
  stats: CrawlingStatisticsTracker;
  classify: ProductClassifier;
  signal?: AbortSignal;
  active: number;
  waiters: Array<() => void>;
}

export class DomainCrawler {
  private readonly fetcher: PageFetcher;
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly linkExtractor: LinkExtractor;
  private readonly classifierFactory: (config: CrawlConfig) => ProductClassifier;

  constructor(options: DomainCrawlerOptions) {
    this.fetcher = options.fetcher;
    this.logger = options.logger;
    this.concurrency = Math.max(1, Math.floor(options.concurrency));
    this.linkExtractor = options.linkExtractor ?? extractLinks;
    this.classifierFactory =
      options.classifierFactory ?? ((config) => createProductClassifier(config.productPatterns));
  }

  /**
   * Crawl one domain to completion. Resolves once every scheduled page has
   * been fetched or failed (or the signal aborted); never rejects.
   */
  async crawlDomain(config: CrawlConfig, signal?: AbortSignal): Promise<DomainCrawlState> {
    const seedUrl = seedUrlFor(config.domain);
    const stats = new CrawlingStatisticsTracker();
    const state: DomainCrawlState = {
      domain: config.domain,
      seedUrl,
      seenUrls: new Set(),
      productUrls: new Set(),
      pages: new Map(),
      statistics: stats.getStatistics(),
    };

    let run: CrawlRun | null = null;
    const onAbort = () => {
      if (run) this.wake(run);
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    this.logger.info(`Crawling ${config.domain}`, {
      seed: seedUrl,
      maxDepth: config.maxDepth,
      maxPages: config.maxPages,
    });

    try {
      const current: CrawlRun = {
        state,
        frontier: new FrontierTracker(config, state.seenUrls),
        queue: new CrawlingQueue(),
        stats,
        classify: this.classifierFactory(config),
        signal,
        active: 0,
        waiters: [],
      };
      run = current;

      this.schedule(current, { url: seedUrl, depth: 0 });

      const workers = Array.from({ length: this.concurrency }, () => this.runWorker(current));
      await Promise.all(workers);

      if (signal?.aborted) {
        const dropped = current.queue.drain();
        stats.recordDropped(dropped.length);
        state.error = 'cancelled';
        this.logger.warn(`Crawl of ${config.domain} cancelled`, { pendingPages: dropped.length });
      }
    } catch (error) {
      state.error = describeError(error);
      this.logger.error(`Error crawling site ${config.domain}: ${state.error}`);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (run) stats.recordDropped(run.frontier.totalRejections());
      stats.finish();
      state.statistics = stats.getStatistics();
    }

    this.logger.info(`Finished ${config.domain}`, {
      pagesCrawled: state.seenUrls.size,
      productUrls: state.productUrls.size,
    });

    return state;
  }

  /**
   * Offer a page to the frontier; accepted pages are queued as pending
   */
  private schedule(run: CrawlRun, page: CrawlPage): boolean {
    if (!run.frontier.shouldSchedule(page.url, page.depth)) {
      return false;
    }

    run.state.pages.set(page.url, { url: page.url, depth: page.depth, status: 'pending' });
    run.queue.enqueue(page);
    this.wake(run);
    return true;
  }

  private async runWorker(run: CrawlRun): Promise<void> {
    for (;;) {
      if (run.signal?.aborted) return;

      const page = run.queue.dequeue();
      if (page) {
        run.active++;
        try {
          await this.visitPage(run, page);
        } finally {
          run.active--;
          this.wake(run);
        }
        continue;
      }

      // Nothing queued and nothing in flight: the domain is exhausted
      if (run.active === 0) return;

      await new Promise<void>((resolve) => run.waiters.push(resolve));
    }
  }

  private wake(run: CrawlRun): void {
    const waiters = run.waiters;
    run.waiters = [];
    waiters.forEach((resolve) => resolve());
  }

  /**
   * Pending -> Fetching -> Classified | Failed
   */
  private async visitPage(run: CrawlRun, page: CrawlPage): Promise<void> {
    const visit: PageVisit = { url: page.url, depth: page.depth, status: 'fetching' };
    run.state.pages.set(page.url, visit);
    const startTime = Date.now();

    const html = await this.fetchPage(run, visit);
    if (html === null) return;

    try {
      const result = run.classify(page.url, html);
      visit.status = 'classified';
      visit.confidence = result.confidence;
      run.stats.recordPageClassified(page.depth, Date.now() - startTime);

      if (result.isProduct) {
        run.state.productUrls.add(page.url);
        this.logger.info(`Found product URL: ${page.url}`, {
          confidence: result.confidence.toFixed(2),
          signals: result.signals.join(','),
        });
      } else {
        this.logger.debug(`Not a product: ${page.url}`, { confidence: result.confidence.toFixed(2) });
      }

      this.expand(run, page, this.linkExtractor(html, page.url));
    } catch (error) {
      this.fail(run, visit, describeError(error));
    }
  }

  /**
   * Fetch a page body, or record the failure and return null
   */
  private async fetchPage(run: CrawlRun, visit: PageVisit): Promise<string | null> {
    try {
      const response = await this.fetcher.fetch(visit.url, run.signal);
      visit.statusCode = response.statusCode;
      if (response.finalUrl !== visit.url) {
        visit.finalUrl = response.finalUrl;
        this.logger.debug(`Redirected ${visit.url} -> ${response.finalUrl}`);
      }
      if (response.statusCode !== 200) {
        this.fail(run, visit, `HTTP ${response.statusCode}`, FetchErrorType.HTTP_STATUS);
        return null;
      }
      return response.body;
    } catch (error) {
      const fetchError = classifyFetchError(error);
      this.fail(run, visit, fetchError.message, fetchError.type);
      return null;
    }
  }

  /**
   * Offer discovered links at depth + 1 in document order, stopping once
   * the domain's page budget is spent
   */
  private expand(run: CrawlRun, page: CrawlPage, links: string[]): void {
    run.stats.recordLinkDiscovery(links.length);

    for (let i = 0; i < links.length; i++) {
      if (!run.frontier.hasBudget()) {
        run.stats.recordDropped(links.length - i);
        return;
      }
      this.schedule(run, { url: links[i], depth: page.depth + 1 });
    }
  }

  private fail(run: CrawlRun, visit: PageVisit, reason: string, type?: FetchErrorType): void {
    visit.status = 'failed';
    visit.error = reason;
    run.stats.recordFailed();

    if (type === FetchErrorType.ABORTED) {
      this.logger.debug(`Fetch aborted: ${visit.url}`);
    } else {
      this.logger.warn(`Error crawling ${visit.url}: ${reason}`, { depth: visit.depth, type });
    }
  }
}
