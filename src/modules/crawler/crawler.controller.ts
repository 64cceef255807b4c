/**
 * Crawler Controller
 * HTTP request/response handling for the crawl endpoint
 */

import { Request, Response } from 'express';
import { ApiError, asyncHandler } from '../../middleware/error-handler';
import { createCrawlConfig } from '../../lib/crawling/crawl-config';
import { CrawlConfig } from '../../lib/crawling/crawling.types';
import { CrawlerOrchestrator, createCrawlerOrchestrator } from '../../lib/orchestration';
import { Logger, getAppLogger } from '../../lib/logging';
import { ICrawlRequest, ICrawlResponse } from './crawler.types';

export const RESULTS_FILENAME = 'urls.json';

function optionalInteger(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ApiError(400, `${field} must be an integer`);
  }
  return value;
}

function optionalStringList(value: unknown, field: string): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ApiError(400, `${field} must be a list of strings`);
  }
  return value;
}

/**
 * Build one CrawlConfig per domain with the shared limits
 */
export function parseCrawlRequest(body: ICrawlRequest | undefined): CrawlConfig[] {
  const domains = body?.domains;
  if (!Array.isArray(domains) || domains.length === 0) {
    throw new ApiError(400, 'No domains provided');
  }
  if (!domains.every((domain): domain is string => typeof domain === 'string')) {
    throw new ApiError(400, 'domains must be a list of strings');
  }

  const maxDepth = optionalInteger(body?.max_depth, 'max_depth');
  const maxPages = optionalInteger(body?.max_pages, 'max_pages');
  const productPatterns = optionalStringList(body?.product_patterns, 'product_patterns');

  return domains.map((domain) =>
    createCrawlConfig({ domain, maxDepth, maxPages, productPatterns })
  );
}

export class CrawlerController {
  private readonly logger: Logger;
  private readonly orchestratorFactory: (logger: Logger) => CrawlerOrchestrator;

  constructor(
    logger: Logger,
    orchestratorFactory: (logger: Logger) => CrawlerOrchestrator = createCrawlerOrchestrator
  ) {
    this.logger = logger;
    this.orchestratorFactory = orchestratorFactory;
  }

  /**
   * POST /api/crawl
   * Crawl the given domains to completion and report statistics
   */
  crawl = asyncHandler(async (req: Request, res: Response) => {
    const configs = parseCrawlRequest(req.body);

    this.logger.info(`Crawl requested for ${configs.length} domain(s)`, {
      domains: configs.map((config) => config.domain).join(','),
    });

    const orchestrator = this.orchestratorFactory(this.logger);
    await orchestrator.crawlAll(configs);
    const resultsFile = await orchestrator.saveResults(RESULTS_FILENAME);
    const statistics = orchestrator.getStatistics();

    this.logger.info('Crawling statistics:', { summary: JSON.stringify(statistics) });

    const response: ICrawlResponse = {
      status: 'success',
      statistics,
      resultsFile,
    };

    res.json(response);
  });
}

export const crawlerController = new CrawlerController(getAppLogger());
