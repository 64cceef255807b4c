/**
 * Crawler Controller Tests
 * Request parsing, the crawl handler and error mapping
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { CrawlConfigError } from '../../../lib/crawling/crawl-errors';
import { CrawlerOrchestrator } from '../../../lib/orchestration';
import { ResultStore } from '../../../lib/storage';
import { ApiError, errorHandler } from '../../../middleware/error-handler';
import { CrawlerController, parseCrawlRequest } from '../crawler.controller';
import { ICrawlRequest } from '../crawler.types';
import { createDomainState, createMockLogger } from '../../../__tests__/helpers/mocks';

interface MockResponse {
  status: jest.Mock;
  json: jest.Mock;
}

function createMockResponse(): MockResponse {
  const res: MockResponse = { status: jest.fn(), json: jest.fn() };
  res.status.mockReturnValue(res);
  return res;
}

interface HandlerOutcome {
  res: MockResponse;
  error?: unknown;
}

/**
 * Run an express handler until it responds or calls next()
 */
function invoke(handler: RequestHandler, body: unknown): Promise<HandlerOutcome> {
  return new Promise((resolve) => {
    const res = createMockResponse();
    res.json.mockImplementation(() => resolve({ res }));
    const next: NextFunction = (error?: unknown) => resolve({ res, error });
    handler({ body } as Request, res as unknown as Response, next);
  });
}

describe('parseCrawlRequest', () => {
  it('should build one config per domain with shared limits', () => {
    const configs = parseCrawlRequest({
      domains: ['https://Shop.test/', 'other.test'],
      max_depth: 1,
      max_pages: 5,
      product_patterns: ['/widgets/'],
    });

    expect(configs.map((config) => config.domain)).toEqual(['shop.test', 'other.test']);
    expect(configs[0].maxDepth).toBe(1);
    expect(configs[0].maxPages).toBe(5);
    expect(configs[1].productPatterns).toHaveLength(1);
  });

  const invalidBodies: Array<[ICrawlRequest | undefined, string]> = [
    [undefined, 'No domains provided'],
    [{ domains: [] }, 'No domains provided'],
    [{ domains: 'shop.test' }, 'No domains provided'],
    [{ domains: ['shop.test', 3] }, 'domains must be a list of strings'],
    [{ domains: ['shop.test'], max_depth: '2' }, 'max_depth must be an integer'],
    [{ domains: ['shop.test'], max_pages: 2.5 }, 'max_pages must be an integer'],
    [{ domains: ['shop.test'], product_patterns: '/p/' }, 'product_patterns must be a list of strings'],
  ];

  it.each(invalidBodies)('should reject %j with a 400', (body, message) => {
    expect(() => parseCrawlRequest(body)).toThrow(ApiError);
    expect(() => parseCrawlRequest(body)).toThrow(message);
  });

  it('should surface invalid limits as configuration errors', () => {
    expect(() => parseCrawlRequest({ domains: ['shop.test'], max_pages: 0 })).toThrow(CrawlConfigError);
  });
});

describe('CrawlerController.crawl', () => {
  function createController() {
    const logger = createMockLogger();
    const store = new ResultStore(logger, { outputDir: '/tmp/unused-results' });
    const save = jest.spyOn(store, 'save').mockResolvedValue('/tmp/unused-results/urls.json');
    const crawlDomain = jest.fn(async (config: { domain: string }) =>
      createDomainState(config.domain, {
        seen: [`https://${config.domain}/`, `https://${config.domain}/p/abc123`],
        products: [`https://${config.domain}/p/abc123`],
      })
    );
    const controller = new CrawlerController(
      logger,
      (factoryLogger) => new CrawlerOrchestrator({ crawler: { crawlDomain }, store, logger: factoryLogger })
    );
    return { controller, save, crawlDomain };
  }

  it('should crawl, save to urls.json and report statistics', async () => {
    const { controller, save, crawlDomain } = createController();

    const { res, error } = await invoke(controller.crawl, { domains: ['shop.test'], max_depth: 1 });

    expect(error).toBeUndefined();
    expect(crawlDomain).toHaveBeenCalledTimes(1);
    expect(save).toHaveBeenCalledWith('urls.json', { 'shop.test': ['https://shop.test/p/abc123'] });
    expect(res.json).toHaveBeenCalledWith({
      status: 'success',
      statistics: { 'shop.test': { productUrlCount: 1, totalPagesCrawled: 2 } },
      resultsFile: '/tmp/unused-results/urls.json',
    });
  });

  it('should pass validation errors to next without crawling', async () => {
    const { controller, crawlDomain } = createController();

    const { res, error } = await invoke(controller.crawl, { domains: [] });

    expect(error).toBeInstanceOf(ApiError);
    expect(crawlDomain).not.toHaveBeenCalled();
    expect(res.json).not.toHaveBeenCalled();
  });
});

describe('errorHandler', () => {
  const req = { method: 'POST', path: '/api/crawl' } as Request;
  const next: NextFunction = () => undefined;

  it.each([
    [new ApiError(400, 'No domains provided'), 400, 'No domains provided'],
    [new CrawlConfigError('Domain is required'), 400, 'Domain is required'],
  ])('should map %s to its status', (err, status, message) => {
    const res = createMockResponse();

    errorHandler(err, req, res as unknown as Response, next);

    expect(res.status).toHaveBeenCalledWith(status);
    expect(res.json).toHaveBeenCalledWith({ success: false, error: message });
  });

  it('should hide unexpected errors behind a 500', () => {
    const consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const res = createMockResponse();

    errorHandler(new Error('secret detail'), req, res as unknown as Response, next);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ success: false, error: 'Internal server error' });
    expect(consoleSpy).toHaveBeenCalledWith('Unhandled error on POST /api/crawl:', 'secret detail');
    consoleSpy.mockRestore();
  });
});
