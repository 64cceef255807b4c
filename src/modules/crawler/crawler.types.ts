/**
 * Crawler API Types
 * Request/response shapes for the crawl endpoint
 */

import { CrawlStatistics } from '../../lib/crawling/crawling.types';

/**
 * POST /api/crawl body (snake_case as sent by clients)
 */
export interface ICrawlRequest {
  domains?: unknown;
  max_depth?: unknown;
  max_pages?: unknown;
  product_patterns?: unknown;
}

export interface ICrawlResponse {
  status: 'success';
  statistics: CrawlStatistics;
  resultsFile: string | null;
}
