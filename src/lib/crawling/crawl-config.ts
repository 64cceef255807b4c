/**
 * Crawl Configuration
 * Validated, frozen per-domain settings
 */

import { env } from '../../config/env';
import { CrawlConfigError } from './crawl-errors';
import { CrawlConfig, CrawlConfigInput } from './crawling.types';

/**
 * Product URL patterns applied when a domain supplies none
 */
export const DEFAULT_PRODUCT_PATTERNS: readonly string[] = [
  // Standard product paths
  '/products?/',
  '/items?/',
  '/p/',
  '/dp/',

  // SKU-like identifiers
  '(?<=/)[a-zA-Z0-9]{6,}(?=/|$)',
  '-pd-',
  'prod[_-]id',

  // Department/category/item
  '/(?:men|women|kids|home)/[^/]+/[^/]+$',

  // Common platform paths
  '/catalog/',
  '/shop/',
  '/detail/',

  // Product id query parameters
  '\\?.*(?:product[_-]id|pid|itemid)=',
];

/**
 * Strip scheme, trailing slashes and whitespace from a domain
 */
export function normalizeDomain(domain: string): string {
  return domain
    .trim()
    .toLowerCase()
    .replace(/^https?:\/\//i, '')
    .replace(/\/+$/, '');
}

/**
 * Reduce a domain to its bare host (with port). Anything carrying a path,
 * query or fragment is rejected.
 */
export function parseDomain(domain: string): string {
  const normalized = normalizeDomain(domain);
  if (!normalized) {
    throw new CrawlConfigError('Domain is required');
  }

  let url: URL;
  try {
    url = new URL(`https://${normalized}`);
  } catch {
    throw new CrawlConfigError(`Invalid domain: ${domain}`);
  }

  if (url.pathname !== '/' || url.search || url.hash || url.username || url.password) {
    throw new CrawlConfigError(`Domain must be a bare host, got ${domain}`);
  }
  return url.host;
}

export function compilePatterns(patterns: readonly string[]): RegExp[] {
  return patterns.map((pattern) => {
    try {
      return new RegExp(pattern, 'i');
    } catch {
      throw new CrawlConfigError(`Invalid product pattern: ${pattern}`);
    }
  });
}

export function createCrawlConfig(input: CrawlConfigInput): CrawlConfig {
  const domain = parseDomain(input.domain);

  const maxDepth = input.maxDepth ?? env.CRAWL_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new CrawlConfigError(`max_depth must be a non-negative integer, got ${maxDepth}`);
  }

  const maxPages = input.maxPages ?? env.CRAWL_MAX_PAGES;
  if (!Number.isInteger(maxPages) || maxPages < 1) {
    throw new CrawlConfigError(`max_pages must be a positive integer, got ${maxPages}`);
  }

  const patterns =
    input.productPatterns && input.productPatterns.length > 0
      ? input.productPatterns
      : DEFAULT_PRODUCT_PATTERNS;

  return Object.freeze({
    domain,
    productPatterns: Object.freeze(compilePatterns(patterns)),
    maxDepth,
    maxPages,
  });
}
