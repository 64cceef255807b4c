/**
 * Crawling System
 * Main export file for the product crawl core
 */

export * from './crawling.types';
export * from './crawl-errors';
export * from './crawl-config';
export * from './url-normalizer';
export * from './link-discoverer';
export * from './product-classifier.rules';
export * from './product-classifier';
export * from './frontier-tracker';
export * from './crawling-queue';
export * from './crawling-statistics';
export * from './domain-crawler';
