/**
 * Crawl Orchestration
 * Main export file for multi-domain crawling
 */

export * from './orchestrator.types';
export * from './crawler-orchestrator';
