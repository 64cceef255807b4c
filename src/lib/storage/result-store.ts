/**
 * File-based Result Store
 * Writes crawl results as indented JSON, falling back to the working
 * directory when the results directory cannot be written
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { env } from '../../config/env';
import { describeError } from '../crawling/crawl-errors';
import { CrawlResults } from '../crawling/crawling.types';
import { Logger } from '../logging';

export interface ResultStoreConfig {
  outputDir: string;

  /**
   * Directory for the fallback file
   */
  fallbackDir: string;
}

export class ResultStore {
  private readonly config: ResultStoreConfig;
  private readonly logger: Logger;

  constructor(logger: Logger, config: Partial<ResultStoreConfig> = {}) {
    this.logger = logger;
    this.config = {
      outputDir: config.outputDir || path.resolve(process.cwd(), env.RESULTS_DIR),
      fallbackDir: config.fallbackDir || process.cwd(),
    };
  }

  /**
   * Save results, returning the path written or null when both the
   * primary and the fallback location failed
   */
  async save(filename: string, results: CrawlResults): Promise<string | null> {
    const payload = JSON.stringify(sortResults(results), null, 2);
    const filePath = path.join(this.config.outputDir, filename);

    try {
      await fs.mkdir(this.config.outputDir, { recursive: true });
      await fs.writeFile(filePath, payload, 'utf8');
      this.logger.info(`Results saved to ${filePath}`);
      return filePath;
    } catch (error) {
      this.logger.error(`Error saving results to ${filePath}: ${describeError(error)}`);
    }

    const fallbackPath = path.join(this.config.fallbackDir, `fallback_${filename}`);
    try {
      await fs.writeFile(fallbackPath, payload, 'utf8');
      this.logger.info(`Results saved to fallback location: ${fallbackPath}`);
      return fallbackPath;
    } catch (error) {
      this.logger.error(`Failed to save results to fallback location: ${describeError(error)}`);
      return null;
    }
  }
}

/**
 * Sorted, de-duplicated URL lists per domain
 */
export function sortResults(results: CrawlResults): CrawlResults {
  const sorted: CrawlResults = {};
  for (const [domain, urls] of Object.entries(results)) {
    sorted[domain] = Array.from(new Set(urls)).sort();
  }
  return sorted;
}

/**
 * Default results file name, e.g. product_urls_20240131_094512.json
 */
export function timestampedFilename(date: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `product_urls_${stamp}.json`;
}
