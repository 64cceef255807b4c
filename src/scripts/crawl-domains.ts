/**
 * Crawl Domains
 * One-shot crawl from the command line:
 *   npm run crawl -- shop.example.com other.example.com --max-depth 2 --max-pages 200
 */

import { createCrawlConfig } from '../lib/crawling/crawl-config';
import { describeError } from '../lib/crawling/crawl-errors';
import { CrawlConfig } from '../lib/crawling/crawling.types';
import { getAppLogger } from '../lib/logging';
import { createCrawlerOrchestrator } from '../lib/orchestration';

export interface CrawlArgs {
  domains: string[];
  maxDepth?: number;
  maxPages?: number;
}

function parseIntegerFlag(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed)) {
    throw new Error(`${flag} expects an integer`);
  }
  return parsed;
}

export function parseArgs(argv: string[]): CrawlArgs {
  const args: CrawlArgs = { domains: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--max-depth') {
      args.maxDepth = parseIntegerFlag(arg, argv[++i]);
    } else if (arg === '--max-pages') {
      args.maxPages = parseIntegerFlag(arg, argv[++i]);
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      args.domains.push(arg);
    }
  }

  if (args.domains.length === 0) {
    throw new Error('Usage: crawl-domains <domain> [<domain>...] [--max-depth N] [--max-pages N]');
  }
  return args;
}

async function main(): Promise<void> {
  const logger = getAppLogger();
  const args = parseArgs(process.argv.slice(2));

  const configs: CrawlConfig[] = args.domains.map((domain) =>
    createCrawlConfig({ domain, maxDepth: args.maxDepth, maxPages: args.maxPages })
  );

  const orchestrator = createCrawlerOrchestrator(logger);
  await orchestrator.crawlAll(configs);
  await orchestrator.saveResults();

  console.log('Crawling statistics:', JSON.stringify(orchestrator.getStatistics(), null, 2));
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(describeError(error));
    process.exit(1);
  });
}
