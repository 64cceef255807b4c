import dotenv from 'dotenv';

dotenv.config();

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '5000', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // CORS
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Crawl limits (per domain unless noted)
  CRAWL_MAX_DEPTH: parseInt(process.env.CRAWL_MAX_DEPTH || '3', 10),
  CRAWL_MAX_PAGES: parseInt(process.env.CRAWL_MAX_PAGES || '1000', 10),
  CRAWL_CONCURRENT_SITES: parseInt(process.env.CRAWL_CONCURRENT_SITES || '5', 10), // Domains crawled side by side
  CRAWL_CONCURRENT_PAGES: parseInt(process.env.CRAWL_CONCURRENT_PAGES || '10', 10), // In-flight fetches per host
  CRAWL_TIMEOUT_MS: parseInt(process.env.CRAWL_TIMEOUT_MS || '0', 10), // 0 = no run deadline

  // Fetching
  FETCH_TIMEOUT_MS: parseInt(process.env.FETCH_TIMEOUT_MS || '10000', 10),
  MAX_REDIRECTS: parseInt(process.env.MAX_REDIRECTS || '5', 10),
  MAX_BODY_BYTES: parseInt(process.env.MAX_BODY_BYTES || '5242880', 10), // 5 MB per page
  USER_AGENT:
    process.env.USER_AGENT ||
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',

  // Results
  RESULTS_DIR: process.env.RESULTS_DIR || 'crawler_results',

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  LOG_FILE: process.env.LOG_FILE,
} as const;

export default env;
