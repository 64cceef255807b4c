/**
 * HTTP Types
 * Transport contract used by the crawler
 */

export interface FetchResult {
  statusCode: number;

  /**
   * Response body; empty unless statusCode is 200
   */
  body: string;

  /**
   * URL after following redirects
   */
  finalUrl: string;
}

export interface PageFetcher {
  fetch(url: string, signal?: AbortSignal): Promise<FetchResult>;
}

export interface HttpPageFetcherOptions {
  /**
   * Deadline for one request, from connect to the last body byte, in milliseconds
   */
  timeout: number;

  maxRedirects: number;

  /**
   * Bodies larger than this abort the request
   */
  maxBodyBytes: number;

  userAgent: string;
}
