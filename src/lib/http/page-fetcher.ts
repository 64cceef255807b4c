/**
 * HTTP Page Fetcher
 * GET with redirects and a per-request timeout over Node's http/https.
 * Certificate validation is off.
 */

import http, { IncomingMessage } from 'http';
import https from 'https';
import { env } from '../../config/env';
import { FetchError, FetchErrorType, classifyFetchError } from '../crawling/crawl-errors';
import { FetchResult, HttpPageFetcherOptions, PageFetcher } from './http.types';

const REDIRECT_CODES = new Set([301, 302, 303, 307, 308]);

interface RawResponse {
  statusCode: number;
  location?: string;
  body: string;
}

export class HttpPageFetcher implements PageFetcher {
  private readonly options: HttpPageFetcherOptions;

  constructor(options: Partial<HttpPageFetcherOptions> = {}) {
    this.options = {
      timeout: options.timeout ?? env.FETCH_TIMEOUT_MS,
      maxRedirects: options.maxRedirects ?? env.MAX_REDIRECTS,
      maxBodyBytes: options.maxBodyBytes ?? env.MAX_BODY_BYTES,
      userAgent: options.userAgent ?? env.USER_AGENT,
    };
  }

  async fetch(url: string, signal?: AbortSignal): Promise<FetchResult> {
    let currentUrl = url;

    for (let redirects = 0; ; redirects++) {
      const response = await this.request(currentUrl, signal);

      if (!REDIRECT_CODES.has(response.statusCode) || !response.location) {
        return { statusCode: response.statusCode, body: response.body, finalUrl: currentUrl };
      }

      if (redirects >= this.options.maxRedirects) {
        throw new FetchError(
          FetchErrorType.TOO_MANY_REDIRECTS,
          `More than ${this.options.maxRedirects} redirects`,
          response.statusCode
        );
      }

      try {
        currentUrl = new URL(response.location, currentUrl).href;
      } catch {
        throw new FetchError(FetchErrorType.UNKNOWN, `Invalid redirect location: ${response.location}`);
      }
    }
  }

  /**
   * Make a single HTTP/HTTPS request
   */
  private request(url: string, signal?: AbortSignal): Promise<RawResponse> {
    return new Promise((resolve, reject) => {
      let target: URL;
      try {
        target = new URL(url);
      } catch {
        reject(new FetchError(FetchErrorType.UNKNOWN, `Invalid URL: ${url}`));
        return;
      }

      const headers = {
        'User-Agent': this.options.userAgent,
        Accept: 'text/html,application/xhtml+xml',
      };

      let deadline: NodeJS.Timeout | undefined;
      const done = (response: RawResponse) => {
        clearTimeout(deadline);
        resolve(response);
      };
      const fail = (error: FetchError) => {
        clearTimeout(deadline);
        reject(error);
      };

      const onResponse = (res: IncomingMessage) => {
        const statusCode = res.statusCode ?? 0;

        if (statusCode !== 200) {
          res.resume();
          done({ statusCode, location: res.headers.location, body: '' });
          return;
        }

        const chunks: Buffer[] = [];
        let received = 0;
        res.on('data', (chunk: Buffer) => {
          received += chunk.length;
          if (received > this.options.maxBodyBytes) {
            req.destroy(
              new FetchError(
                FetchErrorType.BODY_TOO_LARGE,
                `Response body exceeds ${this.options.maxBodyBytes} bytes`,
                statusCode
              )
            );
            return;
          }
          chunks.push(chunk);
        });
        res.on('end', () => done({ statusCode, body: Buffer.concat(chunks).toString('utf8') }));
        res.on('error', (error) => fail(classifyFetchError(error, statusCode)));
      };

      const req =
        target.protocol === 'https:'
          ? https.request(target, { method: 'GET', headers, signal, rejectUnauthorized: false }, onResponse)
          : http.request(target, { method: 'GET', headers, signal }, onResponse);

      // Covers slow bodies too, not only idle sockets
      deadline = setTimeout(() => {
        req.destroy(new FetchError(FetchErrorType.TIMEOUT, `Request timed out after ${this.options.timeout}ms`));
      }, this.options.timeout);

      req.on('error', (error) => fail(classifyFetchError(error)));
      req.end();
    });
  }
}
