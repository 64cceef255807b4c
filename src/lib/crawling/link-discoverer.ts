/**
 * Link Discoverer
 * Same-host link discovery from HTML content
 */

import * as cheerio from 'cheerio';
import { isAssetUrl, isSameHost, normalizeUrl } from './url-normalizer';

export type LinkExtractor = (html: string, baseUrl: string) => string[];

/**
 * Extract normalized, same-host links in document order.
 * Relative hrefs resolve against baseUrl; other hosts, non-http schemes
 * and static assets are dropped.
 */
export const extractLinks: LinkExtractor = (html, baseUrl) => {
  const links: string[] = [];
  const seen = new Set<string>();

  let $: cheerio.CheerioAPI;
  try {
    $ = cheerio.load(html);
  } catch {
    return links;
  }

  $('a[href]').each((_, el) => {
    const href = $(el).attr('href')?.trim();
    if (!href || href.startsWith('#')) return;

    const normalized = normalizeUrl(href, baseUrl);
    if (!normalized || seen.has(normalized)) return;

    if (!isSameHost(normalized, baseUrl) || isAssetUrl(normalized)) return;

    seen.add(normalized);
    links.push(normalized);
  });

  return links;
};
