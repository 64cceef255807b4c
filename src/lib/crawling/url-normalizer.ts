/**
 * URL Normalization Utilities
 * Functions for normalizing and comparing crawl URLs
 */

const ASSET_EXTENSIONS = [
  '.pdf', '.zip', '.jpg', '.jpeg', '.png', '.gif', '.webp', '.svg', '.ico', '.css', '.js', '.xml',
];

/**
 * Normalize a URL by removing the fragment and sorting query params.
 * The path is kept as linked: `/catalog/` and `/catalog` are different
 * resources, and relative links on the page resolve against it.
 * Returns null for anything that is not an absolute http(s) URL.
 */
export function normalizeUrl(url: string, baseUrl?: string): string | null {
  let urlObj: URL;
  try {
    urlObj = baseUrl ? new URL(url, baseUrl) : new URL(url);
  } catch {
    return null;
  }

  if (urlObj.protocol !== 'http:' && urlObj.protocol !== 'https:') {
    return null;
  }

  // Remove fragment
  urlObj.hash = '';

  // Sort query parameters
  const sortedParams = Array.from(urlObj.searchParams.entries()).sort(([a], [b]) =>
    a.localeCompare(b)
  );
  urlObj.search = '';
  sortedParams.forEach(([key, value]) => {
    urlObj.searchParams.append(key, value);
  });

  urlObj.hostname = urlObj.hostname.toLowerCase();

  return urlObj.href;
}

/**
 * Host (with port) of a URL, or '' when unparseable
 */
export function extractHost(url: string): string {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return '';
  }
}

export function isSameHost(url: string, baseUrl: string): boolean {
  const host = extractHost(url);
  return host !== '' && host === extractHost(baseUrl);
}

export function isAssetUrl(url: string): boolean {
  try {
    const pathname = new URL(url).pathname.toLowerCase();
    return ASSET_EXTENSIONS.some((ext) => pathname.endsWith(ext));
  } catch {
    return false;
  }
}

/**
 * Seed URL for a bare domain
 */
export function seedUrlFor(domain: string): string {
  return normalizeUrl(`https://${domain}`) ?? `https://${domain}/`;
}

/**
 * Non-empty path segments of a URL (0 when unparseable)
 */
export function countPathSegments(url: string): number {
  try {
    return new URL(url).pathname.split('/').filter((segment) => segment.length > 0).length;
  } catch {
    return 0;
  }
}

/**
 * Path plus query string, the part of a URL the classifier matches against.
 * Falls back to the raw string when the URL cannot be parsed.
 */
export function pathAndQuery(url: string): string {
  try {
    const urlObj = new URL(url);
    return urlObj.pathname + urlObj.search;
  } catch {
    return url;
  }
}
