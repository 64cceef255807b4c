/**
 * Product Classification Rules
 * Weighted signals combined into a product confidence score
 */

import * as cheerio from 'cheerio';
import { countPathSegments, pathAndQuery } from './url-normalizer';

/**
 * Everything a rule may look at for one page
 */
export interface ClassificationContext {
  url: string;

  /**
   * Path plus query, the URL-side match target
   */
  target: string;

  html: string;
  productPatterns: readonly RegExp[];
}

export interface ClassificationRule {
  /**
   * Rule identifier, reported in ClassificationResult.signals
   */
  name: string;

  /**
   * Confidence added when the rule matches
   */
  weight: number;

  matches(context: ClassificationContext): boolean;
}

/**
 * Paths that are never product pages
 */
export const DEFAULT_EXCLUDE_PATTERNS: readonly RegExp[] = [
  /\/cart/i,
  /\/checkout/i,
  /\/login/i,
  /\/account/i,
  /\/search/i,
  /\/category/i,
  /\/wishlist/i,
];

const SCHEMA_TYPE_PATTERN = /Product|ItemPage/;
const PRODUCT_CONTAINER_PATTERN = /product[-_]?(detail|page|view|info)/i;
const PURCHASE_OPTION_PATTERN = /size|color|quantity/i;
const ADD_TO_CART_PATTERN = /add to (cart|bag)/i;

/**
 * Look for product markup in a page. Checks run in priority order and stop
 * at the first hit; unparseable HTML counts as no signal.
 */
export function analyzePageContent(html: string): boolean {
  if (!html) return false;

  let $: cheerio.CheerioAPI;
  try {
    $ = cheerio.load(html);
  } catch {
    return false;
  }

  // schema.org JSON-LD
  const hasProductSchema = $('script[type="application/ld+json"]')
    .toArray()
    .some((el) => SCHEMA_TYPE_PATTERN.test($(el).html() ?? ''));
  if (hasProductSchema) return true;

  // Product container ids and classes
  const hasProductContainer = $('[id], [class]')
    .toArray()
    .some((el) => {
      const node = $(el);
      return (
        PRODUCT_CONTAINER_PATTERN.test(node.attr('id') ?? '') ||
        PRODUCT_CONTAINER_PATTERN.test(node.attr('class') ?? '')
      );
    });
  if (hasProductContainer) return true;

  // Purchase options next to an add-to-cart call
  const hasPurchaseOption = $('select, button')
    .toArray()
    .some((el) => PURCHASE_OPTION_PATTERN.test($(el).text()));

  return hasPurchaseOption && ADD_TO_CART_PATTERN.test($.root().text());
}

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    name: 'url-pattern',
    weight: 0.4,
    matches: ({ target, productPatterns }) => productPatterns.some((pattern) => pattern.test(target)),
  },
  {
    name: 'path-depth',
    weight: 0.2,
    matches: ({ url }) => {
      const segments = countPathSegments(url);
      return segments >= 2 && segments <= 4;
    },
  },
  {
    name: 'page-content',
    weight: 0.4,
    matches: ({ html }) => analyzePageContent(html),
  },
];

export function buildContext(
  url: string,
  html: string,
  productPatterns: readonly RegExp[]
): ClassificationContext {
  return { url, target: pathAndQuery(url), html, productPatterns };
}
