/**
 * Product Classifier Tests
 * Unit tests for classifyPage and analyzePageContent
 */

import { classifyPage, createProductClassifier, PRODUCT_THRESHOLD } from '../product-classifier';
import { analyzePageContent, CLASSIFICATION_RULES } from '../product-classifier.rules';
import {
  jsonLdProductMarkup,
  linkPage,
  plainHtml,
  productContainerMarkup,
  purchaseFormMarkup,
} from '../../../__tests__/helpers/fixtures';

const productHtml = linkPage([], jsonLdProductMarkup);

describe('classifyPage', () => {
  describe('exclusions', () => {
    it('should return zero confidence for excluded paths regardless of content', () => {
      const result = classifyPage('https://shop.test/cart/p/abc123', productHtml);

      expect(result).toEqual({ isProduct: false, confidence: 0, signals: [] });
    });

    it('should match exclusions case-insensitively', () => {
      const result = classifyPage('https://shop.test/Checkout/step', productHtml);

      expect(result.confidence).toBe(0);
      expect(result.isProduct).toBe(false);
    });

    it('should not exclude on the host name', () => {
      const result = classifyPage('https://cartoon.test/p/abc123', plainHtml);

      expect(result.confidence).toBe(0.6);
      expect(result.isProduct).toBe(true);
    });
  });

  describe('scoring', () => {
    it('should score all three signals as 1.0', () => {
      const result = classifyPage('https://shop.test/p/abc123/', productHtml);

      expect(result.isProduct).toBe(true);
      expect(result.confidence).toBe(1);
      expect(result.signals).toEqual(['url-pattern', 'path-depth', 'page-content']);
    });

    it('should score url pattern plus path depth as exactly 0.6', () => {
      const result = classifyPage('https://shop.test/p/abc123', plainHtml);

      expect(result.confidence).toBe(0.6);
      expect(result.isProduct).toBe(true);
      expect(result.signals).toEqual(['url-pattern', 'path-depth']);
    });

    it('should score url pattern plus content as 0.8', () => {
      const result = classifyPage(
        'https://shop.test/products/widget-one/blue/large/xl',
        linkPage([], productContainerMarkup)
      );

      expect(result.confidence).toBe(0.8);
      expect(result.signals).toEqual(['url-pattern', 'page-content']);
    });

    it('should not label a page with only path depth', () => {
      const result = classifyPage('https://shop.test/about/team', plainHtml);

      expect(result).toEqual({ isProduct: false, confidence: 0.2, signals: ['path-depth'] });
    });

    it('should not label a page with only content signals', () => {
      const result = classifyPage('https://shop.test/', linkPage([], productContainerMarkup));

      expect(result).toEqual({ isProduct: false, confidence: 0.4, signals: ['page-content'] });
    });

    it('should match product patterns case-insensitively', () => {
      const result = classifyPage('https://shop.test/PRODUCTS/Widget', plainHtml);

      expect(result.confidence).toBe(0.6);
    });

    it('should match product id query parameters', () => {
      const result = classifyPage('https://shop.test/view?pid=42', plainHtml);

      expect(result).toEqual({ isProduct: false, confidence: 0.4, signals: ['url-pattern'] });
    });

    it('should apply custom product patterns instead of the defaults', () => {
      const classify = createProductClassifier([/\/widgets\//i]);

      expect(classify('https://shop.test/widgets/blue', plainHtml).confidence).toBe(0.6);
      expect(classify('https://shop.test/p/abc123', plainHtml).confidence).toBe(0.2);
    });
  });

  describe('degraded input', () => {
    it('should fall back to URL-only scoring for malformed HTML', () => {
      const result = classifyPage('https://shop.test/p/abc123', '<<<div class="');

      expect(result.confidence).toBe(0.6);
    });

    it('should fall back to URL-only scoring for an empty body', () => {
      expect(classifyPage('https://shop.test/p/abc123', '').confidence).toBe(0.6);
    });

    it('should not throw for an unparseable URL', () => {
      const result = classifyPage('not a url', productHtml);

      expect(result).toEqual({ isProduct: false, confidence: 0.4, signals: ['page-content'] });
    });

    it('should treat a throwing rule as not matched', () => {
      const result = classifyPage('https://shop.test/p/abc123', plainHtml, {
        rules: [
          ...CLASSIFICATION_RULES,
          {
            name: 'broken',
            weight: 0.4,
            matches: () => {
              throw new Error('rule failure');
            },
          },
        ],
      });

      expect(result.confidence).toBe(0.6);
      expect(result.signals).not.toContain('broken');
    });
  });

  it('should return identical results for repeated calls', () => {
    const first = classifyPage('https://shop.test/p/abc123/', productHtml);
    const second = classifyPage('https://shop.test/p/abc123/', productHtml);

    expect(second).toEqual(first);
  });

  it('should use 0.6 as the product threshold', () => {
    expect(PRODUCT_THRESHOLD).toBe(0.6);
  });
});

describe('analyzePageContent', () => {
  it('should detect JSON-LD Product markup', () => {
    expect(analyzePageContent(linkPage([], jsonLdProductMarkup))).toBe(true);
  });

  it('should detect JSON-LD ItemPage markup', () => {
    const html = linkPage([], '<script type="application/ld+json">{"@type":"ItemPage"}</script>');
    expect(analyzePageContent(html)).toBe(true);
  });

  it('should match the JSON-LD type case-sensitively', () => {
    const html = linkPage([], '<script type="application/ld+json">{"@type":"product"}</script>');
    expect(analyzePageContent(html)).toBe(false);
  });

  it('should detect product container ids', () => {
    expect(analyzePageContent(linkPage([], '<section id="productInfo"></section>'))).toBe(true);
  });

  it('should detect product container classes', () => {
    expect(analyzePageContent(linkPage([], '<div class="main product_view"></div>'))).toBe(true);
  });

  it('should detect purchase options next to an add-to-cart call', () => {
    expect(analyzePageContent(linkPage([], purchaseFormMarkup))).toBe(true);
  });

  it('should require the add-to-cart text alongside purchase options', () => {
    expect(analyzePageContent(linkPage([], '<button>Choose color</button>'))).toBe(false);
  });

  it('should require a purchase option alongside the add-to-cart text', () => {
    expect(analyzePageContent(linkPage([], '<p>Add to bag</p>'))).toBe(false);
  });

  it('should return false for plain pages and empty input', () => {
    expect(analyzePageContent(plainHtml)).toBe(false);
    expect(analyzePageContent('')).toBe(false);
  });
});
