/**
 * Product Classifier
 * Decides whether a fetched page is a product detail page
 */

import { DEFAULT_PRODUCT_PATTERNS, compilePatterns } from './crawl-config';
import { ClassificationResult } from './crawling.types';
import {
  CLASSIFICATION_RULES,
  ClassificationRule,
  DEFAULT_EXCLUDE_PATTERNS,
  buildContext,
} from './product-classifier.rules';

export const PRODUCT_THRESHOLD = 0.6;

export interface ClassifyOptions {
  excludePatterns?: readonly RegExp[];
  productPatterns?: readonly RegExp[];
  rules?: readonly ClassificationRule[];
}

const defaultProductPatterns = compilePatterns(DEFAULT_PRODUCT_PATTERNS);

/**
 * Score a page against the rule table. Never throws; a page whose HTML
 * cannot be read is scored on its URL alone.
 */
export function classifyPage(
  url: string,
  html: string,
  options: ClassifyOptions = {}
): ClassificationResult {
  const excludePatterns = options.excludePatterns ?? DEFAULT_EXCLUDE_PATTERNS;
  const productPatterns = options.productPatterns ?? defaultProductPatterns;
  const rules = options.rules ?? CLASSIFICATION_RULES;

  const context = buildContext(url, html, productPatterns);

  if (excludePatterns.some((pattern) => pattern.test(context.target))) {
    return { isProduct: false, confidence: 0, signals: [] };
  }

  let total = 0;
  const signals: string[] = [];
  for (const rule of rules) {
    let matched = false;
    try {
      matched = rule.matches(context);
    } catch {
      matched = false;
    }
    if (matched) {
      total += rule.weight;
      signals.push(rule.name);
    }
  }

  // Round away float drift so 0.4 + 0.2 reports 0.6
  const confidence = Math.min(1, Math.round(total * 100) / 100);

  return {
    isProduct: confidence >= PRODUCT_THRESHOLD,
    confidence,
    signals,
  };
}

/**
 * Classifier bound to one domain's product patterns
 */
export type ProductClassifier = (url: string, html: string) => ClassificationResult;

export function createProductClassifier(
  productPatterns: readonly RegExp[],
  options: Omit<ClassifyOptions, 'productPatterns'> = {}
): ProductClassifier {
  return (url, html) => classifyPage(url, html, { ...options, productPatterns });
}
