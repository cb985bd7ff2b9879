/**
 * Pure operations on the cumulative crawl snapshot
 */

import type { CrawlResult, Product } from "../types/product";
import { nowIso } from "../utils/date";

/**
 * Totals derived from the product list; stored totals are never trusted
 */
export function recomputeTotals(result: CrawlResult): CrawlResult {
  return {
    ...result,
    totalProducts: result.products.length,
    totalImages: result.products.reduce((n, p) => n + p.images.length, 0),
  };
}

export function createCrawlResult(
  products: readonly Product[] = [],
  crawledAt: string = nowIso(),
): CrawlResult {
  return recomputeTotals({ products: [...products], crawledAt, totalProducts: 0, totalImages: 0 });
}

/**
 * Adds a product, replacing an earlier one with the same id in place
 * @returns A new snapshot; the input is left untouched
 */
export function addProduct(result: CrawlResult, product: Product): CrawlResult {
  const idx = result.products.findIndex((p) => p.id === product.id);
  const products =
    idx >= 0
      ? result.products.map((p, i) => (i === idx ? product : p))
      : [...result.products, product];
  return recomputeTotals({ ...result, products });
}

/**
 * Overlays `update` on `base`: same-id products are replaced, new ones appended.
 * The merged snapshot carries the newer crawl time.
 */
export function mergeCrawlResults(base: CrawlResult, update: CrawlResult): CrawlResult {
  const merged = update.products.reduce(addProduct, base);
  return { ...merged, crawledAt: update.crawledAt };
}
