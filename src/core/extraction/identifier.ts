/**
 * Product identifier derivation
 */

import { STORE_CONSTANTS } from "../constants/index";

const pathOf = (url: string): string => {
  try {
    return new URL(url).pathname;
  } catch {
    // Not absolute: drop query/fragment by hand
    return url.split(/[?#]/)[0] ?? "";
  }
};

/**
 * Derives the product identifier from a product URL.
 * Uses the path segment after `/products/`; otherwise the whole path with
 * slashes flattened to dashes. Depends on the URL only, never on content.
 * @param url - Product page URL
 * @returns Non-empty identifier (e.g. "classic-tee")
 */
export function extractProductId(url: string): string {
  const parts = pathOf(url)
    .split("/")
    .filter((part) => part.length > 0);

  const idx = parts.indexOf(STORE_CONSTANTS.PRODUCT_ROUTE);
  const handle = idx >= 0 ? parts[idx + 1] : undefined;
  if (handle) return handle;

  return parts.length > 0 ? parts.join("-") : "index";
}
