/**
 * Product page extraction: raw markup in, ProductCandidate out
 */

import { STORE_CONSTANTS } from "../constants/index";
import type { ProductCandidate } from "../types/product";
import { extractProductId } from "./identifier";
import { harvestImageUrls } from "./images";
import { matchCategory, matchName, matchPrice } from "./matchers";

/**
 * Extracts a product candidate from a rendered product page.
 * Never throws on malformed markup; missing fields come back as sentinel/null.
 * @param html - Rendered page markup
 * @param url - Product page URL (source of the id)
 * @param baseUrl - Storefront base URL for relative image references
 */
export function extractProduct(
  html: string,
  url: string,
  baseUrl: string,
): ProductCandidate {
  return {
    id: extractProductId(url),
    name: matchName(html),
    url,
    price: matchPrice(html),
    category: matchCategory(html),
    imageUrls: harvestImageUrls(html, baseUrl),
  };
}

/**
 * A page that yielded neither a name nor any image carries nothing usable
 */
export function hasUsableData(candidate: ProductCandidate): boolean {
  return (
    candidate.name !== STORE_CONSTANTS.UNKNOWN_PRODUCT_NAME ||
    candidate.imageUrls.length > 0
  );
}
