/**
 * Ordered field matchers for product pages.
 * Each list is tried in order and the first non-empty hit wins.
 */

import { decodeHTML } from "entities";
import { STORE_CONSTANTS } from "../constants/index";

export type FieldMatcher = (html: string) => string | null;

const clean = (value: string | undefined): string | null => {
  if (value === undefined) return null;
  const text = decodeHTML(value).replace(/\s+/g, " ").trim();
  return text.length > 0 ? text : null;
};

const firstGroup =
  (re: RegExp, group = 1): FieldMatcher =>
  (html) =>
    clean(re.exec(html)?.[group]);

// Name

export const NAME_MATCHERS: readonly FieldMatcher[] = [
  firstGroup(/<meta[^>]*property=["']og:title["'][^>]*content=(["'])(.*?)\1/i, 2),
  firstGroup(/<meta[^>]*content=(["'])(.*?)\1[^>]*property=["']og:title["']/i, 2),
  (html) => {
    const title = /<title[^>]*>([^<]+)<\/title>/i.exec(html)?.[1];
    if (title === undefined) return null;
    // "Classic Tee | Store – Tagline" -> "Classic Tee"
    return clean(title.split("|")[0]?.split("–")[0]);
  },
  firstGroup(/<h1[^>]*>([^<]+)<\/h1>/i),
];

// Price

const PRICE_MATCHERS: readonly FieldMatcher[] = [
  firstGroup(/<span[^>]*class=["'][^"']*price[^"']*["'][^>]*>\s*\$?([\d,.]+)/i),
  firstGroup(/"price":\s*"?\$?([\d,.]+)/i),
  firstGroup(/data-price=["'](\d+)/i),
];

// Category

const COLLECTION_RE = /\/collections\/([^/"'?\s]+)/i;

/**
 * Product name from the first matching source, or the sentinel
 */
export function matchName(html: string): string {
  for (const match of NAME_MATCHERS) {
    const name = match(html);
    if (name) return name;
  }
  return STORE_CONSTANTS.UNKNOWN_PRODUCT_NAME;
}

/**
 * Display price such as "$19.99"; null when no source matches
 */
export function matchPrice(html: string): string | null {
  for (const match of PRICE_MATCHERS) {
    const digits = match(html);
    if (digits) return `${STORE_CONSTANTS.PRICE_PREFIX}${digits}`;
  }
  return null;
}

/**
 * Category from the first collection link in the page.
 * The catch-all collection yields null. Related-product links elsewhere on
 * the page can win over the product's own collection.
 */
export function matchCategory(html: string): string | null {
  const slug = COLLECTION_RE.exec(html)?.[1];
  if (!slug || slug.toLowerCase() === STORE_CONSTANTS.ALL_COLLECTION) return null;
  return slug.toUpperCase().replace(/-/g, " ");
}
