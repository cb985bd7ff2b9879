/**
 * Image URL canonicalization and order-stable deduplication
 */

import { decodeHTML } from "entities";
import { uniq } from "../utils/array";

/**
 * Canonicalizes an image URL:
 * decode HTML entities, force https on protocol-relative URLs, resolve other
 * relative forms against the store base URL, then drop query and fragment.
 * The CDN serves the original resolution without width/quality params, so the
 * bare path is both the dedupe key and the full-size download URL.
 * @param raw - URL as found in markup
 * @param baseUrl - Storefront base URL for relative references
 */
export function normalizeImageUrl(raw: string, baseUrl: string): string {
  let url = decodeHTML(raw.trim());

  if (url.startsWith("//")) {
    url = `https:${url}`;
  } else if (!/^https?:/i.test(url)) {
    try {
      url = new URL(url, baseUrl).toString();
    } catch {
      // leave as-is; the query is still stripped below
    }
  }

  const cut = url.search(/[?#]/);
  return cut >= 0 ? url.slice(0, cut) : url;
}

/**
 * Drops exact repeats, keeping first-seen order.
 * Order decides image indices (and so filenames), so never sort here.
 */
export function dedupeUrls(urls: readonly string[]): string[] {
  return uniq(urls);
}

/** Canonicalize every URL, then dedupe the canonical forms */
export function canonicalizeImageUrls(
  urls: readonly string[],
  baseUrl: string,
): string[] {
  return dedupeUrls(urls.map((u) => normalizeImageUrl(u, baseUrl)));
}
