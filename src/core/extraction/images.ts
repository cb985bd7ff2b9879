/**
 * Product image URL harvesting from raw markup
 */

import { STORE_CONSTANTS } from "../constants/index";
import { normalizeImageUrl } from "./normalize";

type Detector = (html: string) => string[];

const matchAll = (re: RegExp, html: string): string[] =>
  Array.from(html.matchAll(re), (m) => m[1] ?? "").filter(Boolean);

/** Responsive-image candidate lists: first token of each comma-separated entry */
const fromSrcset: Detector = (html) =>
  matchAll(/srcset=["']([^"']+)["']/gi, html).flatMap((srcset) =>
    srcset
      .split(",")
      .map((entry) => entry.trim().split(/\s+/)[0] ?? "")
      .filter(Boolean),
  );

/** Plain src attributes already pointing at the product/file CDN paths */
const fromSrc: Detector = (html) =>
  matchAll(/src=["']([^"']+(?:cdn\/shop\/(?:files|products)\/)[^"']+)["']/gi, html);

/** Lazy-loading deferred sources */
const fromDataSrc: Detector = (html) =>
  matchAll(/data-src=["']([^"']+)["']/gi, html);

/** Embedded JSON media blocks; slashes may be escaped */
const fromJson: Detector = (html) =>
  matchAll(/"src":\s*"([^"]+cdn\\?\/shop\\?\/[^"]+)"/gi, html).map((u) =>
    u.replace(/\\\//g, "/"),
  );

const DETECTORS: readonly Detector[] = [fromSrcset, fromSrc, fromDataSrc, fromJson];

/**
 * Admission filter for product images.
 * Must live under the CDN path and carry an image extension, either as the
 * path suffix or somewhere in the path before the query string.
 */
export function isProductImage(url: string): boolean {
  if (!url) return false;
  if (!url.includes(STORE_CONSTANTS.CDN_MARKER)) return false;

  const lower = url.toLowerCase();
  const path = lower.split(/[?#]/)[0] ?? "";
  return STORE_CONSTANTS.IMAGE_EXTENSIONS.some(
    (ext) => path.endsWith(ext) || lower.includes(`${ext}?`) || path.includes(ext),
  );
}

/**
 * Runs every detector over the markup and returns admitted, canonical image
 * URLs in encounter order (detector order, then position in the markup).
 */
export function harvestImageUrls(html: string, baseUrl: string): string[] {
  const found = new Set<string>();
  for (const detect of DETECTORS) {
    for (const candidate of detect(html)) {
      if (isProductImage(candidate)) {
        found.add(normalizeImageUrl(candidate, baseUrl));
      }
    }
  }
  return Array.from(found);
}
