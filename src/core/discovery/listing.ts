/**
 * Product link extraction from collection listing pages
 */

import { load as loadHtml } from "cheerio";
import { STORE_CONSTANTS } from "../constants/index";

/**
 * Absolute product URLs linked from a listing page, first-seen order.
 * Query strings and fragments are dropped so variant links collapse onto
 * the product page.
 * @param html - Rendered listing markup
 * @param baseUrl - Storefront base URL for relative hrefs
 */
export function extractProductLinks(html: string, baseUrl: string): string[] {
  const $ = loadHtml(html);
  const out = new Set<string>();

  $(STORE_CONSTANTS.PRODUCT_LINK_SELECTOR).each((_, el) => {
    const href = $(el).attr("href")?.trim();
    if (!href) return;
    try {
      const u = new URL(href, baseUrl);
      u.search = "";
      u.hash = "";
      out.add(u.toString());
    } catch {
      // unparseable href
    }
  });

  return Array.from(out);
}
