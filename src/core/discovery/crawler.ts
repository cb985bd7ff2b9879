/**
 * Storefront walking: paginated listing discovery and product page fetches
 */

import type { PageRenderer } from "../browser/renderer";
import type { CrawlerPacing, StoreConfig } from "../types/config";
import { Logger } from "../utils/logger";
import { sleep } from "../utils/retry";
import { extractProductLinks } from "./listing";

export type PageListener = (page: number, newUrls: number) => void;

export class StorefrontCrawler {
  constructor(
    private readonly renderer: PageRenderer,
    private readonly store: StoreConfig,
    private readonly pacing: CrawlerPacing,
  ) {}

  get baseUrl(): string {
    return this.store.baseUrl.replace(/\/+$/, "");
  }

  listingUrl(page: number): string {
    return `${this.baseUrl}${this.store.collectionPath}?page=${page}`;
  }

  private async pause(): Promise<void> {
    if (this.pacing.delayMs > 0) await sleep(this.pacing.delayMs);
  }

  /**
   * Walks listing pages from 1 until a page has no product links, a page adds
   * nothing new, or the page cap is hit.
   * @param onPage - Called after each page that contributed URLs
   */
  async discoverProductUrls(onPage?: PageListener): Promise<string[]> {
    const t0 = Date.now();
    const found = new Set<string>();
    let page = 1;

    for (; page <= this.pacing.maxPages; page++) {
      const url = this.listingUrl(page);
      Logger.debug(`Fetching listing page ${page}`, { url });

      const html = await this.renderer.render(url);
      await this.pause();

      const links = extractProductLinks(html, this.baseUrl);
      if (links.length === 0) {
        Logger.info(`No products on page ${page}, stopping`);
        break;
      }

      const fresh = links.filter((l) => !found.has(l));
      if (fresh.length === 0) {
        Logger.info(`No new products on page ${page}, stopping`);
        break;
      }

      fresh.forEach((l) => found.add(l));
      Logger.debug(`Found ${fresh.length} products on page ${page}`);
      onPage?.(page, fresh.length);

      if (page === this.pacing.maxPages) {
        Logger.warn(`Reached page limit (${this.pacing.maxPages}), stopping`);
      }
    }

    Logger.discoveryComplete(found.size, Math.min(page, this.pacing.maxPages), Date.now() - t0);
    return Array.from(found);
  }

  /** Rendered markup of one product page, followed by the politeness delay */
  async fetchProductPage(url: string): Promise<string> {
    const html = await this.renderer.render(url);
    await this.pause();
    return html;
  }
}
