/**
 * Configuration-related types
 */

import type { RetryOptions } from "../utils/retry";

/** Storefront layout the crawler walks */
export interface StoreConfig {
  baseUrl: string;
  collectionPath: string;
}

/** Pacing for page rendering */
export interface CrawlerPacing {
  delayMs: number;
  maxPages: number;
}

export interface DownloaderOptions {
  outputDir: string;
  maxConcurrent: number;
  retry?: RetryOptions;
}
