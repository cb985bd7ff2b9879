/**
 * Page rendering behind a small interface so the crawl never touches
 * Playwright directly
 */

import type { Browser, BrowserContext } from "playwright-core";
import { AppConfig } from "../config/app-config";
import { BROWSER_CONSTANTS } from "../constants/index";
import { Logger } from "../utils/logger";
import { BROWSER_RETRY_OPTIONS, withRetry, type RetryOptions } from "../utils/retry";
import { launchBrowser } from "./launcher";
import { optimizePage } from "./optimization";

export interface PageRenderer {
  /** Fully rendered markup of the page at `url` */
  render(url: string): Promise<string>;
  close(): Promise<void>;
}

export interface PlaywrightRendererOptions {
  headless?: boolean;
  navigationTimeoutMs?: number;
  retry?: RetryOptions;
}

/**
 * Chromium-backed renderer. The browser is launched lazily on first use and
 * one context (fixed user agent) is shared by every page.
 */
export class PlaywrightRenderer implements PageRenderer {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private readonly headless: boolean;
  private readonly timeoutMs: number;
  private readonly retry: RetryOptions;

  constructor(options: PlaywrightRendererOptions = {}) {
    this.headless = options.headless ?? AppConfig.HEADLESS;
    this.timeoutMs = options.navigationTimeoutMs ?? AppConfig.NAVIGATION_TIMEOUT_MS;
    this.retry = options.retry ?? BROWSER_RETRY_OPTIONS;
  }

  private async getContext(): Promise<BrowserContext> {
    if (this.context) return this.context;
    this.browser = await launchBrowser(this.headless);
    this.context = await this.browser.newContext({
      userAgent: BROWSER_CONSTANTS.USER_AGENT,
    });
    Logger.debug("Browser launched", { headless: this.headless });
    return this.context;
  }

  async render(url: string): Promise<string> {
    const context = await this.getContext();
    return withRetry(async () => {
      const page = await context.newPage();
      try {
        await optimizePage(page);
        await page.goto(url, {
          waitUntil: BROWSER_CONSTANTS.NAV_WAIT,
          timeout: this.timeoutMs,
        });
        return await page.content();
      } finally {
        await page.close();
      }
    }, this.retry);
  }

  async close(): Promise<void> {
    await this.context?.close();
    await this.browser?.close();
    this.context = null;
    this.browser = null;
  }
}
