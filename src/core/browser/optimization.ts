/**
 * Browser optimization utilities
 */

import type { Page } from "playwright-core";

const BLOCKED = new Set(["image", "font", "stylesheet", "media"]);

/**
 * Blocks heavy resources (images, fonts, stylesheets, media).
 * Image URLs are read from the markup, so the page never needs the bytes.
 * @param page - Playwright page instance to optimize
 */
export async function optimizePage(page: Page): Promise<void> {
  await page.route("**/*", (route) => {
    if (BLOCKED.has(route.request().resourceType())) return route.abort();
    return route.continue();
  });
}
