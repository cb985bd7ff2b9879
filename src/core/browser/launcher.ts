/**
 * Browser launching and configuration
 */

import { chromium, type Browser } from "playwright-core";
import { AppConfig } from "../config/app-config";

/**
 * Launches a Chromium browser instance with container-friendly flags.
 * `playwright-core` ships no browser: set PLAYWRIGHT_CHROMIUM_EXECUTABLE_PATH
 * or install one with the Playwright CLI.
 * @param headless - Run without a window (default from HEADLESS)
 * @returns Promise resolving to the browser instance
 */
export async function launchBrowser(headless: boolean = AppConfig.HEADLESS): Promise<Browser> {
  return await chromium.launch({
    headless,
    executablePath: process.env.PLAYWRIGHT_CHROMIUM_EXECUTABLE_PATH || undefined,
    args: ["--disable-dev-shm-usage", "--no-sandbox"],
  });
}
