/**
 * Centralized application configuration
 */

import {
  BROWSER_CONSTANTS,
  EXECUTION_CONSTANTS,
  STORE_CONSTANTS,
} from "../constants/index";
import { envBool, envInt, envStr } from "./env";

export class AppConfig {
  // Target storefront
  static readonly STORE_BASE_URL = envStr(
    "STORE_BASE_URL",
    STORE_CONSTANTS.DEFAULT_BASE_URL,
  );
  static readonly COLLECTION_PATH = envStr(
    "COLLECTION_PATH",
    STORE_CONSTANTS.DEFAULT_COLLECTION_PATH,
  );

  // Output configuration
  static readonly OUTPUT_DIR = envStr("OUTPUT_DIR", "data/images");
  static readonly METADATA_FILE = envStr("METADATA_FILE", "data/metadata.json");
  static readonly LEDGER_FILE = envStr("LEDGER_FILE", "data/crawl-ledger.json");

  // Browser configuration
  static readonly HEADLESS = envBool("HEADLESS", true);
  static readonly NAVIGATION_TIMEOUT_MS = envInt(
    "NAVIGATION_TIMEOUT_MS",
    BROWSER_CONSTANTS.NAVIGATION_TIMEOUT_MS,
  );

  // Execution configuration
  static readonly DELAY_MS = envInt("DELAY_MS", EXECUTION_CONSTANTS.DEFAULT_DELAY_MS);
  static readonly MAX_CONCURRENT_DOWNLOADS = Math.max(
    1,
    envInt("MAX_CONCURRENT_DOWNLOADS", EXECUTION_CONSTANTS.MAX_CONCURRENT_DOWNLOADS),
  );
  static readonly CHECKPOINT_EVERY = Math.max(
    1,
    envInt("CHECKPOINT_EVERY", EXECUTION_CONSTANTS.CHECKPOINT_EVERY),
  );
  static readonly MAX_LISTING_PAGES = Math.max(
    1,
    envInt("MAX_LISTING_PAGES", EXECUTION_CONSTANTS.MAX_LISTING_PAGES),
  );
  static readonly DOWNLOAD_TIMEOUT_MS = envInt(
    "DOWNLOAD_TIMEOUT_MS",
    BROWSER_CONSTANTS.DOWNLOAD_TIMEOUT_MS,
  );
  static readonly AGENT_NAME = envStr("AGENT_NAME", EXECUTION_CONSTANTS.DEFAULT_AGENT);
}
