/**
 * Application constants
 */

// Storefront markup conventions
export const STORE_CONSTANTS = {
  DEFAULT_BASE_URL: "https://store.example.com",
  DEFAULT_COLLECTION_PATH: "/collections/all",
  PRODUCT_ROUTE: "products",
  PRODUCT_LINK_SELECTOR: 'a[href*="/products/"]',
  CDN_MARKER: "cdn/shop/",
  IMAGE_EXTENSIONS: [".jpg", ".jpeg", ".png", ".webp", ".gif"],
  DEFAULT_IMAGE_EXTENSION: ".jpg",
  UNKNOWN_PRODUCT_NAME: "Unknown Product",
  ALL_COLLECTION: "all",
  PRICE_PREFIX: "$",
} as const;

// Execution constants
export const EXECUTION_CONSTANTS = {
  CHECKPOINT_EVERY: 10, // persist the snapshot every N crawled products
  MAX_LISTING_PAGES: 50,
  DEFAULT_DELAY_MS: 1500,
  MAX_CONCURRENT_DOWNLOADS: 5,
  DEFAULT_AGENT: "crawler-agent",
} as const;

// Browser / transport constants
export const BROWSER_CONSTANTS = {
  USER_AGENT:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  ACCEPT_IMAGE_HEADER: "image/avif,image/webp,image/apng,image/*,*/*;q=0.8",
  NAV_WAIT: "networkidle",
  NAVIGATION_TIMEOUT_MS: 30000,
  DOWNLOAD_TIMEOUT_MS: 30000,
} as const;

// Ledger document constants
export const LEDGER_CONSTANTS = {
  VERSION: "1.0",
  PROJECT: "storefront-image-crawler",
  PLATFORM: "Shopify",
  JOB_ID_PREFIX: "JOB",
  ERROR_ID_PREFIX: "ERR",
  SESSION_ID_PREFIX: "SESSION",
} as const;
