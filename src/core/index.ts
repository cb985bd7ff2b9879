/**
 * Core module index - exports all core functionality
 */

// Constants
export * from "./constants/index";

// Config
export * from "./config/index";

// Types
export * from "./types/index";

// Utils
export * from "./utils/index";

// Extraction
export * from "./extraction/index";

// Download
export * from "./download/index";

// Storage
export * from "./storage/index";

// Ledger
export * from "./ledger/index";

// Browser
export * from "./browser/index";

// Discovery
export * from "./discovery/index";

// Execution
export * from "./execution/index";
