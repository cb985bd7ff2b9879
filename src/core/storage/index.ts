export * from "./crawl-result";
export * from "./json-document";
export * from "./metadata-store";
