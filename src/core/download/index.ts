export * from "./downloader";
export * from "./fetcher";
export * from "./filename";
