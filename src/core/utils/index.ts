export * from "./array";
export * from "./date";
export * from "./errors";
export * from "./logger";
export * from "./retry";
