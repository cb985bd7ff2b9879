export * from "./ledger";
export * from "./report";
export * from "./schema";
export * from "./stats";
