export * from "./crawler";
export * from "./listing";
