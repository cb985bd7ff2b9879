export * from "./launcher";
export * from "./optimization";
export * from "./renderer";
