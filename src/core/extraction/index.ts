export * from "./identifier";
export * from "./images";
export * from "./matchers";
export * from "./normalize";
export * from "./product";
