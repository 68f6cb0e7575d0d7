export * from "./logger";
export * from "./catalog";
export * from "./frequency";
export * from "./selection";
export * from "./assets";
export * from "./phrases";
export * from "./output";
export * from "./clients/http";
export * from "./clients/annotation";
