export * from "./logger";
export * from "./catalog";
export * from "./frequency";
export * from "./selection";
export * from "./phrases";
export * from "./output";
export * from "./config";
export * from "./pipeline";
export * from "./clients/http";
export * from "./clients/annotation";
