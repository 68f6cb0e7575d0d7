/**
 * Utils barrel exports
 */

export * from "./text/textNormalization";
export * from "./fsErrors";
export * from "./paths";
