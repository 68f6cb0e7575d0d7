export type { AssetVerifier } from "./clients/assetVerifier";
export type { TextAnnotator } from "./clients/textAnnotator";
