export { RemoteAssetVerifier, assetUrl } from "./assetVerifier";
export type { RemoteAssetVerifierConfig } from "./assetVerifier";
export { verifyCandidates, toWordEntry } from "./verifyCandidates";
export type { VerificationResult, VerifyOptions } from "./verifyCandidates";
