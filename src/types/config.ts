/**
 * Runtime configuration type definitions
 */

export type EnvConfig = {
  catalogPath: string;
  frequencyPath: string;
  wordlistsDir: string;
  videoBaseUrl: string;
  annotation: AnnotationConfig;
};

export type AnnotationConfig = {
  apiUrl: string;
  /** Empty when not configured; only required with --annotate */
  apiKey: string;
  model: string;
};
