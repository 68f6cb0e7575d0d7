/**
 * Wordlist generation run type definitions
 */

import type { AssetVerifier, TextAnnotator } from "@/interfaces";
import type { Logger } from "./logger";

export type GenerateOptions = {
  catalogPath: string;
  frequencyPath: string;
  /** Canonical wordlists directory; its index is rebuilt after writing into it */
  wordlistsDir: string;
  wordFilePath?: string;
  categorySlugs: string[];
  maxCount: number;
  keepInputOrder: boolean;
  id: string;
  name: string;
  outputPath: string;
  chunkSize?: number;
  verify: boolean;
  verifyConcurrency: number;
  includePhrases: boolean;
};

/**
 * Collaborators of a run. Missing ones are only an error when the
 * corresponding option needs them.
 */
export type GenerateDeps = {
  verifier?: AssetVerifier;
  annotator?: TextAnnotator;
  logger?: Logger;
  /** Receives each warning as it is recorded, so a failed run still has them */
  onWarning?: (warning: string) => void;
};

export type RunSummary = {
  /** Written artifact paths, in write order */
  artifacts: string[];
  wordCount: number;
  phraseCount: number;
  warnings: string[];
  /** Files concatenated into the index, or null when no index was rebuilt */
  indexedFiles: string[] | null;
};
