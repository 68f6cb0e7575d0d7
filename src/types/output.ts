/**
 * Output artifact type definitions
 */

import type { PhraseEntry } from "./phrases";

export type WordEntry = {
  word: string;
  video: string;
};

/**
 * A wordlist as registered by the client (`window.WORDLISTS`).
 */
export type WordlistArtifact = {
  id: string;
  name: string;
  words: WordEntry[];
  phrases?: PhraseEntry[];
};

export type ArtifactTarget = {
  id: string;
  name: string;
  /** Output file path; chunk files derive their names from it */
  outputPath: string;
  /** Split into balanced chunks of at most about this many words */
  chunkSize?: number;
};

export type PlannedArtifact = {
  path: string;
  artifact: WordlistArtifact;
};
