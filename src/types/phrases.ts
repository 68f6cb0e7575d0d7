/**
 * Phrase type definitions
 */

/**
 * One example phrase as stored in the catalog phrases column.
 */
export type PhraseRecord = {
  phrase: string;
  videoPath: string;
};

/**
 * Phrase entry written to a wordlist artifact.
 *
 * `phrase` carries the keyword forms wrapped in square brackets.
 */
export type PhraseEntry = {
  word: string;
  phrase: string;
  video: string;
};

export type PhraseExtractionResult = {
  phrases: PhraseEntry[];
  /** Raw records rejected (blank fields or empty after cleaning) */
  skipped: number;
  /** Entries removed as duplicates of an earlier (word, phrase) pair */
  duplicates: number;
};
