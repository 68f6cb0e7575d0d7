/**
 * Candidate selection type definitions
 */

import type { CatalogRow } from "./catalog";
import type { FrequencyTable } from "./frequency";

/**
 * A selected word and the catalog row it resolved to.
 */
export type Candidate = {
  word: string;
  row: CatalogRow;
};

export type SelectionCriteria = {
  /** Category slugs to include (case-insensitive, reserved fingerspelling slug allowed) */
  categorySlugs: string[];
  /** Explicit candidate words, in input order */
  wordList?: string[];
  /** Maximum number of candidates kept after ranking */
  maxCount: number;
  /** Keep word-list order instead of ranking by frequency */
  keepInputOrder?: boolean;
};

export type SelectionInput = SelectionCriteria & {
  rows: readonly CatalogRow[];
  frequency: FrequencyTable;
};

export type SelectionResult = {
  candidates: Candidate[];
  /** Word-list entries absent from the lookup */
  notFound: string[];
  /** Candidates cut by the max count, in ranked order */
  dropped: string[];
  /** Requested slugs that matched no catalog row */
  unmatchedSlugs: string[];
  /** Display labels of the categories that matched, sorted */
  matchedCategories: string[];
  /** Number of distinct words available after filtering */
  lookupSize: number;
};
