/**
 * Catalog type definitions
 *
 * The catalog is the sign dictionary export (one CSV row per sign).
 * Rows are kept close to the file: the loader only extracts and trims
 * fields, all filtering happens in the selector.
 */

/**
 * One sign from the catalog CSV.
 */
export type CatalogRow = {
  /** Headword, trimmed and lowercased */
  word: string;
  /** Relative video path (e.g. "movies/02/hund-00222-tecken.mp4"); empty when the sign has no video */
  videoPath: string;
  /** Display label of the category (e.g. "Djur / Däggdjur") */
  category: string;
  /** Short category identifier used for filtering; may be empty */
  categorySlug: string;
  /** Free-text description of how the sign is performed */
  description: string;
  /** Unparsed phrases column (serialized list of { phrase, movie } records) */
  rawPhrases: string;
};

/**
 * Row of the category listing.
 */
export type CategorySummary = {
  slug: string;
  label: string;
  /** Rows in this category that carry a usable video */
  count: number;
};
