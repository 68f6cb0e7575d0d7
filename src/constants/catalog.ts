/**
 * Catalog configuration constants
 */

/**
 * Default path to the sign catalog CSV, relative to the working directory.
 */
export const DEFAULT_CATALOG_PATH = "sign_data.csv";

/**
 * CSV header names read by the loader.
 */
export const CATALOG_COLUMNS = {
  WORD: "word",
  MOVIE: "movie",
  CATEGORY: "category",
  CATEGORY_SLUG: "category_slug",
  DESCRIPTION: "description",
  PHRASES: "phrases",
} as const;

/**
 * Reserved category slug selecting fingerspelling-only signs.
 *
 * It does not exist in the category_slug column; rows are matched
 * through their description instead.
 */
export const FINGERSPELLING_SLUG = "fingerspelling";

/**
 * Label shown for the fingerspelling pseudo-category in listings.
 */
export const FINGERSPELLING_LABEL = "Bokstavering (endast bokstaverade tecken)";

/**
 * Description prefix of signs that are spelled letter by letter
 * (e.g. "Bokstaveras h-u-n-d").
 */
export const FINGERSPELLING_DESCRIPTION_MARKER = "bokstaveras";

/**
 * Separator marking a combined form (spelling plus a sign),
 * e.g. "Bokstaveras v-m + tecknet för mästerskap".
 */
export const ALTERNATE_FORM_SEPARATOR = "+";
