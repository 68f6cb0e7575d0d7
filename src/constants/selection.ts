/**
 * Candidate selection tunables
 */

export const DEFAULT_MAX_CANDIDATES = 100;

/**
 * Separator between slugs in the --category option.
 */
export const CATEGORY_SLUG_SEPARATOR = ",";
