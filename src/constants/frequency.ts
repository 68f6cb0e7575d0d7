/**
 * Frequency corpus constants
 */

/**
 * Default path to the frequency corpus, relative to the working directory.
 */
export const DEFAULT_FREQUENCY_PATH = "stats_PAROLE.txt";

export const FREQUENCY_FIELD_SEPARATOR = "\t";

/**
 * Lines with fewer tab-separated fields are headers or noise.
 */
export const FREQUENCY_MIN_FIELDS = 5;
