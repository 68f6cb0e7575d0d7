/**
 * Frequency corpus type definitions
 */

/**
 * Word → 0-based rank (lower = more frequent).
 *
 * A word missing from the table ranks after every listed word.
 */
export type FrequencyTable = ReadonlyMap<string, number>;

export type FrequencyLoadResult = {
  table: FrequencyTable;
  /** True when the corpus file was not found and the table is empty */
  missing: boolean;
};
