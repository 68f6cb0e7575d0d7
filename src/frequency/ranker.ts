/**
 * Frequency ranking
 *
 * The corpus lists word forms from most to least frequent, one per line
 * with tab-separated statistics. Rank is the order of first appearance.
 */

import * as fs from "fs";
import type { FrequencyLoadResult, FrequencyTable } from "@/types";
import { FREQUENCY_FIELD_SEPARATOR, FREQUENCY_MIN_FIELDS } from "@/constants";
import { normalizeWord } from "@/utils";

/**
 * Builds the word → rank table from corpus text.
 *
 * Lines with fewer than FREQUENCY_MIN_FIELDS fields are ignored, as are
 * repeated words (the first occurrence keeps its rank). Ranks are
 * consecutive over the recorded words.
 *
 * @example
 * parseFrequencyCorpus("och\tKN\t1\t2\t3\nhund\tNN\t1\t2\t3\n")
 * // Map { "och" => 0, "hund" => 1 }
 */
export function parseFrequencyCorpus(content: string): FrequencyTable {
  const table = new Map<string, number>();

  for (const line of content.split("\n")) {
    const fields = line.split(FREQUENCY_FIELD_SEPARATOR);
    if (fields.length < FREQUENCY_MIN_FIELDS) continue;

    const word = normalizeWord(fields[0]);
    if (word && !table.has(word)) {
      table.set(word, table.size);
    }
  }

  return table;
}

/**
 * Loads the frequency table; a missing file yields an empty table.
 */
export function loadFrequencyTable(freqPath: string): FrequencyLoadResult {
  if (!fs.existsSync(freqPath)) {
    return { table: new Map(), missing: true };
  }
  return {
    table: parseFrequencyCorpus(fs.readFileSync(freqPath, "utf-8")),
    missing: false,
  };
}

/**
 * Rank of a word; unknown words rank after every known word.
 */
export function rankOf(table: FrequencyTable, word: string): number {
  return table.get(word) ?? table.size;
}
