/**
 * Candidate selection
 *
 * Resolves category filters and/or an explicit word list into an ordered,
 * trimmed list of candidates, each bound to exactly one catalog row.
 *
 * Steps:
 * 1. Build the word → row lookup (rows with a video, matching a filter, first row wins)
 * 2. Take the word list restricted to the lookup, or every lookup key
 * 3. Stable sort by frequency rank (unknown words last)
 * 4. Truncate to the max count
 */

import type {
  CatalogRow,
  Candidate,
  SelectionCriteria,
  SelectionInput,
  SelectionResult,
} from "@/types";
import { FINGERSPELLING_SLUG } from "@/constants";
import { hasVideo, isFingerspellingRow } from "@/catalog";
import { rankOf } from "@/frequency";

/**
 * Error thrown when a selection has no criterion to select by.
 */
export class SelectionCriteriaError extends Error {
  constructor() {
    super("At least one of a word list or a category is required");
    this.name = "SelectionCriteriaError";
  }
}

export type CategoryFilter = {
  slugs: Set<string>;
  fingerspelling: boolean;
};

export function buildCategoryFilter(categorySlugs: string[]): CategoryFilter | null {
  const slugs = new Set(
    categorySlugs.map((slug) => slug.trim().toLowerCase()).filter(Boolean),
  );
  if (slugs.size === 0) {
    return null;
  }

  const fingerspelling = slugs.delete(FINGERSPELLING_SLUG);
  return { slugs, fingerspelling };
}

function matchesFilter(row: CatalogRow, filter: CategoryFilter): boolean {
  if (filter.slugs.has(row.categorySlug.toLowerCase())) {
    return true;
  }
  return filter.fingerspelling && isFingerspellingRow(row);
}

/**
 * Builds the word → row lookup in catalog order.
 *
 * @param rows - Catalog rows in file order
 * @param filter - Active category filter, or null for no filtering
 */
export function buildWordLookup(
  rows: readonly CatalogRow[],
  filter: CategoryFilter | null,
): Map<string, CatalogRow> {
  const lookup = new Map<string, CatalogRow>();

  for (const row of rows) {
    if (!row.word || !hasVideo(row)) continue;
    if (filter && !matchesFilter(row, filter)) continue;
    if (!lookup.has(row.word)) {
      lookup.set(row.word, row);
    }
  }

  return lookup;
}

/**
 * Requested slugs that match no catalog row at all.
 */
function findUnmatchedSlugs(
  rows: readonly CatalogRow[],
  filter: CategoryFilter,
): string[] {
  const seen = new Set<string>();
  let fingerspellingSeen = false;

  for (const row of rows) {
    seen.add(row.categorySlug.toLowerCase());
    if (!fingerspellingSeen && isFingerspellingRow(row)) {
      fingerspellingSeen = true;
    }
  }

  const unmatched = [...filter.slugs].filter((slug) => !seen.has(slug));
  if (filter.fingerspelling && !fingerspellingSeen) {
    unmatched.push(FINGERSPELLING_SLUG);
  }
  return unmatched;
}

/**
 * Sorts words by ascending frequency rank. Array.prototype.sort is
 * stable, so equal ranks (including all unknown words) keep their order.
 */
export function sortByFrequency(
  words: readonly string[],
  frequency: SelectionInput["frequency"],
): string[] {
  return [...words].sort((a, b) => rankOf(frequency, a) - rankOf(frequency, b));
}

export function hasSelectionCriteria(criteria: SelectionCriteria): boolean {
  return (
    criteria.wordList !== undefined ||
    criteria.categorySlugs.some((slug) => slug.trim().length > 0)
  );
}

/**
 * Selects the candidates for one wordlist.
 *
 * @throws {SelectionCriteriaError} If neither categories nor a word list are given
 */
export function selectCandidates(input: SelectionInput): SelectionResult {
  if (!hasSelectionCriteria(input)) {
    throw new SelectionCriteriaError();
  }

  const filter = buildCategoryFilter(input.categorySlugs);
  const lookup = buildWordLookup(input.rows, filter);

  const notFound: string[] = [];
  let words: string[];

  if (input.wordList !== undefined) {
    const requested = new Set<string>();
    words = [];
    for (const word of input.wordList) {
      if (requested.has(word)) continue;
      requested.add(word);
      if (lookup.has(word)) {
        words.push(word);
      } else {
        notFound.push(word);
      }
    }
  } else {
    words = [...lookup.keys()];
  }

  const ranked =
    input.keepInputOrder && input.wordList !== undefined
      ? words
      : sortByFrequency(words, input.frequency);

  const kept = ranked.slice(0, Math.max(0, input.maxCount));
  const dropped = ranked.slice(kept.length);

  const candidates: Candidate[] = [];
  for (const word of kept) {
    const row = lookup.get(word);
    if (row) {
      candidates.push({ word, row });
    }
  }

  const matchedCategories = [
    ...new Set([...lookup.values()].map((row) => row.category).filter(Boolean)),
  ].sort();

  return {
    candidates,
    notFound,
    dropped,
    unmatchedSlugs: filter ? findUnmatchedSlugs(input.rows, filter) : [],
    matchedCategories: filter ? matchedCategories : [],
    lookupSize: lookup.size,
  };
}
