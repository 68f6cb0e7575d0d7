/**
 * Category queries over catalog rows
 */

import type { CatalogRow, CategorySummary } from "@/types";
import {
  ALTERNATE_FORM_SEPARATOR,
  FINGERSPELLING_DESCRIPTION_MARKER,
  FINGERSPELLING_LABEL,
  FINGERSPELLING_SLUG,
} from "@/constants";

export function hasVideo(row: CatalogRow): boolean {
  return row.videoPath.length > 0;
}

/**
 * True for signs that are only spelled letter by letter: the description
 * starts with the fingerspelling marker and names no combined form.
 */
export function isFingerspellingRow(row: CatalogRow): boolean {
  const description = row.description.trim().toLowerCase();
  return (
    description.startsWith(FINGERSPELLING_DESCRIPTION_MARKER) &&
    !description.includes(ALTERNATE_FORM_SEPARATOR)
  );
}

/**
 * Lists every category slug with its label and the number of rows that
 * carry a video, sorted by slug. Rows without a slug are not listed.
 * The fingerspelling pseudo-category is appended when any row qualifies.
 */
export function listCategories(rows: readonly CatalogRow[]): CategorySummary[] {
  const bySlug = new Map<string, CategorySummary>();
  let fingerspelling = 0;

  for (const row of rows) {
    const usable = hasVideo(row);
    if (usable && isFingerspellingRow(row)) {
      fingerspelling++;
    }

    if (!row.categorySlug) continue;

    const slug = row.categorySlug.toLowerCase();
    let summary = bySlug.get(slug);
    if (!summary) {
      summary = { slug, label: row.category || slug, count: 0 };
      bySlug.set(slug, summary);
    }
    if (usable) {
      summary.count++;
    }
  }

  const summaries = [...bySlug.values()].sort((a, b) =>
    a.slug < b.slug ? -1 : a.slug > b.slug ? 1 : 0,
  );

  if (fingerspelling > 0) {
    summaries.push({
      slug: FINGERSPELLING_SLUG,
      label: FINGERSPELLING_LABEL,
      count: fingerspelling,
    });
  }

  return summaries;
}
