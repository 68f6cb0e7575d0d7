/**
 * Phrase records: permissive reading of the catalog phrases column
 *
 * The column is untrusted: anything that is not a list of
 * { phrase, movie } records yields no phrases for the row.
 */

import type { PhraseRecord } from "@/types";
import { parseLiteral } from "./literalParser";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toPhraseRecord(value: unknown): PhraseRecord | null {
  if (!isRecord(value)) {
    return null;
  }
  const { phrase, movie } = value;
  if (typeof phrase !== "string" || typeof movie !== "string") {
    return null;
  }
  return { phrase, videoPath: movie };
}

/**
 * Parses the raw phrases column of a catalog row.
 *
 * Returns [] for empty or malformed payloads; entries of the wrong shape
 * are dropped individually. Never throws.
 *
 * @example
 * parsePhraseRecords("[{'phrase': 'Hunden skäller.', 'movie': 'movies/02/hund-00222-fras-1.mp4'}]")
 * // [{ phrase: "Hunden skäller.", videoPath: "movies/02/hund-00222-fras-1.mp4" }]
 */
export function parsePhraseRecords(raw: string): PhraseRecord[] {
  if (!raw.trim()) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = parseLiteral(raw);
  } catch {
    return [];
  }

  if (!Array.isArray(parsed)) {
    return [];
  }

  const records: PhraseRecord[] = [];
  for (const item of parsed) {
    const record = toPhraseRecord(item);
    if (record) {
      records.push(record);
    }
  }
  return records;
}
