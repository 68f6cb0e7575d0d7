/**
 * Catalog loading
 *
 * Reads the sign catalog CSV into CatalogRow records. The loader only
 * extracts and trims fields: rows without a video are kept, filtering
 * is the selector's job.
 */

import * as fs from "fs";
import { parse } from "csv-parse/sync";
import type { CatalogRow } from "@/types";
import { CATALOG_COLUMNS } from "@/constants";
import { NotFoundError, normalizeWord } from "@/utils";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readField(record: Record<string, unknown>, column: string): string {
  const value = record[column];
  return typeof value === "string" ? value.trim() : "";
}

/**
 * Maps one parsed CSV record to a CatalogRow.
 *
 * Missing columns produce empty strings; the phrases column is kept
 * raw (untrimmed apart from surrounding whitespace) for later parsing.
 */
export function toCatalogRow(record: Record<string, unknown>): CatalogRow {
  return {
    word: normalizeWord(readField(record, CATALOG_COLUMNS.WORD)),
    videoPath: readField(record, CATALOG_COLUMNS.MOVIE),
    category: readField(record, CATALOG_COLUMNS.CATEGORY),
    categorySlug: readField(record, CATALOG_COLUMNS.CATEGORY_SLUG),
    description: readField(record, CATALOG_COLUMNS.DESCRIPTION),
    rawPhrases: readField(record, CATALOG_COLUMNS.PHRASES),
  };
}

/**
 * Parses catalog CSV text (header row required).
 *
 * @param content - CSV file content
 * @returns Rows in file order
 */
export function parseCatalog(content: string): CatalogRow[] {
  const records: unknown = parse(content, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  if (!Array.isArray(records)) {
    return [];
  }

  return records.filter(isRecord).map(toCatalogRow);
}

/**
 * Loads the catalog from disk.
 *
 * @param csvPath - Path to the catalog CSV
 * @returns Rows in file order
 * @throws {NotFoundError} If the file does not exist
 */
export function loadCatalog(csvPath: string): CatalogRow[] {
  if (!fs.existsSync(csvPath)) {
    throw new NotFoundError("Catalog file", csvPath);
  }
  return parseCatalog(fs.readFileSync(csvPath, "utf-8"));
}
