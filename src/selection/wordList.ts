/**
 * Word list input: one word per line
 */

import * as fs from "fs";
import { NotFoundError, normalizeWord } from "@/utils";

/**
 * Parses word-list text: trimmed, lowercased, blank lines skipped.
 */
export function parseWordList(content: string): string[] {
  return content
    .split("\n")
    .map(normalizeWord)
    .filter((word) => word.length > 0);
}

/**
 * @throws {NotFoundError} If the file does not exist
 */
export function readWordList(filePath: string): string[] {
  if (!fs.existsSync(filePath)) {
    throw new NotFoundError("Word file", filePath);
  }
  return parseWordList(fs.readFileSync(filePath, "utf-8"));
}
