/**
 * Text normalization helpers shared by the loaders and phrase cleaning
 */

import { WHITESPACE_RUN_PATTERN } from "@/constants";

/**
 * Collapse every whitespace run to a single space and trim both ends.
 *
 * @example
 * collapseWhitespace("  Hunden \t skäller. ") // "Hunden skäller."
 */
export function collapseWhitespace(text: string): string {
  return text.replace(WHITESPACE_RUN_PATTERN, " ").trim();
}

/**
 * Key form of a headword: trimmed and lowercased.
 */
export function normalizeWord(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * Escape a string for literal use inside a RegExp.
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
