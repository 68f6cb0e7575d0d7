/**
 * Phrase text cleaning
 */

import { ENUMERATION_PREFIX_PATTERN } from "@/constants";
import { collapseWhitespace } from "@/utils";

/**
 * Strips a leading "alt N." marker, collapses whitespace and trims.
 *
 * @example
 * cleanPhrase("alt 1.  Hunden  skäller.") // "Hunden skäller."
 * cleanPhrase("Alt2.Katten sover") // "Katten sover"
 */
export function cleanPhrase(text: string): string {
  return collapseWhitespace(text.trimStart().replace(ENUMERATION_PREFIX_PATTERN, ""));
}
