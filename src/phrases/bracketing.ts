/**
 * Keyword bracketing
 *
 * Marks the target word and its word-initial inflected/derived forms in a
 * phrase so the client can highlight them: "Hunden skäller." → "[Hunden] skäller."
 *
 * A match must start at a word boundary and runs to the end of the word.
 * Occurrences already inside brackets (preceded by "[" or followed by "]")
 * are left alone, which makes the operation idempotent.
 */

import { BRACKET_CLOSE, BRACKET_OPEN, WORD_CHAR_CLASS } from "@/constants";
import { escapeRegExp } from "@/utils";

/**
 * Build the keyword pattern for a base word.
 *
 * The trailing lookahead forbids stopping inside a word or right before
 * "]", so the greedy suffix cannot backtrack into a partial match.
 */
export function keywordPattern(word: string): RegExp {
  const escapedOpen = escapeRegExp(BRACKET_OPEN);
  const escapedClose = escapeRegExp(BRACKET_CLOSE);
  return new RegExp(
    `(?<!${WORD_CHAR_CLASS}|${escapedOpen})` +
      `${escapeRegExp(word)}${WORD_CHAR_CLASS}*` +
      `(?!${WORD_CHAR_CLASS}|${escapedClose})`,
    "giu",
  );
}

/**
 * Wrap every occurrence of `word` (plus suffix) in square brackets
 *
 * @example
 * bracketKeyword("hund", "Hunden och hundarna") // "[Hunden] och [hundarna]"
 * bracketKeyword("hund", "[Hunden] skäller.") // "[Hunden] skäller."
 */
export function bracketKeyword(word: string, phrase: string): string {
  if (!word) {
    return phrase;
  }
  return phrase.replace(
    keywordPattern(word),
    (match) => `${BRACKET_OPEN}${match}${BRACKET_CLOSE}`,
  );
}
