/**
 * Phrase cleaning and bracketing constants
 */

/**
 * Leading enumeration marker on alternative phrasings ("alt 1.", "Alt2. ")
 */
export const ENUMERATION_PREFIX_PATTERN = /^alt\s*\d+\.\s*/i;

export const WHITESPACE_RUN_PATTERN = /\s+/g;

/**
 * Character class of word characters used when extending a keyword
 * match into its inflected forms (Unicode-aware \w).
 */
export const WORD_CHAR_CLASS = "[\\p{L}\\p{M}\\p{N}_]";

export const BRACKET_OPEN = "[";
export const BRACKET_CLOSE = "]";
