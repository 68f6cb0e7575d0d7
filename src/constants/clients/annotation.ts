/**
 * Annotation client constants
 */

export const DEFAULT_ANNOTATION_API_URL = "https://api.anthropic.com/v1/messages";

export const DEFAULT_ANNOTATION_MODEL = "claude-3-5-haiku-latest";

export const ANNOTATION_API_VERSION = "2023-06-01";

export const ANNOTATION_MAX_TOKENS = 512;

export const ANNOTATION_TIMEOUT_MS = 60_000;

/**
 * Quote characters stripped from both ends of the returned text
 */
export const SURROUNDING_QUOTES = ["\"", "'", "“", "”", "„", "«", "»"];

/**
 * Instruction sent with every annotation request.
 */
export const ANNOTATION_SYSTEM_PROMPT = [
  "You mark words in Swedish example sentences for a sign language flashcard app.",
  "Given a base word and a sentence, wrap every occurrence of the word in the sentence in square brackets,",
  "including inflected, derived and compound forms (e.g. base word \"hund\": \"Hundarna\" -> \"[Hundarna]\", \"vakthund\" -> \"[vakthund]\").",
  "Do not change anything else in the sentence: no translation, no punctuation or spelling fixes.",
  "Reply with the sentence only.",
].join(" ");
