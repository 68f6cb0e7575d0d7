/**
 * Output artifact constants
 */

/**
 * Default canonical wordlists directory, relative to the working directory.
 */
export const DEFAULT_WORDLISTS_DIR = "wordlists";

export const WORDLIST_FILE_EXTENSION = ".js";

/**
 * Aggregate index file; never included in itself.
 */
export const INDEX_FILENAME = "all.js";

export const INDEX_HEADER =
  "// Auto-generated — do not edit. Run with --rebuild to regenerate.\n";

/**
 * Client-side registry every artifact appends itself to.
 */
export const WORDLIST_REGISTRY = "window.WORDLISTS";

export const ARTIFACT_INDENT = "  ";
