/**
 * Phrase extraction
 *
 * For every verified candidate: parse the row's phrase records, clean
 * each phrase, bracket the keyword (locally or through the annotator)
 * and deduplicate by (word, phrase).
 */

import type { TextAnnotator } from "@/interfaces";
import type {
  Candidate,
  Logger,
  PhraseEntry,
  PhraseExtractionResult,
} from "@/types";
import { videoFilename } from "@/utils";
import * as defaultLogger from "@/logger";
import { parsePhraseRecords } from "./phraseRecords";
import { cleanPhrase } from "./cleaning";
import { bracketKeyword } from "./bracketing";

export type ExtractOptions = {
  /** External annotator; pattern bracketing is used when absent */
  annotator?: TextAnnotator;
  logger?: Logger;
};

/**
 * Keeps the first entry per (word, phrase) pair.
 */
export function dedupePhrases(entries: readonly PhraseEntry[]): PhraseEntry[] {
  const seen = new Set<string>();
  const unique: PhraseEntry[] = [];
  for (const entry of entries) {
    const key = `${entry.word}\u0000${entry.phrase}`;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(entry);
  }
  return unique;
}

/**
 * Extracts bracketed phrase entries for the given candidates, in
 * candidate order then record order.
 *
 * Candidates are processed one at a time; with an annotator each phrase
 * waits for its service call.
 *
 * @throws {AnnotationError} If the annotator fails (no fallback to pattern bracketing)
 */
export async function extractPhrases(
  candidates: readonly Candidate[],
  options: ExtractOptions = {},
): Promise<PhraseExtractionResult> {
  const log = options.logger ?? defaultLogger;
  const extracted: PhraseEntry[] = [];
  let skipped = 0;

  for (const { word, row } of candidates) {
    for (const record of parsePhraseRecords(row.rawPhrases)) {
      if (!record.phrase.trim() || !record.videoPath.trim()) {
        skipped++;
        continue;
      }

      const cleaned = cleanPhrase(record.phrase);
      if (!cleaned) {
        skipped++;
        continue;
      }

      let phrase: string;
      if (options.annotator) {
        phrase = await options.annotator.annotate(word, cleaned);
        log.info(`Annotated: ${word} -> ${phrase}`);
      } else {
        phrase = bracketKeyword(word, cleaned);
      }

      extracted.push({
        word,
        phrase,
        video: videoFilename(record.videoPath.trim()),
      });
    }
  }

  const phrases = dedupePhrases(extracted);
  return {
    phrases,
    skipped,
    duplicates: extracted.length - phrases.length,
  };
}
