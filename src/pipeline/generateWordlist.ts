/**
 * Wordlist generation run
 *
 * Catalog → selection (frequency ranked) → video verification →
 * phrase extraction → artifact writing → index rebuild.
 *
 * Progress is logged as it happens; recoverable problems are collected
 * in `warnings` and returned for the caller to print as a batch. They also
 * go to `deps.onWarning` as they occur, since a fatal error later in the
 * run leaves no summary to read them from.
 * Nothing is written until every artifact's entries are computed.
 */

import type {
  GenerateDeps,
  GenerateOptions,
  PhraseEntry,
  RunSummary,
  WordEntry,
} from "@/types";
import { loadCatalog } from "@/catalog";
import { loadFrequencyTable } from "@/frequency";
import { readWordList, selectCandidates } from "@/selection";
import { toWordEntry, verifyCandidates } from "@/assets";
import { extractPhrases } from "@/phrases";
import { planArtifacts, rebuildIndex, writeArtifacts } from "@/output";
import { isSameDirectory } from "@/utils";
import * as defaultLogger from "@/logger";
import * as path from "path";

/**
 * Error thrown when no word survives selection and verification.
 */
export class NoEntriesError extends Error {
  /** Warnings collected before the run stopped */
  public readonly warnings: string[];

  constructor(warnings: string[] = []) {
    super("No valid entries generated");
    this.name = "NoEntriesError";
    this.warnings = warnings;
  }
}

/**
 * Runs the full pipeline for one wordlist.
 *
 * @throws {NotFoundError} If the catalog or word file is missing
 * @throws {SelectionCriteriaError} If no category and no word file are given
 * @throws {NoEntriesError} If zero entries survive
 * @throws {AnnotationError} If annotation is enabled and a call fails
 */
export async function generateWordlist(
  options: GenerateOptions,
  deps: GenerateDeps = {},
): Promise<RunSummary> {
  const log = deps.logger ?? defaultLogger.withContext({ wordlist: options.id });
  const warnings: string[] = [];
  const addWarning = (warning: string): void => {
    warnings.push(warning);
    deps.onWarning?.(warning);
  };

  log.info(`Loading sign data: ${options.catalogPath}`);
  const rows = loadCatalog(options.catalogPath);
  log.info(`Loaded ${rows.length} catalog entries`);

  const wordList = options.wordFilePath ? readWordList(options.wordFilePath) : undefined;

  const frequency = loadFrequencyTable(options.frequencyPath);
  if (frequency.missing) {
    addWarning(`FREQUENCY FILE MISSING: ${options.frequencyPath} (using catalog order)`);
  } else {
    log.info(`Loaded ${frequency.table.size} unique word forms`, {
      path: options.frequencyPath,
    });
  }

  const selection = selectCandidates({
    rows,
    frequency: frequency.table,
    categorySlugs: options.categorySlugs,
    wordList,
    maxCount: options.maxCount,
    keepInputOrder: options.keepInputOrder,
  });

  if (options.categorySlugs.length > 0) {
    log.info(
      `Category filter matched ${selection.matchedCategories.length} categories (${selection.lookupSize} words)`,
      { categories: selection.matchedCategories },
    );
  }
  for (const slug of selection.unmatchedSlugs) {
    addWarning(`CATEGORY NOT FOUND: '${slug}'`);
  }
  const categoryNote =
    options.categorySlugs.length > 0
      ? ` (not in category '${options.categorySlugs.join(",")}')`
      : "";
  for (const word of selection.notFound) {
    addWarning(`NOT FOUND: '${word}'${categoryNote}`);
  }
  if (selection.dropped.length > 0) {
    log.info(
      `Trimmed to ${options.maxCount} most frequent words (dropped ${selection.dropped.length})`,
    );
  } else {
    log.info(`Selected ${selection.candidates.length} words`);
  }

  let entries: WordEntry[];
  if (options.verify) {
    if (!deps.verifier) {
      throw new Error("Video verification requested but no verifier was provided");
    }
    const verification = await verifyCandidates(selection.candidates, deps.verifier, {
      concurrency: options.verifyConcurrency,
      logger: log,
    });
    entries = verification.entries;
    for (const entry of verification.missing) {
      addWarning(`VIDEO MISSING: '${entry.word}' -> ${entry.video}`);
    }
  } else {
    entries = selection.candidates.map(toWordEntry);
  }

  if (entries.length === 0) {
    throw new NoEntriesError(warnings);
  }

  let phrases: PhraseEntry[] | undefined;
  if (options.includePhrases) {
    const surviving = new Set(entries.map((entry) => entry.word));
    const extraction = await extractPhrases(
      selection.candidates.filter((candidate) => surviving.has(candidate.word)),
      { annotator: deps.annotator, logger: log },
    );
    phrases = extraction.phrases;
    log.info(`Extracted ${phrases.length} phrases`, {
      skipped: extraction.skipped,
      duplicates: extraction.duplicates,
    });
  }

  const planned = planArtifacts(
    {
      id: options.id,
      name: options.name,
      outputPath: options.outputPath,
      chunkSize: options.chunkSize,
    },
    entries,
    phrases,
  );
  const artifacts = writeArtifacts(planned);
  for (const item of planned) {
    log.info(
      `Wrote ${item.artifact.words.length} words` +
        (item.artifact.phrases ? ` and ${item.artifact.phrases.length} phrases` : "") +
        ` to ${item.path}`,
    );
  }

  let indexedFiles: string[] | null = null;
  const outputDir = path.dirname(path.resolve(options.outputPath));
  if (isSameDirectory(outputDir, options.wordlistsDir)) {
    indexedFiles = rebuildIndex(outputDir);
    log.info(`Rebuilt index (${indexedFiles.length} wordlists)`, { files: indexedFiles });
  }

  return {
    artifacts,
    wordCount: entries.length,
    phraseCount: phrases?.length ?? 0,
    warnings,
    indexedFiles,
  };
}
