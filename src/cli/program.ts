/**
 * Command-line surface
 *
 * Usage:
 *   npm run wordlist -- --category djur --id djur --name "Djur" -o wordlists/djur.js
 *   npm run wordlist -- --category djur,mat --maxlength 50 --split 25 --id mix --name "Mix" -o wordlists/mix.js
 *   npm run wordlist -- --wordfile words.txt --phrases --id custom --name "Custom" -o wordlists/custom.js
 *   npm run wordlist -- --list-categories
 *   npm run wordlist -- --rebuild
 */

import { Command, InvalidArgumentError } from "commander";
import {
  CATEGORY_SLUG_SEPARATOR,
  DEFAULT_MAX_CANDIDATES,
  DEFAULT_VERIFY_CONCURRENCY,
} from "@/constants";

/**
 * Raw option values as parsed by commander.
 */
export type CliOptions = {
  wordfile?: string;
  category?: string[];
  maxlength: number;
  id?: string;
  name?: string;
  output?: string;
  csv?: string;
  freq?: string;
  wordlistsDir?: string;
  verify: boolean;
  verifyConcurrency: number;
  phrases: boolean;
  annotate: boolean;
  split?: number;
  keepOrder: boolean;
  listCategories: boolean;
  rebuild: boolean;
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function parseSlugs(value: string, previous: string[] = []): string[] {
  const slugs = value
    .split(CATEGORY_SLUG_SEPARATOR)
    .map((slug) => slug.trim())
    .filter(Boolean);
  return [...previous, ...slugs];
}

/**
 * Build the commander program (no action attached; the caller reads opts)
 */
export function buildProgram(): Command {
  return new Command()
    .name("wordlist")
    .description("Generate a flashcard wordlist file from the sign catalog")
    .option("--wordfile <path>", "text file with one word per line")
    .option(
      "--category <slugs>",
      "comma-separated category slugs ('fingerspelling' selects spelled-only signs)",
      parseSlugs,
    )
    .option("--maxlength <n>", "maximum number of words", parsePositiveInt, DEFAULT_MAX_CANDIDATES)
    .option("--id <id>", "wordlist id (e.g. 'djur')")
    .option("--name <name>", "display name (e.g. 'Djur')")
    .option("-o, --output <path>", "output file path")
    .option("--csv <path>", "path to the sign catalog CSV")
    .option("--freq <path>", "path to the frequency corpus")
    .option("--wordlists-dir <dir>", "canonical wordlists directory (index is rebuilt there)")
    .option("--no-verify", "skip video URL verification")
    .option(
      "--verify-concurrency <n>",
      "video probes in flight at once",
      parsePositiveInt,
      DEFAULT_VERIFY_CONCURRENCY,
    )
    .option("--phrases", "include example phrases", false)
    .option("--annotate", "bracket phrases with the external annotation service (implies --phrases)", false)
    .option("--split <n>", "split into balanced chunks of at most about n words", parsePositiveInt)
    .option("--keep-order", "keep word file order instead of frequency order", false)
    .option("--list-categories", "list all categories and exit", false)
    .option("--rebuild", "rebuild the wordlists index and exit", false)
    .showHelpAfterError();
}
