/**
 * CLI runner: maps parsed options onto the pipeline and exit codes
 *
 * Returns the process exit code instead of exiting so it can be driven
 * from tests.
 */

import * as path from "path";
import { CommanderError } from "commander";
import type { EnvConfig, GenerateDeps, GenerateOptions } from "@/types";
import { INDEX_FILENAME } from "@/constants";
import { readEnvConfig } from "@/config";
import { listCategories, loadCatalog } from "@/catalog";
import { hasSelectionCriteria } from "@/selection";
import { RemoteAssetVerifier } from "@/assets";
import { AnnotationClient } from "@/clients/annotation";
import { rebuildIndex } from "@/output";
import { generateWordlist } from "@/pipeline";
import * as logger from "@/logger";
import { buildProgram } from "./program";
import type { CliOptions } from "./program";

export type CliContext = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Overrides for collaborators (tests inject in-process fakes) */
  deps?: GenerateDeps;
  /** Plain output (listings); defaults to console.log */
  print?: (line: string) => void;
};

type ResolvedPaths = {
  catalogPath: string;
  frequencyPath: string;
  wordlistsDir: string;
};

function resolvePaths(opts: CliOptions, config: EnvConfig, cwd: string): ResolvedPaths {
  return {
    catalogPath: path.resolve(cwd, opts.csv ?? config.catalogPath),
    frequencyPath: path.resolve(cwd, opts.freq ?? config.frequencyPath),
    wordlistsDir: path.resolve(cwd, opts.wordlistsDir ?? config.wordlistsDir),
  };
}

function printWarnings(warnings: string[]): void {
  if (warnings.length === 0) return;
  logger.warn(`Warnings (${warnings.length}):`);
  for (const warning of warnings) {
    logger.warn(`  ${warning}`);
  }
}

function buildDeps(
  opts: CliOptions,
  config: EnvConfig,
  onWarning: (warning: string) => void,
  overrides: GenerateDeps = {},
): GenerateDeps {
  const deps: GenerateDeps = { ...overrides, onWarning };
  if (opts.verify && !deps.verifier) {
    deps.verifier = new RemoteAssetVerifier({ baseUrl: config.videoBaseUrl });
  }
  if (opts.annotate && !deps.annotator) {
    deps.annotator = new AnnotationClient(config.annotation);
  }
  return deps;
}

/**
 * Parse argv and run the requested mode
 *
 * @param argv - Full process argv (node, script, ...args)
 * @returns Exit code: 0 on success, 1 on any fatal error
 */
export async function runCli(argv: string[], context: CliContext = {}): Promise<number> {
  const print = context.print ?? ((line: string) => console.log(line));
  const cwd = context.cwd ?? process.cwd();
  const config = readEnvConfig(context.env ?? process.env);

  const program = buildProgram().exitOverride();
  try {
    program.parse(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const opts = program.opts<CliOptions>();
  const paths = resolvePaths(opts, config, cwd);
  const warnings: string[] = [];

  try {
    if (opts.rebuild) {
      const files = rebuildIndex(paths.wordlistsDir);
      print(`Rebuilt ${INDEX_FILENAME} (${files.length} wordlists: ${files.join(", ")})`);
      return 0;
    }

    if (opts.listCategories) {
      const rows = loadCatalog(paths.catalogPath);
      for (const summary of listCategories(rows)) {
        print(`  ${summary.slug}  ${summary.label} (${summary.count} words)`);
      }
      return 0;
    }

    if (!opts.id || !opts.name || !opts.output) {
      logger.error("--id, --name, and -o/--output are required for generation");
      return 1;
    }

    const categorySlugs = opts.category ?? [];
    if (!opts.wordfile && !hasSelectionCriteria({ categorySlugs, maxCount: opts.maxlength })) {
      logger.error("At least one of --wordfile or --category is required");
      return 1;
    }

    const options: GenerateOptions = {
      ...paths,
      wordFilePath: opts.wordfile ? path.resolve(cwd, opts.wordfile) : undefined,
      categorySlugs,
      maxCount: opts.maxlength,
      keepInputOrder: opts.keepOrder,
      id: opts.id,
      name: opts.name,
      outputPath: path.resolve(cwd, opts.output),
      chunkSize: opts.split,
      verify: opts.verify,
      verifyConcurrency: opts.verifyConcurrency,
      includePhrases: opts.phrases || opts.annotate,
    };

    const deps = buildDeps(opts, config, (warning) => warnings.push(warning), context.deps);
    const summary = await generateWordlist(options, deps);
    printWarnings(warnings);
    logger.info("Wordlist generation finished", {
      artifacts: summary.artifacts.length,
      words: summary.wordCount,
      phrases: summary.phraseCount,
    });
    return 0;
  } catch (error) {
    printWarnings(warnings);
    logger.error(error instanceof Error ? error.message : String(error), {
      error: error instanceof Error ? error.name : undefined,
    });
    logger.debug("Stack trace", {
      stack: error instanceof Error ? error.stack : undefined,
    });
    return 1;
  }
}
