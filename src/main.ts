#!/usr/bin/env tsx
/**
 * Wordlist generator entrypoint
 *
 * Usage:
 *   npm run wordlist -- --category djur --id djur --name "Djur" -o wordlists/djur.js
 *
 * Environment variables (see .env.example):
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 *   - SIGN_DATA_PATH, FREQUENCY_PATH, WORDLISTS_DIR: input/output locations
 *   - VIDEO_BASE_URL: video host for existence checks
 *   - ANNOTATION_API_URL, ANNOTATION_API_KEY, ANNOTATION_MODEL: --annotate only
 */

import "dotenv/config";
import { runCli } from "./cli";
import * as logger from "./logger";

runCli(process.argv)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error("Fatal error", {
      error: error instanceof Error ? error.message : String(error),
    });
    logger.debug("Stack trace", {
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exitCode = 1;
  });
