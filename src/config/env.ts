/**
 * Environment configuration
 *
 * Values come from process.env (populated from .env by the entrypoint).
 * Unset or blank variables fall back to the defaults in @/constants;
 * CLI flags take precedence over everything read here.
 */

import type { EnvConfig } from "@/types";
import {
  DEFAULT_CATALOG_PATH,
  DEFAULT_FREQUENCY_PATH,
  DEFAULT_WORDLISTS_DIR,
  DEFAULT_VIDEO_BASE_URL,
  DEFAULT_ANNOTATION_API_URL,
  DEFAULT_ANNOTATION_MODEL,
} from "@/constants";

function readString(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: string,
): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

/**
 * Read the runtime configuration from an environment map
 *
 * @param env - Environment variables (defaults to process.env)
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    catalogPath: readString(env, "SIGN_DATA_PATH", DEFAULT_CATALOG_PATH),
    frequencyPath: readString(env, "FREQUENCY_PATH", DEFAULT_FREQUENCY_PATH),
    wordlistsDir: readString(env, "WORDLISTS_DIR", DEFAULT_WORDLISTS_DIR),
    videoBaseUrl: readString(env, "VIDEO_BASE_URL", DEFAULT_VIDEO_BASE_URL).replace(/\/+$/, ""),
    annotation: {
      apiUrl: readString(env, "ANNOTATION_API_URL", DEFAULT_ANNOTATION_API_URL),
      apiKey: readString(env, "ANNOTATION_API_KEY", ""),
      model: readString(env, "ANNOTATION_MODEL", DEFAULT_ANNOTATION_MODEL),
    },
  };
}
