/**
 * Unit tests for environment configuration
 */

import { describe, it, expect } from "vitest";
import { readEnvConfig } from "@/config";
import {
  DEFAULT_ANNOTATION_API_URL,
  DEFAULT_ANNOTATION_MODEL,
  DEFAULT_VIDEO_BASE_URL,
} from "@/constants";

describe("readEnvConfig", () => {
  it("falls back to defaults for unset and blank variables", () => {
    expect(readEnvConfig({ SIGN_DATA_PATH: "   " })).toEqual({
      catalogPath: "sign_data.csv",
      frequencyPath: "stats_PAROLE.txt",
      wordlistsDir: "wordlists",
      videoBaseUrl: DEFAULT_VIDEO_BASE_URL,
      annotation: {
        apiUrl: DEFAULT_ANNOTATION_API_URL,
        apiKey: "",
        model: DEFAULT_ANNOTATION_MODEL,
      },
    });
  });

  it("reads every variable and trims values", () => {
    const config = readEnvConfig({
      SIGN_DATA_PATH: " data/signs.csv ",
      FREQUENCY_PATH: "data/freq.txt",
      WORDLISTS_DIR: "public/wordlists",
      VIDEO_BASE_URL: "https://videos.test/movies//",
      ANNOTATION_API_URL: "https://annotation.test/v1/messages",
      ANNOTATION_API_KEY: "test-key",
      ANNOTATION_MODEL: "test-model",
    });

    expect(config).toEqual({
      catalogPath: "data/signs.csv",
      frequencyPath: "data/freq.txt",
      wordlistsDir: "public/wordlists",
      videoBaseUrl: "https://videos.test/movies",
      annotation: {
        apiUrl: "https://annotation.test/v1/messages",
        apiKey: "test-key",
        model: "test-model",
      },
    });
  });
});
