/**
 * Integration tests for a full generateWordlist run
 *
 * Catalog and corpus fixtures in a temp workspace; verifier and annotator
 * are in-process fakes
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { generateWordlist, NoEntriesError } from "@/pipeline";
import { AnnotationError } from "@/clients/annotation";
import { INDEX_FILENAME } from "@/constants";
import type { AssetVerifier, TextAnnotator } from "@/interfaces";
import type { GenerateOptions, Logger } from "@/types";
import { createTempWorkspace, type TempWorkspace } from "../helpers/fixtures";

const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

function missingVideos(...filenames: string[]): AssetVerifier {
  const missing = new Set(filenames);
  return { exists: async (filename) => !missing.has(filename) };
}

describe("generateWordlist", () => {
  let ws: TempWorkspace;

  function options(overrides: Partial<GenerateOptions>): GenerateOptions {
    return {
      catalogPath: ws.path("sign_data.csv"),
      frequencyPath: ws.path("stats.txt"),
      wordlistsDir: ws.path("wordlists"),
      categorySlugs: [],
      maxCount: 100,
      keepInputOrder: false,
      id: "test",
      name: "Test",
      outputPath: ws.path("wordlists", "test.js"),
      verify: false,
      verifyConcurrency: 1,
      includePhrases: false,
      ...overrides,
    };
  }

  beforeEach(() => {
    ws = createTempWorkspace();
  });

  afterEach(() => {
    ws.cleanup();
  });

  it("reports word-file entries missing from the catalog and keeps the rest", async () => {
    const wordFilePath = ws.write("words.txt", "hund\nmjölk\nzebra\n");

    const summary = await generateWordlist(options({ wordFilePath }), { logger: silentLogger });

    expect(summary.warnings).toEqual(["NOT FOUND: 'zebra'"]);
    expect(summary.wordCount).toBe(2);
    expect(ws.read("wordlists/test.js")).toContain(
      '    { word: "mjölk", video: "mjolk-08800-tecken.mp4" },\n' +
        '    { word: "hund", video: "hund-00222-tecken.mp4" }\n',
    );
  });

  it("adds the category to not-found reports when filtering", async () => {
    const wordFilePath = ws.write("words.txt", "hund\nbröd\n");

    const summary = await generateWordlist(
      options({ wordFilePath, categorySlugs: ["djur"] }),
      { logger: silentLogger },
    );

    expect(summary.warnings).toEqual(["NOT FOUND: 'bröd' (not in category 'djur')"]);
    expect(summary.wordCount).toBe(1);
  });

  it("falls back to catalog order when the frequency corpus is missing", async () => {
    const frequencyPath = ws.path("missing-corpus.txt");

    const summary = await generateWordlist(
      options({ frequencyPath, categorySlugs: ["mat"] }),
      { logger: silentLogger },
    );

    expect(summary.warnings).toEqual([
      `FREQUENCY FILE MISSING: ${frequencyPath} (using catalog order)`,
    ]);
    expect(ws.read("wordlists/test.js")).toContain(
      "  words: [\n" +
        '    { word: "äpple", video: "apple-03300-tecken.mp4" },\n' +
        '    { word: "bröd", video: "brod-04400-tecken.mp4" },\n' +
        '    { word: "mjölk", video: "mjolk-08800-tecken.mp4" }\n' +
        "  ]\n",
    );
  });

  it("reports unknown category slugs and uses the remaining ones", async () => {
    const summary = await generateWordlist(
      options({ categorySlugs: ["teknik", "rymden"] }),
      { logger: silentLogger },
    );

    expect(summary.warnings).toEqual(["CATEGORY NOT FOUND: 'rymden'"]);
    expect(summary.wordCount).toBe(2);
  });

  it("excludes candidates whose video is missing and reports them", async () => {
    const summary = await generateWordlist(
      options({
        categorySlugs: ["djur"],
        verify: true,
        id: "djur",
        name: "Djur",
        outputPath: ws.path("wordlists", "djur.js"),
      }),
      { verifier: missingVideos("katt-01234-tecken.mp4"), logger: silentLogger },
    );

    expect(summary).toEqual({
      artifacts: [ws.path("wordlists", "djur.js")],
      wordCount: 1,
      phraseCount: 0,
      warnings: ["VIDEO MISSING: 'katt' -> katt-01234-tecken.mp4"],
      indexedFiles: ["djur.js"],
    });
  });

  it("streams warnings to onWarning as they are recorded", async () => {
    const wordFilePath = ws.write("words.txt", "katt\nzebra\n");
    const frequencyPath = ws.path("missing-corpus.txt");
    const streamed: string[] = [];

    const result = await generateWordlist(
      options({ wordFilePath, frequencyPath, verify: true }),
      {
        verifier: missingVideos("katt-01234-tecken.mp4"),
        logger: silentLogger,
        onWarning: (warning) => streamed.push(warning),
      },
    ).catch((error: unknown) => error);

    expect(result).toBeInstanceOf(NoEntriesError);
    expect(streamed).toEqual([
      `FREQUENCY FILE MISSING: ${frequencyPath} (using catalog order)`,
      "NOT FOUND: 'zebra'",
      "VIDEO MISSING: 'katt' -> katt-01234-tecken.mp4",
    ]);
  });

  it("throws NoEntriesError with the warnings and writes nothing", async () => {
    const error = await generateWordlist(
      options({ categorySlugs: ["teknik"], verify: true }),
      {
        verifier: missingVideos("sms-06600-tecken.mp4", "tv-07700-tecken.mp4"),
        logger: silentLogger,
      },
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NoEntriesError);
    expect(error).toMatchObject({
      message: "No valid entries generated",
      warnings: [
        "VIDEO MISSING: 'sms' -> sms-06600-tecken.mp4",
        "VIDEO MISSING: 'tv' -> tv-07700-tecken.mp4",
      ],
    });
    expect(ws.exists("wordlists/test.js")).toBe(false);
  });

  it("aborts on an annotation failure without writing the artifact or the index", async () => {
    const annotator: TextAnnotator = {
      annotate: async (word, phrase) => {
        throw new AnnotationError(word, phrase, "HTTP 500 Internal Server Error");
      },
    };

    await expect(
      generateWordlist(options({ categorySlugs: ["djur"], includePhrases: true }), {
        annotator,
        logger: silentLogger,
      }),
    ).rejects.toBeInstanceOf(AnnotationError);

    expect(ws.exists("wordlists/test.js")).toBe(false);
    expect(ws.exists(`wordlists/${INDEX_FILENAME}`)).toBe(false);
  });

  it("requires a verifier when verification is enabled", async () => {
    await expect(
      generateWordlist(options({ categorySlugs: ["djur"], verify: true }), { logger: silentLogger }),
    ).rejects.toThrow("Video verification requested but no verifier was provided");
  });
});
