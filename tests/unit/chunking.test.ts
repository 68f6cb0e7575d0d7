/**
 * Unit tests for balanced chunk splitting and artifact planning
 */

import { describe, it, expect } from "vitest";
import { chunkPath, planArtifacts, splitIntoChunks } from "@/output";
import type { PhraseEntry, WordEntry } from "@/types";

function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

describe("splitIntoChunks", () => {
  it("balances chunk sizes instead of leaving a small tail", () => {
    const chunks = splitIntoChunks(range(101), 50);

    expect(chunks.map((c) => c.length)).toEqual([34, 34, 33]);
  });

  it("splits evenly when the total is a multiple", () => {
    expect(splitIntoChunks([1, 2, 3, 4], 2)).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it("returns a single chunk when the total fits", () => {
    expect(splitIntoChunks([1, 2, 3], 3)).toEqual([[1, 2, 3]]);
    expect(splitIntoChunks([1, 2, 3], 0)).toEqual([[1, 2, 3]]);
  });

  it("never exceeds the balanced size and preserves order", () => {
    for (const total of [1, 7, 10, 23, 99, 100]) {
      for (const chunkSize of [1, 3, 7, 10, 50]) {
        const items = range(total);
        const chunks = splitIntoChunks(items, chunkSize);
        const limit = Math.ceil(total / Math.ceil(total / chunkSize));

        expect(chunks.every((c) => c.length <= limit)).toBe(true);
        expect(chunks.flat()).toEqual(items);
      }
    }
  });
});

describe("chunkPath", () => {
  it("inserts the chunk number before the extension", () => {
    expect(chunkPath("wordlists/djur.js", 2)).toBe("wordlists/djur2.js");
    expect(chunkPath("out/list", 1)).toBe("out/list1");
  });
});

describe("planArtifacts", () => {
  const words: WordEntry[] = [
    { word: "katt", video: "katt-01234-tecken.mp4" },
    { word: "mjölk", video: "mjolk-08800-tecken.mp4" },
    { word: "hund", video: "hund-00222-tecken.mp4" },
  ];
  const phrases: PhraseEntry[] = [
    { word: "hund", phrase: "[Hunden] skäller.", video: "hund-00222-fras-1.mp4" },
    { word: "katt", phrase: "[Katten] sover.", video: "katt-01234-fras-1.mp4" },
  ];

  it("plans a single artifact without chunking", () => {
    const planned = planArtifacts(
      { id: "mix", name: "Mix", outputPath: "wordlists/mix.js" },
      words,
    );

    expect(planned).toEqual([
      { path: "wordlists/mix.js", artifact: { id: "mix", name: "Mix", words } },
    ]);
  });

  it("plans a single artifact when the words fit in one chunk", () => {
    const planned = planArtifacts(
      { id: "mix", name: "Mix", outputPath: "wordlists/mix.js", chunkSize: 3 },
      words,
      phrases,
    );

    expect(planned).toHaveLength(1);
    expect(planned[0].path).toBe("wordlists/mix.js");
    expect(planned[0].artifact.phrases).toEqual(phrases);
  });

  it("numbers chunks and partitions phrases by chunk words", () => {
    const planned = planArtifacts(
      { id: "mix", name: "Mix", outputPath: "wordlists/mix.js", chunkSize: 2 },
      words,
      phrases,
    );

    expect(planned).toEqual([
      {
        path: "wordlists/mix1.js",
        artifact: {
          id: "mix1",
          name: "Mix 1",
          words: [words[0], words[1]],
          phrases: [phrases[1]],
        },
      },
      {
        path: "wordlists/mix2.js",
        artifact: {
          id: "mix2",
          name: "Mix 2",
          words: [words[2]],
          phrases: [phrases[0]],
        },
      },
    ]);
  });
});
