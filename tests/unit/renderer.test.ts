/**
 * Unit tests for wordlist artifact rendering
 */

import { describe, it, expect } from "vitest";
import { renderWordlist } from "@/output";

describe("renderWordlist", () => {
  it("renders the registry push with words only", () => {
    const output = renderWordlist({
      id: "djur",
      name: "Djur",
      words: [
        { word: "katt", video: "katt-01234-tecken.mp4" },
        { word: "hund", video: "hund-00222-tecken.mp4" },
      ],
    });

    expect(output).toBe(
      [
        "(window.WORDLISTS = window.WORDLISTS || []).push({",
        '  id: "djur",',
        '  name: "Djur",',
        "  words: [",
        '    { word: "katt", video: "katt-01234-tecken.mp4" },',
        '    { word: "hund", video: "hund-00222-tecken.mp4" }',
        "  ]",
        "});",
        "",
      ].join("\n"),
    );
  });

  it("renders phrases after words and keeps non-ASCII text", () => {
    const output = renderWordlist({
      id: "mat",
      name: "Mat & dryck",
      words: [{ word: "bröd", video: "brod-04400-tecken.mp4" }],
      phrases: [
        { word: "bröd", phrase: 'Han sa "[bröd]".', video: "brod-04400-fras-1.mp4" },
      ],
    });

    expect(output).toBe(
      [
        "(window.WORDLISTS = window.WORDLISTS || []).push({",
        '  id: "mat",',
        '  name: "Mat & dryck",',
        "  words: [",
        '    { word: "bröd", video: "brod-04400-tecken.mp4" }',
        "  ],",
        "  phrases: [",
        '    { word: "bröd", phrase: "Han sa \\"[bröd]\\".", video: "brod-04400-fras-1.mp4" }',
        "  ]",
        "});",
        "",
      ].join("\n"),
    );
  });

  it("renders an empty phrases list inline", () => {
    const output = renderWordlist({
      id: "a",
      name: "A",
      words: [{ word: "hund", video: "hund-00222-tecken.mp4" }],
      phrases: [],
    });

    expect(output).toContain("  ],\n  phrases: []\n});\n");
  });
});
