/**
 * Unit tests for phrase cleaning and keyword bracketing
 */

import { describe, it, expect } from "vitest";
import { bracketKeyword, cleanPhrase } from "@/phrases";

describe("cleanPhrase", () => {
  it("strips the enumeration marker and collapses whitespace", () => {
    expect(cleanPhrase("alt 1.  Hunden  skäller.")).toBe("Hunden skäller.");
  });

  it("handles marker variants", () => {
    expect(cleanPhrase("Alt2.Katten sover")).toBe("Katten sover");
    expect(cleanPhrase("  ALT 10. \tKatten\nsover ")).toBe("Katten sover");
  });

  it("leaves text without a marker alone apart from whitespace", () => {
    expect(cleanPhrase("Alternativet är bra.")).toBe("Alternativet är bra.");
    expect(cleanPhrase("Han tog alt 1. igen")).toBe("Han tog alt 1. igen");
  });

  it("can clean down to an empty string", () => {
    expect(cleanPhrase("alt 3.   ")).toBe("");
  });
});

describe("bracketKeyword", () => {
  it("brackets the word with its suffix, case-insensitively", () => {
    expect(bracketKeyword("hund", "Hunden skäller.")).toBe("[Hunden] skäller.");
  });

  it("brackets every occurrence", () => {
    expect(bracketKeyword("hund", "Hunden och hundarna, hund!")).toBe(
      "[Hunden] och [hundarna], [hund]!",
    );
  });

  it("extends over non-ASCII word characters", () => {
    expect(bracketKeyword("äpple", "Äpplena är röda.")).toBe("[Äpplena] är röda.");
    expect(bracketKeyword("bröd", "Brödet är färskt.")).toBe("[Brödet] är färskt.");
  });

  it("only matches at the start of a word", () => {
    expect(bracketKeyword("hund", "Vakthunden skäller.")).toBe("Vakthunden skäller.");
    expect(bracketKeyword("är", "Bären är mogna.")).toBe("Bären [är] mogna.");
  });

  it("skips occurrences that are already bracketed", () => {
    expect(bracketKeyword("hund", "[Hunden] skäller.")).toBe("[Hunden] skäller.");
    expect(bracketKeyword("hund", "Den [stora hunden] skäller.")).toBe(
      "Den [stora hunden] skäller.",
    );
  });

  it("is idempotent", () => {
    const once = bracketKeyword("katt", "Katten och kattungen, katt.");
    expect(once).toBe("[Katten] och [kattungen], [katt].");
    expect(bracketKeyword("katt", once)).toBe(once);
  });

  it("treats regex metacharacters in the word literally", () => {
    expect(bracketKeyword("c++", "Jag kan c++ bra.")).toBe("Jag kan [c++] bra.");
    expect(bracketKeyword("a.b", "axb a.b")).toBe("axb [a.b]");
  });

  it("returns the phrase unchanged for an empty word", () => {
    expect(bracketKeyword("", "Hunden skäller.")).toBe("Hunden skäller.");
  });
});
