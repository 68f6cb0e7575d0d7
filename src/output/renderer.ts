/**
 * Wordlist artifact rendering
 *
 * Each artifact is a script the client loads with a <script> tag; it
 * appends one wordlist to the global registry:
 *
 *   (window.WORDLISTS = window.WORDLISTS || []).push({
 *     id: "djur",
 *     name: "Djur",
 *     words: [
 *       { word: "hund", video: "hund-00222-tecken.mp4" }
 *     ]
 *   });
 */

import type { PhraseEntry, WordEntry, WordlistArtifact } from "@/types";
import { ARTIFACT_INDENT, WORDLIST_REGISTRY } from "@/constants";

const str = (value: string): string => JSON.stringify(value);

function renderWord(entry: WordEntry): string {
  return `{ word: ${str(entry.word)}, video: ${str(entry.video)} }`;
}

function renderPhrase(entry: PhraseEntry): string {
  return `{ word: ${str(entry.word)}, phrase: ${str(entry.phrase)}, video: ${str(entry.video)} }`;
}

function renderList(field: string, items: string[]): string {
  if (items.length === 0) {
    return `${ARTIFACT_INDENT}${field}: []`;
  }
  const body = items.map((item) => `${ARTIFACT_INDENT}${ARTIFACT_INDENT}${item}`).join(",\n");
  return `${ARTIFACT_INDENT}${field}: [\n${body}\n${ARTIFACT_INDENT}]`;
}

export function renderWordlist(artifact: WordlistArtifact): string {
  const fields = [
    `${ARTIFACT_INDENT}id: ${str(artifact.id)}`,
    `${ARTIFACT_INDENT}name: ${str(artifact.name)}`,
    renderList("words", artifact.words.map(renderWord)),
  ];
  if (artifact.phrases !== undefined) {
    fields.push(renderList("phrases", artifact.phrases.map(renderPhrase)));
  }

  return (
    `(${WORDLIST_REGISTRY} = ${WORDLIST_REGISTRY} || []).push({\n` +
    `${fields.join(",\n")}\n` +
    `});\n`
  );
}
