/**
 * Artifact planning: decides which files get which entries
 */

import * as path from "path";
import type {
  ArtifactTarget,
  PhraseEntry,
  PlannedArtifact,
  WordEntry,
} from "@/types";
import { splitIntoChunks } from "./chunking";

/**
 * Path of the n-th chunk file: "wordlists/djur.js" → "wordlists/djur2.js"
 */
export function chunkPath(outputPath: string, index: number): string {
  const ext = path.extname(outputPath);
  const stem = ext ? outputPath.slice(0, -ext.length) : outputPath;
  return `${stem}${index}${ext}`;
}

/**
 * Plans one artifact, or one per balanced chunk when the target asks for
 * chunks and the words exceed the chunk size.
 *
 * Chunk n (1-based) gets id `{id}{n}`, name `{name} {n}` and only the
 * phrases whose word is in that chunk. `phrases` undefined means the
 * artifacts carry no phrases field at all.
 */
export function planArtifacts(
  target: ArtifactTarget,
  words: readonly WordEntry[],
  phrases?: readonly PhraseEntry[],
): PlannedArtifact[] {
  const chunks =
    target.chunkSize !== undefined ? splitIntoChunks(words, target.chunkSize) : [[...words]];

  if (chunks.length <= 1) {
    return [
      {
        path: target.outputPath,
        artifact: {
          id: target.id,
          name: target.name,
          words: [...words],
          ...(phrases !== undefined ? { phrases: [...phrases] } : {}),
        },
      },
    ];
  }

  return chunks.map((chunk, i) => {
    const n = i + 1;
    const chunkWords = new Set(chunk.map((entry) => entry.word));
    return {
      path: chunkPath(target.outputPath, n),
      artifact: {
        id: `${target.id}${n}`,
        name: `${target.name} ${n}`,
        words: chunk,
        ...(phrases !== undefined
          ? { phrases: phrases.filter((entry) => chunkWords.has(entry.word)) }
          : {}),
      },
    };
  });
}
