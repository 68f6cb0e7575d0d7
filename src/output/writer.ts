/**
 * Artifact and index writing
 */

import * as fs from "fs";
import * as path from "path";
import type { PlannedArtifact } from "@/types";
import {
  INDEX_FILENAME,
  INDEX_HEADER,
  WORDLIST_FILE_EXTENSION,
} from "@/constants";
import { renderWordlist } from "./renderer";

/**
 * Writes every planned artifact, creating parent directories.
 *
 * All content is rendered before the first write.
 *
 * @returns Written paths, in plan order
 */
export function writeArtifacts(planned: readonly PlannedArtifact[]): string[] {
  const rendered = planned.map((item) => ({
    path: item.path,
    content: renderWordlist(item.artifact),
  }));

  for (const file of rendered) {
    fs.mkdirSync(path.dirname(path.resolve(file.path)), { recursive: true });
    fs.writeFileSync(file.path, file.content, "utf-8");
  }

  return rendered.map((file) => file.path);
}

/**
 * Wordlist files of a directory, sorted by filename, index excluded.
 */
export function listWordlistFiles(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter(
      (entry) =>
        entry.isFile() &&
        entry.name.endsWith(WORDLIST_FILE_EXTENSION) &&
        entry.name !== INDEX_FILENAME,
    )
    .map((entry) => entry.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Regenerates the index file of a directory from scratch.
 *
 * @returns The filenames concatenated into the index
 */
export function rebuildIndex(dir: string): string[] {
  fs.mkdirSync(dir, { recursive: true });
  const files = listWordlistFiles(dir);

  let content = INDEX_HEADER;
  for (const file of files) {
    content += `\n// --- ${file} ---\n`;
    content += fs.readFileSync(path.join(dir, file), "utf-8");
  }

  fs.writeFileSync(path.join(dir, INDEX_FILENAME), content, "utf-8");
  return files;
}
