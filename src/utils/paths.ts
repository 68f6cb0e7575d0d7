/**
 * Path helpers
 */

import * as fs from "fs";
import * as path from "path";

/**
 * Extract the filename from a catalog video path.
 *
 * @example
 * videoFilename("movies/02/hund-00222-tecken.mp4") // "hund-00222-tecken.mp4"
 * videoFilename("hund-00222-tecken.mp4") // "hund-00222-tecken.mp4"
 */
export function videoFilename(videoPath: string): string {
  const slash = videoPath.lastIndexOf("/");
  return slash === -1 ? videoPath : videoPath.slice(slash + 1);
}

/**
 * Resolve a directory to a comparable absolute path (symlinks followed
 * when the directory exists).
 */
export function canonicalDir(dir: string): string {
  const resolved = path.resolve(dir);
  return fs.existsSync(resolved) ? fs.realpathSync(resolved) : resolved;
}

export function isSameDirectory(a: string, b: string): boolean {
  return canonicalDir(a) === canonicalDir(b);
}
