/**
 * File fixtures for offline tests
 *
 * Tests that touch the file system work in a fresh temp directory
 * seeded with copies of tests/fixtures.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";

export const FIXTURES_DIR = path.join(process.cwd(), "tests", "fixtures");

/**
 * Load fixture content from tests/fixtures as UTF-8 text
 */
export function loadFixtureText(relativePath: string): string {
  return fs.readFileSync(path.join(FIXTURES_DIR, relativePath), "utf-8");
}

export type TempWorkspace = {
  dir: string;
  /** Absolute path inside the workspace */
  path(...segments: string[]): string;
  write(relativePath: string, content: string): string;
  read(relativePath: string): string;
  exists(relativePath: string): boolean;
  cleanup(): void;
};

/**
 * Create a temp directory holding the catalog and corpus fixtures
 * (sign_data.csv, stats.txt).
 */
export function createTempWorkspace(): TempWorkspace {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "wordlist-test-"));
  const resolve = (...segments: string[]): string => path.join(dir, ...segments);

  const write = (relativePath: string, content: string): string => {
    const target = resolve(relativePath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content, "utf-8");
    return target;
  };

  write("sign_data.csv", loadFixtureText("sign_data.csv"));
  write("stats.txt", loadFixtureText("stats.txt"));

  return {
    dir,
    path: resolve,
    write,
    read: (relativePath) => fs.readFileSync(resolve(relativePath), "utf-8"),
    exists: (relativePath) => fs.existsSync(resolve(relativePath)),
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}
