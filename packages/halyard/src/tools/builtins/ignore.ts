import { readFileSync } from "node:fs";
import * as z from "zod";
import { matchesGlob } from "./glob.js";

const ignoreListSchema = z.array(z.string().min(1));

let defaultPatterns: readonly string[] | undefined;

/**
 * Ignore patterns shipped in `data/default-ignore.json`: version control,
 * dependency, build output, cache and editor files.
 */
export function loadDefaultIgnorePatterns(): readonly string[] {
  if (!defaultPatterns) {
    const file = new URL("../../../data/default-ignore.json", import.meta.url);
    const parsed: unknown = JSON.parse(readFileSync(file, "utf-8"));
    defaultPatterns = Object.freeze(ignoreListSchema.parse(parsed));
  }
  return defaultPatterns;
}

/**
 * Decides whether a path under the project root is skipped by listing and
 * search tools.
 *
 * A pattern matches when, with any trailing `/**` removed, it matches the
 * entry's name, or when it matches the full relative path.
 */
export class IgnoreMatcher {
  private readonly patterns: readonly { full: string; base: string }[];

  constructor(patterns: readonly string[] = loadDefaultIgnorePatterns()) {
    this.patterns = patterns.map((pattern) => ({
      full: pattern,
      base: pattern.replace(/\/\*\*$/, "").replace(/\/\*$/, ""),
    }));
  }

  /**
   * Returns a matcher with extra patterns added in front of these.
   */
  extend(extra: readonly string[]): IgnoreMatcher {
    return new IgnoreMatcher([...extra, ...this.patterns.map((p) => p.full)]);
  }

  ignores(relativePath: string): boolean {
    const name = relativePath.slice(relativePath.lastIndexOf("/") + 1);
    return this.patterns.some(
      ({ full, base }) => matchesGlob(name, base) || matchesGlob(relativePath, full),
    );
  }
}
