import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { AbortException } from "../exceptions.js";
import type { IgnoreMatcher } from "./ignore.js";
import { toProjectRelative } from "./paths.js";

export interface WalkEntry {
  absolutePath: string;
  /** Forward-slash path relative to the project root */
  relativePath: string;
  name: string;
  isDirectory: boolean;
}

/**
 * Directories first, then files, each alphabetical (case-insensitive).
 */
export function compareEntries(a: Dirent, b: Dirent): number {
  if (a.isDirectory() !== b.isDirectory()) {
    return a.isDirectory() ? -1 : 1;
  }
  return a.name.toLowerCase().localeCompare(b.name.toLowerCase());
}

/**
 * Reads one directory, sorted and with ignored entries removed.
 */
export async function listDirectory(
  directory: string,
  projectRoot: string,
  ignore: IgnoreMatcher,
): Promise<WalkEntry[]> {
  const dirents = await readdir(directory, { withFileTypes: true });
  return dirents
    .sort(compareEntries)
    .map((dirent) => {
      const absolutePath = join(directory, dirent.name);
      return {
        absolutePath,
        relativePath: toProjectRelative(projectRoot, absolutePath),
        name: dirent.name,
        isDirectory: dirent.isDirectory(),
      };
    })
    .filter((entry) => !ignore.ignores(entry.relativePath));
}

/**
 * Depth-first walk over the files under `directory`, in listing order.
 */
export async function* walkFiles(
  directory: string,
  projectRoot: string,
  ignore: IgnoreMatcher,
  signal: AbortSignal,
): AsyncGenerator<WalkEntry> {
  if (signal.aborted) {
    throw new AbortException();
  }
  for (const entry of await listDirectory(directory, projectRoot, ignore)) {
    if (entry.isDirectory) {
      yield* walkFiles(entry.absolutePath, projectRoot, ignore, signal);
    } else {
      yield entry;
    }
  }
}
