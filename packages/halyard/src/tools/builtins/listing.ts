import { stat } from "node:fs/promises";
import * as z from "zod";
import { DEFAULT_TREE_DEPTH } from "../../core/constants.js";
import { ToolExecutionError } from "../exceptions.js";
import { createTool } from "../tool.js";
import { matchesGlob } from "./glob.js";
import { IgnoreMatcher } from "./ignore.js";
import { requireAbsoluteInProject, resolveInProject } from "./paths.js";
import { listDirectory } from "./walk.js";

async function requireDirectory(path: string, display: string): Promise<void> {
  const info = await stat(path).catch(() => undefined);
  if (!info) {
    throw new ToolExecutionError(`the path ${display} does not exist`);
  }
  if (!info.isDirectory()) {
    throw new ToolExecutionError(`the path ${display} is not a directory`);
  }
}

export interface ListingToolOptions {
  ignore?: IgnoreMatcher;
}

/**
 * `ls` tool: one directory, directories first, with `/` after directory names.
 */
export function createLsTool(options: ListingToolOptions = {}) {
  return createTool({
    name: "ls",
    description:
      "List files and directories in a directory. Directories come first and end with '/'. " +
      "Optionally keep only names matching `match` globs and drop names matching `ignore` globs.",
    schema: z.strictObject({
      path: z.string().min(1).describe("Absolute path of the directory to list"),
      match: z.array(z.string()).optional().describe('Globs to keep, e.g. ["*.ts"]'),
      ignore: z.array(z.string()).optional().describe("Globs to skip, added to the default ignore list"),
    }),
    execute: async ({ path, match, ignore }, ctx) => {
      const directory = requireAbsoluteInProject(ctx.projectRoot, path);
      await requireDirectory(directory, path);

      const matcher = (options.ignore ?? new IgnoreMatcher()).extend(ignore ?? []);
      const entries = (await listDirectory(directory, ctx.projectRoot, matcher)).filter(
        (entry) => !match || match.some((glob) => matchesGlob(entry.name, glob)),
      );

      if (entries.length === 0) {
        return `No items found in ${path}.`;
      }
      const lines = entries.map((entry) => (entry.isDirectory ? `${entry.name}/` : entry.name));
      return `Here's the result in ${path}:\n${lines.join("\n")}`;
    },
  });
}

interface TreeCounts {
  directories: number;
  files: number;
}

async function renderTree(
  directory: string,
  projectRoot: string,
  ignore: IgnoreMatcher,
  prefix: string,
  depthLeft: number,
  counts: TreeCounts,
  signal: AbortSignal,
): Promise<string[]> {
  if (depthLeft <= 0 || signal.aborted) {
    return [];
  }

  const lines: string[] = [];
  let entries: Awaited<ReturnType<typeof listDirectory>>;
  try {
    entries = await listDirectory(directory, projectRoot, ignore);
  } catch (error) {
    const code = error instanceof Error && "code" in error ? String(error.code) : "";
    if (code !== "EACCES" && code !== "EPERM") throw error;
    return [`${prefix}[Permission Denied]`];
  }

  for (const [index, entry] of entries.entries()) {
    const last = index === entries.length - 1;
    const connector = last ? "└── " : "├── ";
    if (entry.isDirectory) {
      counts.directories++;
      lines.push(`${prefix}${connector}${entry.name}/`);
      const childPrefix = prefix + (last ? "    " : "│   ");
      lines.push(
        ...(await renderTree(entry.absolutePath, projectRoot, ignore, childPrefix, depthLeft - 1, counts, signal)),
      );
    } else {
      counts.files++;
      lines.push(`${prefix}${connector}${entry.name}`);
    }
  }
  return lines;
}

/**
 * `tree` tool: directory structure up to `max_depth` levels with a
 * `N directories, M files` footer.
 */
export function createTreeTool(options: ListingToolOptions = {}) {
  return createTool({
    name: "tree",
    description:
      "Display the directory structure as a tree, like the `tree` command. " +
      "Common noise (version control, dependencies, build output) is skipped.",
    schema: z.strictObject({
      path: z
        .string()
        .optional()
        .describe("Directory to show, relative to the project root or absolute (default: project root)"),
      max_depth: z
        .number()
        .int()
        .min(1)
        .max(10)
        .optional()
        .describe(`Maximum depth to traverse (default: ${DEFAULT_TREE_DEPTH})`),
    }),
    execute: async ({ path, max_depth }, ctx) => {
      const directory = resolveInProject(ctx.projectRoot, path);
      await requireDirectory(directory, path ?? directory);

      const counts: TreeCounts = { directories: 0, files: 0 };
      const lines = await renderTree(
        directory,
        ctx.projectRoot,
        options.ignore ?? new IgnoreMatcher(),
        "",
        max_depth ?? DEFAULT_TREE_DEPTH,
        counts,
        ctx.signal,
      );

      return [
        `${directory}/`,
        ...lines,
        "",
        `${counts.directories} directories, ${counts.files} files`,
      ].join("\n");
    },
  });
}
