import { readFile, stat } from "node:fs/promises";
import * as z from "zod";
import { DEFAULT_GREP_MAX_RESULTS, GREP_HARD_MAX_RESULTS } from "../../core/constants.js";
import { ToolExecutionError } from "../exceptions.js";
import { createTool } from "../tool.js";
import { matchesPathGlob } from "./glob.js";
import { IgnoreMatcher } from "./ignore.js";
import { resolveInProject, toProjectRelative } from "./paths.js";
import { type WalkEntry, walkFiles } from "./walk.js";

const MAX_LINE_CHARS = 500;
const BINARY_SNIFF_BYTES = 8000;

/** File extensions behind the `type` filter */
const TYPE_EXTENSIONS: Record<string, readonly string[]> = {
  c: ["c", "h"],
  cpp: ["cpp", "cc", "cxx", "hpp", "hh", "hxx", "h"],
  css: ["css", "scss", "less"],
  go: ["go"],
  html: ["html", "htm"],
  java: ["java"],
  js: ["js", "mjs", "cjs", "jsx"],
  json: ["json"],
  kotlin: ["kt", "kts"],
  md: ["md", "markdown"],
  php: ["php"],
  py: ["py", "pyi"],
  rb: ["rb"],
  rust: ["rs"],
  sh: ["sh", "bash", "zsh"],
  swift: ["swift"],
  toml: ["toml"],
  ts: ["ts", "mts", "cts", "tsx"],
  yaml: ["yaml", "yml"],
};

const outputModeSchema = z.enum(["content", "files_with_matches", "count"]);

function isBinary(buffer: Buffer): boolean {
  return buffer.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

function compilePattern(pattern: string, flags: string): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ToolExecutionError(`invalid regular expression: ${reason}`);
  }
}

function extensionsFor(type: string): readonly string[] {
  const extensions = TYPE_EXTENSIONS[type];
  if (!extensions) {
    throw new ToolExecutionError(
      `unknown file type: ${type}. Known types: ${Object.keys(TYPE_EXTENSIONS).join(", ")}`,
    );
  }
  return extensions;
}

function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

function countNewlines(text: string): number {
  return text.split("\n").length - 1;
}

/**
 * Indices of every line touched by a match of `regex` (global, dotall)
 * run over the whole text.
 */
function matchAcrossLines(text: string, lineCount: number, regex: RegExp): number[] {
  const touched = new Set<number>();
  for (const match of text.matchAll(regex)) {
    const first = countNewlines(text.slice(0, match.index ?? 0));
    const span = countNewlines(match[0]) - (match[0].endsWith("\n") ? 1 : 0);
    for (let line = first; line <= first + Math.max(0, span) && line < lineCount; line++) {
      touched.add(line);
    }
  }
  return [...touched].sort((a, b) => a - b);
}

function clip(line: string): string {
  return line.length > MAX_LINE_CHARS ? `${line.slice(0, MAX_LINE_CHARS)}...` : line;
}

/**
 * Matching lines as `path:N: text`, context lines as `path-N- text`,
 * non-adjacent groups separated by `--`.
 */
function renderContent(
  path: string,
  lines: readonly string[],
  matched: readonly number[],
  before: number,
  after: number,
): string[] {
  const matchedSet = new Set(matched);
  const out: string[] = [];
  let last = -1;
  for (const index of matched) {
    const from = Math.max(index - before, last + 1);
    const to = Math.min(index + after, lines.length - 1);
    if (last >= 0 && from > last + 1) {
      out.push("--");
    }
    for (let line = from; line <= to; line++) {
      const sep = matchedSet.has(line) ? ":" : "-";
      out.push(`${path}${sep}${line + 1}${sep} ${clip(lines[line])}`);
    }
    last = Math.max(last, to);
  }
  return out;
}

function plural(count: number, singular: string, pluralForm: string): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

export interface GrepToolOptions {
  ignore?: IgnoreMatcher;
}

/**
 * `grep` tool: regular-expression search over the project tree.
 *
 * Output modes:
 * - `content` (default): `path:line: text` per matching line, with optional context lines
 * - `files_with_matches`: one path per matching file
 * - `count`: `path:N` with the number of matching lines per file
 *
 * `max_results` bounds matching lines in content mode and files otherwise.
 */
export function createGrepTool(options: GrepToolOptions = {}) {
  return createTool({
    name: "grep",
    description:
      "Search file contents under the project with a regular expression (JavaScript syntax). " +
      "By default returns one `path:line: text` entry per matching line; output_mode selects file paths or per-file counts instead. " +
      "Always use this tool for searching instead of running grep through bash.",
    schema: z.strictObject({
      pattern: z.string().min(1).describe("Regular expression to search for"),
      path: z
        .string()
        .optional()
        .describe("File or directory to search, relative to the project root or absolute (default: project root)"),
      glob: z.string().optional().describe('Only search files matching this glob, e.g. "*.ts" or "src/**/*.{ts,tsx}"'),
      type: z
        .string()
        .optional()
        .describe(`Only search files of this type: ${Object.keys(TYPE_EXTENSIONS).join(", ")}`),
      output_mode: outputModeSchema
        .optional()
        .describe('"content" (default) shows matching lines, "files_with_matches" file paths, "count" matches per file'),
      B: z.number().int().nonnegative().optional().describe("Lines to show before each match (content mode)"),
      A: z.number().int().nonnegative().optional().describe("Lines to show after each match (content mode)"),
      C: z.number().int().nonnegative().optional().describe("Lines to show before and after each match; overrides A and B"),
      case_insensitive: z.boolean().optional().describe("Ignore case when matching"),
      multiline: z
        .boolean()
        .optional()
        .describe("Let the pattern span lines; `.` also matches newlines"),
      max_results: z
        .number()
        .int()
        .positive()
        .max(GREP_HARD_MAX_RESULTS)
        .optional()
        .describe(`Maximum number of matches (or files) to return (default: ${DEFAULT_GREP_MAX_RESULTS})`),
      head_limit: z.number().int().positive().optional().describe("Keep only the first N lines of output"),
    }),
    execute: async (args, ctx) => {
      const ignore = options.ignore ?? new IgnoreMatcher();
      const mode = args.output_mode ?? "content";
      const multiline = args.multiline ?? false;
      const regex = compilePattern(args.pattern, `${multiline ? "gms" : ""}${args.case_insensitive ? "i" : ""}`);
      const extensions = args.type === undefined ? undefined : extensionsFor(args.type);
      const limit = args.max_results ?? DEFAULT_GREP_MAX_RESULTS;
      const before = args.C ?? args.B ?? 0;
      const after = args.C ?? args.A ?? 0;
      const target = resolveInProject(ctx.projectRoot, args.path);

      const info = await stat(target).catch(() => undefined);
      if (!info) {
        throw new ToolExecutionError(`the path ${args.path} does not exist`);
      }

      const files = info.isDirectory()
        ? walkFiles(target, ctx.projectRoot, ignore, ctx.signal)
        : singleFile(target, ctx.projectRoot);

      let output: string[] = [];
      let entries = 0;
      let truncated = false;
      search: for await (const file of files) {
        if (args.glob && !matchesPathGlob(file.relativePath, args.glob)) continue;
        if (extensions && !extensions.some((extension) => file.name.endsWith(`.${extension}`))) continue;

        const buffer = await readFile(file.absolutePath);
        if (isBinary(buffer)) continue;

        const text = buffer.toString("utf-8");
        const lines = splitLines(text);
        const matched = multiline
          ? matchAcrossLines(text, lines.length, regex)
          : lines.flatMap((line, index) => (regex.test(line) ? [index] : []));
        if (matched.length === 0) continue;

        if (entries >= limit) {
          truncated = true;
          break search;
        }
        if (mode !== "content") {
          entries++;
          output.push(mode === "count" ? `${file.relativePath}:${matched.length}` : file.relativePath);
          continue;
        }

        const shown = matched.slice(0, limit - entries);
        entries += shown.length;
        if ((before > 0 || after > 0) && output.length > 0) {
          output.push("--");
        }
        output.push(...renderContent(file.relativePath, lines, shown, before, after));
        if (shown.length < matched.length) {
          truncated = true;
          break search;
        }
      }

      if (output.length === 0) {
        return "No matches found.";
      }

      const notes: string[] = [];
      if (truncated) {
        const unit = mode === "content" ? plural(limit, "match", "matches") : plural(limit, "file", "files");
        notes.push(`(showing the first ${unit})`);
      }
      if (args.head_limit !== undefined && output.length > args.head_limit) {
        output = output.slice(0, args.head_limit);
        notes.push(`(output limited to the first ${plural(args.head_limit, "line", "lines")})`);
      }
      return notes.length > 0 ? `${output.join("\n")}\n\n${notes.join("\n")}` : output.join("\n");
    },
  });
}

async function* singleFile(absolutePath: string, projectRoot: string): AsyncGenerator<WalkEntry> {
  const relativePath = toProjectRelative(projectRoot, absolutePath);
  yield {
    absolutePath,
    relativePath,
    name: relativePath.slice(relativePath.lastIndexOf("/") + 1),
    isDirectory: false,
  };
}
