import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { createPatch } from "diff";
import * as z from "zod";
import { ToolExecutionError } from "../exceptions.js";
import { createTool } from "../tool.js";
import { findNearMisses, findOccurrences, lineNumberAt } from "./anchor.js";
import { requireAbsoluteInProject, toProjectRelative } from "./paths.js";

/**
 * `cat -n` style: right-aligned line numbers starting at `firstLine`.
 */
export function withLineNumbers(content: string, firstLine = 1): string {
  return content
    .split("\n")
    .map((line, index) => `${String(index + firstLine).padStart(3)} ${line}`)
    .join("\n");
}

async function readExistingFile(path: string): Promise<string> {
  const info = await stat(path).catch(() => undefined);
  if (!info) {
    throw new ToolExecutionError(`file does not exist: ${path}`);
  }
  if (!info.isFile()) {
    throw new ToolExecutionError(`path is not a file: ${path}`);
  }
  return readFile(path, "utf-8");
}

function requireArg<T>(value: T | undefined, name: string, command: string): T {
  if (value === undefined) {
    throw new ToolExecutionError(`\`${name}\` is required for the ${command} command`);
  }
  return value;
}

function viewRange(content: string, range: readonly number[] | undefined): string {
  if (!range) {
    return withLineNumbers(content);
  }
  const lines = content.split("\n");
  const [start, requestedEnd] = range;
  if (start < 1 || start > lines.length) {
    throw new ToolExecutionError(
      `invalid view_range [${range.join(", ")}]: start line ${start} should be within [1, ${lines.length}]`,
    );
  }
  if (requestedEnd !== -1 && requestedEnd < start) {
    throw new ToolExecutionError(
      `invalid view_range [${range.join(", ")}]: end line ${requestedEnd} should be -1 or at least ${start}`,
    );
  }
  const end = requestedEnd === -1 ? lines.length : Math.min(requestedEnd, lines.length);
  return withLineNumbers(lines.slice(start - 1, end).join("\n"), start);
}

function anchorNotFound(content: string, anchor: string, displayPath: string): ToolExecutionError {
  const lines = [`anchor text not found in ${displayPath}`];
  const nearMisses = findNearMisses(content, anchor);
  if (nearMisses.length > 0) {
    lines.push("", "Similar text found:");
    for (const miss of nearMisses) {
      const percent = Math.round(miss.similarity * 100);
      lines.push("", `Line ${miss.lineNumber} (${percent}% similar):`, "```", miss.content, "```");
    }
  }
  lines.push("", "View the file again and copy the text exactly, including whitespace.");
  return new ToolExecutionError(lines.join("\n"));
}

/**
 * `text_editor` tool: view, create, str_replace and insert on files inside
 * the project. Edits return a unified diff of the change.
 */
export function createTextEditorTool() {
  return createTool({
    name: "text_editor",
    description:
      "View, create and edit files. Commands: `view` (line-numbered, optional view_range), " +
      "`create` (writes file_text, creating parent directories, overwriting an existing file), " +
      "`str_replace` (replaces old_str, which must occur exactly once, with new_str; an empty new_str deletes it), " +
      "`insert` (inserts new_str after line insert_line, 0 for the beginning). " +
      "Paths must be absolute. View the file again when str_replace or insert fails.",
    schema: z.strictObject({
      command: z.enum(["view", "create", "str_replace", "insert"]),
      path: z.string().min(1).describe("Absolute path of the file"),
      file_text: z.string().optional().describe("create: content of the new file"),
      view_range: z
        .array(z.number().int())
        .length(2)
        .optional()
        .describe("view: [start, end] 1-based lines, end -1 reads to the end"),
      old_str: z.string().min(1).optional().describe("str_replace: exact text to replace"),
      new_str: z.string().optional().describe("str_replace / insert: the new text"),
      insert_line: z.number().int().min(0).optional().describe("insert: line after which to insert"),
    }),
    execute: async (args, ctx) => {
      const path = requireAbsoluteInProject(ctx.projectRoot, args.path);
      const displayPath = toProjectRelative(ctx.projectRoot, path);

      switch (args.command) {
        case "view": {
          const content = await readExistingFile(path);
          return `Here's the result of running \`cat -n\` on ${path}:\n\n${viewRange(content, args.view_range)}`;
        }

        case "create": {
          const fileText = requireArg(args.file_text, "file_text", "create");
          const info = await stat(path).catch(() => undefined);
          if (info?.isDirectory()) {
            throw new ToolExecutionError(`the path ${path} is a directory`);
          }
          const before = info ? await readFile(path, "utf-8") : "";
          await mkdir(dirname(path), { recursive: true });
          await writeFile(path, fileText, "utf-8");
          const verb = info ? "overwritten" : "created";
          return `File ${verb} at ${path}.\n\n${createPatch(displayPath, before, fileText)}`;
        }

        case "str_replace": {
          const oldStr = requireArg(args.old_str, "old_str", "str_replace");
          const newStr = args.new_str ?? "";
          const content = await readExistingFile(path);
          const occurrences = findOccurrences(content, oldStr);

          if (occurrences.length === 0) {
            throw anchorNotFound(content, oldStr, displayPath);
          }
          if (occurrences.length > 1) {
            const lines = occurrences.map((index) => lineNumberAt(content, index));
            throw new ToolExecutionError(
              `anchor text is ambiguous: ${occurrences.length} occurrences (lines ${lines.join(", ")}). ` +
                "Include more surrounding context to make it unique.",
            );
          }

          const [index] = occurrences;
          const updated = content.slice(0, index) + newStr + content.slice(index + oldStr.length);
          await writeFile(path, updated, "utf-8");
          return `Edited ${path} at line ${lineNumberAt(content, index)}.\n\n${createPatch(displayPath, content, updated)}`;
        }

        case "insert": {
          const insertLine = requireArg(args.insert_line, "insert_line", "insert");
          const newStr = requireArg(args.new_str, "new_str", "insert");
          const content = await readExistingFile(path);
          const lines = content === "" ? [] : content.split("\n");
          const trailingNewline = content.endsWith("\n");
          if (trailingNewline) lines.pop();

          if (insertLine > lines.length) {
            throw new ToolExecutionError(
              `invalid insert_line ${insertLine}: the file has ${lines.length} lines`,
            );
          }
          lines.splice(insertLine, 0, ...newStr.split("\n"));
          const updated = lines.join("\n") + (trailingNewline ? "\n" : "");
          await writeFile(path, updated, "utf-8");
          return `Inserted text after line ${insertLine} in ${path}.\n\n${createPatch(displayPath, content, updated)}`;
        }
      }
    },
  });
}
