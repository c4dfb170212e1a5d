import type { TaskPlanner } from "../../planner/planner.js";
import type { AbstractTool } from "../tool.js";
import { createTextEditorTool } from "./editor.js";
import { IgnoreMatcher } from "./ignore.js";
import { createLsTool, createTreeTool } from "./listing.js";
import { createGrepTool } from "./search.js";
import { createBashTool } from "./shell.js";
import { createTodoWriteTool } from "./todo.js";

export interface BuiltinToolOptions {
  planner: TaskPlanner;
  /** Extra ignore globs for ls, tree and grep */
  ignorePatterns?: readonly string[];
  /** Per-stream cap of the bash tool */
  bashStreamCap?: number;
}

/**
 * The tools every session starts with.
 */
export function createBuiltinTools(options: BuiltinToolOptions): AbstractTool[] {
  const ignore = new IgnoreMatcher().extend(options.ignorePatterns ?? []);
  return [
    createBashTool({ streamCap: options.bashStreamCap }),
    createGrepTool({ ignore }),
    createTextEditorTool(),
    createLsTool({ ignore }),
    createTreeTool({ ignore }),
    createTodoWriteTool(options.planner),
  ];
}

export { createTextEditorTool, withLineNumbers } from "./editor.js";
export { globToRegExp, matchesGlob, matchesPathGlob } from "./glob.js";
export { IgnoreMatcher, loadDefaultIgnorePatterns } from "./ignore.js";
export { createLsTool, createTreeTool } from "./listing.js";
export { createGrepTool } from "./search.js";
export { createBashTool, runBashCommand } from "./shell.js";
export { TODO_WRITE_TOOL_NAME, createTodoWriteTool } from "./todo.js";
export type { ListingToolOptions } from "./listing.js";
export type { GrepToolOptions } from "./search.js";
export type { BashToolOptions } from "./shell.js";
