/**
 * Line-oriented progress output for `halyard run`, written to stderr so
 * stdout carries only the final answer.
 */

import chalk, { type ChalkInstance } from "chalk";
import type { LoopOutcome, SessionObservers, ToolCall, ToolResult } from "halyard";
import { SUMMARY_PREFIX } from "./constants.js";

function firstLine(text: string): string {
  const newline = text.indexOf("\n");
  return newline === -1 ? text : text.slice(0, newline);
}

/**
 * @example
 * formatDuration(12)    // "12ms"
 * formatDuration(1530)  // "1.5s"
 */
export function formatDuration(ms: number): string {
  return ms < 1000 ? `${Math.round(ms)}ms` : `${(ms / 1000).toFixed(1)}s`;
}

export function formatToolResult(call: ToolCall, result: ToolResult, c: ChalkInstance = chalk): string {
  const head = `${c.bold(call.name)} ${c.dim(`(${formatDuration(result.durationMs)})`)}`;
  if (result.success) {
    return `${c.green("✓")} ${head}`;
  }
  const kind = result.error?.kind ?? "execution_error";
  return `${c.red("✗")} ${head} ${c.red(`${kind}: ${firstLine(result.error?.message ?? "")}`)}`;
}

function cycles(count: number): string {
  return count === 1 ? "1 cycle" : `${count} cycles`;
}

/**
 * One summary line for a finished session.
 */
export function formatOutcome(outcome: LoopOutcome, c: ChalkInstance = chalk): string {
  switch (outcome.state) {
    case "DONE":
      return c.green(`${SUMMARY_PREFIX} completed in ${cycles(outcome.cycles)}`);
    case "CANCELLED":
      return c.yellow(`${SUMMARY_PREFIX} cancelled after ${cycles(outcome.cycles)}`);
    case "FAILED": {
      const detail = outcome.error ? `: ${firstLine(outcome.error.message)}` : "";
      return c.red(
        `${SUMMARY_PREFIX} failed (${outcome.reason ?? "unknown"}) after ${cycles(outcome.cycles)}${detail}`,
      );
    }
  }
}

export interface EventPrinterOptions {
  /** Defaults to the shared chalk instance, which follows terminal color support */
  chalk?: ChalkInstance;
}

/**
 * Observers that print tool results, warnings and reasoning notes.
 */
export function createEventPrinter(
  stream: NodeJS.WritableStream,
  options: EventPrinterOptions = {},
): SessionObservers {
  const c = options.chalk ?? chalk;
  const write = (line: string) => {
    stream.write(`${line}\n`);
  };

  return {
    onReasoningComplete: ({ response }) => {
      if (response.type === "tool_calls" && response.content.trim() !== "") {
        write(c.dim(response.content.trim()));
      }
    },
    onToolResult: ({ call, result }) => {
      write(formatToolResult(call, result, c));
    },
    onMalformedResponse: ({ attempt, error }) => {
      write(c.yellow(`⚠ malformed response (attempt ${attempt}): ${firstLine(error.message)}`));
    },
    onPlanWarning: ({ message }) => {
      write(c.yellow(`⚠ plan update rejected: ${message}`));
    },
    onWindowBuilt: ({ summarized }) => {
      if (summarized) {
        write(c.dim("older turns summarized to fit the context budget"));
      }
    },
  };
}
