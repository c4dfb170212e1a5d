import type { ToolCall, ToolResult } from "../tools/types.js";

export type TurnRole = "instruction" | "assistant" | "summary";

/**
 * One reasoning cycle: the reasoning output plus the calls it made and
 * their results. Frozen once appended.
 */
export interface Turn {
  readonly seq: number;
  readonly role: TurnRole;
  readonly content: string;
  readonly toolCalls: readonly ToolCall[];
  readonly toolResults: readonly ToolResult[];
  /** Epoch milliseconds */
  readonly timestamp: number;
  /** Set on summary turns: the inclusive span of sequence numbers replaced */
  readonly span?: { readonly fromSeq: number; readonly toSeq: number };
}

/**
 * What callers pass to `append`; the manager assigns `seq`.
 */
export interface TurnInput {
  role: Exclude<TurnRole, "summary">;
  content: string;
  toolCalls?: readonly ToolCall[];
  toolResults?: readonly ToolResult[];
  timestamp?: number;
}

/**
 * Produces the text of a summary turn for a span of excluded turns.
 */
export interface Summarizer {
  summarize(turns: readonly Turn[], signal?: AbortSignal): Promise<string>;
}

export interface ContextStats {
  turnCount: number;
  totalSize: number;
  summariesProduced: number;
  summaryCacheHits: number;
}
