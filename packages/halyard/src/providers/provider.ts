import type { Summarizer, Turn } from "../context/types.js";
import type { PlanItem } from "../planner/types.js";
import type { ToolSpec } from "../tools/types.js";

/**
 * Everything the reasoning provider sees for one cycle.
 */
export interface ReasoningInput {
  /** Context window, instruction first */
  window: readonly Turn[];
  plan: readonly Readonly<PlanItem>[];
  /** The plan rendered as a checklist */
  planText: string;
  tools: readonly ToolSpec[];
  /** 1-based cycle number */
  cycle: number;
}

/**
 * The language model behind the loop.
 *
 * `next` returns the raw response; the loop validates its shape, so a
 * provider never needs to guarantee a well-formed result. Throwing a
 * `ReasoningParseError` counts as a malformed response, any other error
 * as a provider failure.
 */
export interface ReasoningProvider extends Summarizer {
  next(input: ReasoningInput, signal: AbortSignal): Promise<unknown>;
}
