import { CHARS_PER_TOKEN } from "../core/constants.js";
import type { Turn } from "./types.js";

/**
 * Token estimate for a turn: all its text, calls and results, at four
 * characters per token.
 */
export function estimateTurnSize(turn: Turn): number {
  let chars = turn.content.length;
  for (const call of turn.toolCalls) {
    chars += call.name.length + JSON.stringify(call.arguments).length;
  }
  for (const result of turn.toolResults) {
    chars += (result.output?.length ?? 0) + (result.error?.message.length ?? 0);
  }
  return Math.ceil(chars / CHARS_PER_TOKEN);
}
