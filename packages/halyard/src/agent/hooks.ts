/**
 * Read-only observers of the agent loop.
 *
 * Observers are notified in order and awaited, but cannot change what the
 * loop does: an observer that throws is logged and ignored.
 *
 * @example
 * ```typescript
 * const session = new Session({
 *   instruction: "rename the config loader",
 *   projectRoot: process.cwd(),
 *   provider,
 *   observers: {
 *     onToolResult: ({ result }) => console.log(result.toolName, result.success),
 *     onTerminal: ({ outcome }) => console.log(outcome.state),
 *   },
 * });
 * ```
 */

import type { ILogObj, Logger } from "tslog";
import type { Turn } from "../context/types.js";
import type { ToolCall, ToolResult } from "../tools/types.js";
import type { LoopOutcome } from "./agent-loop.js";
import type { ReasoningResponse } from "./response.js";

export interface CycleStartContext {
  cycle: number;
}

export interface ReasoningCompleteContext {
  cycle: number;
  response: ReasoningResponse;
}

export interface MalformedResponseContext {
  cycle: number;
  /** Consecutive malformed responses so far, this one included */
  attempt: number;
  error: Error;
}

export interface ToolResultContext {
  cycle: number;
  call: ToolCall;
  result: ToolResult;
}

export interface PlanWarningContext {
  cycle: number;
  message: string;
}

export interface TurnAppendedContext {
  turn: Turn;
}

export interface WindowBuiltContext {
  cycle: number;
  /** Turns in the window, summary turns included */
  turnCount: number;
  /** Whether a summary turn replaced older history */
  summarized: boolean;
}

export interface TerminalContext {
  outcome: LoopOutcome;
}

type Observer<TContext> = (context: TContext) => void | Promise<void>;

export interface SessionObservers {
  onCycleStart?: Observer<CycleStartContext>;
  onReasoningComplete?: Observer<ReasoningCompleteContext>;
  onMalformedResponse?: Observer<MalformedResponseContext>;
  onToolResult?: Observer<ToolResultContext>;
  onPlanWarning?: Observer<PlanWarningContext>;
  onTurnAppended?: Observer<TurnAppendedContext>;
  onWindowBuilt?: Observer<WindowBuiltContext>;
  onTerminal?: Observer<TerminalContext>;
}

/**
 * Runs an observer callback, logging anything it throws.
 */
export async function safeObserve(
  logger: Logger<ILogObj>,
  fn: () => void | Promise<void>,
): Promise<void> {
  try {
    await fn();
  } catch (error) {
    logger.error("Observer threw error (ignoring)", {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
