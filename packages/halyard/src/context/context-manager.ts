import type { ILogObj, Logger } from "tslog";
import {
  CHARS_PER_TOKEN,
  DEFAULT_PRESERVE_RECENT_TURNS,
  DEFAULT_TRIGGER_RATIO,
} from "../core/constants.js";
import { SessionTerminatedError, errorMessage, isAbortError } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import { fitText } from "../tools/output-limit.js";
import { estimateTurnSize } from "./size.js";
import type { ContextStats, Summarizer, Turn, TurnInput } from "./types.js";

export interface ContextManagerOptions {
  /** Turns kept verbatim at the end of a window. @default 5 */
  preserveRecentTurns?: number;
  /** History below `triggerRatio * budget` is returned whole. @default 0.8 */
  triggerRatio?: number;
  /** Produces summary text; without one a placeholder summary is used */
  summarizer?: Summarizer;
  estimateSize?: (turn: Turn) => number;
  logger?: Logger<ILogObj>;
}

const SUMMARY_HEADER = "[Summary of earlier turns]";

function placeholderSummary(count: number, fromSeq: number, toSeq: number): string {
  return `${count} earlier turns (${fromSeq}-${toSeq}) omitted.`;
}

/**
 * Owns a session's ordered Turn history and derives bounded windows over it.
 *
 * `windowFor` always keeps Turn 0 (the instruction) and the newest Turn.
 * Older turns that do not fit are replaced by one summary turn, cached by
 * the span it covers, so repeated calls between appends yield the same window.
 * A failed summary falls back to a placeholder and is not cached.
 */
export class ContextManager {
  private readonly history: Turn[] = [];
  private readonly summaryCache = new Map<string, Promise<string>>();
  private readonly preserveRecentTurns: number;
  private readonly triggerRatio: number;
  private readonly summarizer?: Summarizer;
  private readonly estimateSize: (turn: Turn) => number;
  private readonly logger: Logger<ILogObj>;
  private terminalStatus?: string;
  private summariesProduced = 0;
  private summaryCacheHits = 0;

  constructor(options: ContextManagerOptions = {}) {
    this.preserveRecentTurns = Math.max(1, options.preserveRecentTurns ?? DEFAULT_PRESERVE_RECENT_TURNS);
    this.triggerRatio = options.triggerRatio ?? DEFAULT_TRIGGER_RATIO;
    this.summarizer = options.summarizer;
    this.estimateSize = options.estimateSize ?? estimateTurnSize;
    this.logger = options.logger ?? createLogger({ name: "halyard:context" });
  }

  /**
   * Appends a turn, assigning the next sequence number.
   *
   * @throws SessionTerminatedError once the session has ended
   */
  append(input: TurnInput): Turn {
    if (this.terminalStatus) {
      throw new SessionTerminatedError(this.terminalStatus);
    }

    const turn: Turn = Object.freeze({
      seq: this.history.length,
      role: input.role,
      content: input.content,
      toolCalls: Object.freeze((input.toolCalls ?? []).map((call) => Object.freeze({ ...call }))),
      toolResults: Object.freeze(
        (input.toolResults ?? []).map((result) => Object.freeze({ ...result })),
      ),
      timestamp: input.timestamp ?? Date.now(),
    });
    this.history.push(turn);
    return turn;
  }

  /**
   * Puts back turns from a checkpoint, keeping their sequence numbers and
   * timestamps.
   */
  replay(turns: readonly Turn[]): void {
    for (const turn of turns) {
      if (turn.seq !== this.history.length) {
        throw new RangeError(`Cannot replay turn ${turn.seq}: expected seq ${this.history.length}`);
      }
      this.append({
        role: turn.role === "summary" ? "assistant" : turn.role,
        content: turn.content,
        toolCalls: turn.toolCalls,
        toolResults: turn.toolResults,
        timestamp: turn.timestamp,
      });
    }
  }

  /**
   * Rejects every later `append`. Called when the session reaches a terminal state.
   */
  close(status: string): void {
    this.terminalStatus = status;
  }

  get isClosed(): boolean {
    return this.terminalStatus !== undefined;
  }

  turns(): readonly Turn[] {
    return [...this.history];
  }

  get length(): number {
    return this.history.length;
  }

  /** Estimated size of the full history */
  size(): number {
    return this.history.reduce((sum, turn) => sum + this.estimateSize(turn), 0);
  }

  stats(): ContextStats {
    return {
      turnCount: this.history.length,
      totalSize: this.size(),
      summariesProduced: this.summariesProduced,
      summaryCacheHits: this.summaryCacheHits,
    };
  }

  /**
   * Ordered turns to feed the reasoning provider within `budget`.
   *
   * The newest turn is kept even when it alone exceeds the budget.
   */
  async windowFor(budget: number, signal?: AbortSignal): Promise<Turn[]> {
    const history = this.history;
    if (history.length <= 1) {
      return [...history];
    }

    const total = this.size();
    if (total <= this.triggerRatio * budget) {
      return [...history];
    }

    const [instruction] = history;
    let remaining = budget - this.estimateSize(instruction);

    // Newest first, up to preserveRecentTurns, while they fit
    let suffixStart = history.length;
    while (suffixStart > 1 && history.length - suffixStart < this.preserveRecentTurns) {
      const candidate = history[suffixStart - 1];
      const size = this.estimateSize(candidate);
      if (suffixStart < history.length && size > remaining) {
        break;
      }
      remaining -= size;
      suffixStart -= 1;
    }

    const suffix = history.slice(suffixStart);
    const excluded = history.slice(1, suffixStart);
    if (excluded.length === 0) {
      return [instruction, ...suffix];
    }

    const summary = await this.summaryFor(excluded, Math.max(0, remaining), signal);
    return [instruction, summary, ...suffix];
  }

  private async summaryFor(excluded: readonly Turn[], room: number, signal?: AbortSignal): Promise<Turn> {
    const fromSeq = excluded[0].seq;
    const toSeq = excluded[excluded.length - 1].seq;
    const key = `${fromSeq}:${toSeq}`;

    let pending = this.summaryCache.get(key);
    if (pending) {
      this.summaryCacheHits++;
    } else {
      pending = this.produceSummary(excluded, signal);
      this.summaryCache.set(key, pending);
      pending.catch(() => this.summaryCache.delete(key));
    }

    let text: string;
    try {
      text = await pending;
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        throw error;
      }
      // Not cached: the next window asks the summarizer again
      this.logger.warn("Summarizer failed, using a placeholder", { fromSeq, toSeq, error: errorMessage(error) });
      text = placeholderSummary(excluded.length, fromSeq, toSeq);
    }

    const headerTokens = Math.ceil((SUMMARY_HEADER.length + 1) / CHARS_PER_TOKEN);
    const maxChars = Math.max(0, (room - headerTokens) * CHARS_PER_TOKEN);
    const body = fitText(text, maxChars);

    const summary: Turn = {
      seq: fromSeq,
      role: "summary",
      content: body === "" ? SUMMARY_HEADER : `${SUMMARY_HEADER}\n${body}`,
      toolCalls: [],
      toolResults: [],
      timestamp: excluded[excluded.length - 1].timestamp,
      span: { fromSeq, toSeq },
    };
    return Object.freeze(summary);
  }

  private async produceSummary(excluded: readonly Turn[], signal?: AbortSignal): Promise<string> {
    const fromSeq = excluded[0].seq;
    const toSeq = excluded[excluded.length - 1].seq;
    this.logger.info("Summarizing turns", { fromSeq, toSeq });

    const text = this.summarizer
      ? (await this.summarizer.summarize(excluded, signal)).trim()
      : placeholderSummary(excluded.length, fromSeq, toSeq);
    this.summariesProduced++;
    return text;
  }
}
