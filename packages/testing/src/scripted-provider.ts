import type { PlanUpdates, ReasoningInput, ReasoningProvider, Turn } from "halyard";

export type ScriptStep =
  | { kind: "respond"; response: unknown }
  | { kind: "throw"; error: Error }
  | { kind: "compute"; fn: (input: ReasoningInput) => unknown | Promise<unknown> }
  | { kind: "hang" };

interface CallRequest {
  id?: string;
  name: string;
  arguments?: Record<string, unknown>;
}

/**
 * Builders for scripted responses.
 *
 * @example
 * ```typescript
 * const provider = new ScriptedReasoningProvider([
 *   step.toolCalls([{ name: "bash", arguments: { command: "ls" } }]),
 *   step.final("Done"),
 * ]);
 * ```
 */
export const step = {
  final(answer: string, planUpdates?: PlanUpdates): ScriptStep {
    return { kind: "respond", response: { type: "final", answer, planUpdates } };
  },

  toolCalls(calls: readonly CallRequest[], content = "", planUpdates?: PlanUpdates): ScriptStep {
    return { kind: "respond", response: { type: "tool_calls", content, calls, planUpdates } };
  },

  /** Any value, well-formed or not */
  raw(response: unknown): ScriptStep {
    return { kind: "respond", response };
  },

  fail(error: Error): ScriptStep {
    return { kind: "throw", error };
  },

  compute(fn: (input: ReasoningInput) => unknown | Promise<unknown>): ScriptStep {
    return { kind: "compute", fn };
  },

  /** Never answers; rejects once the call's signal aborts */
  hang(): ScriptStep {
    return { kind: "hang" };
  },
};

export interface ScriptedProviderOptions {
  /** Summary text, or a function producing it. Default: "summary of turns A-B" */
  summary?: string | ((turns: readonly Turn[]) => string);
  /** Replays the last step forever instead of failing when the script runs out */
  repeatLast?: boolean;
}

function abortError(signal: AbortSignal): Error {
  const error = new Error(typeof signal.reason === "string" ? signal.reason : "The operation was aborted");
  error.name = "AbortError";
  return error;
}

/**
 * Reasoning provider that plays back a fixed script, one step per call,
 * and records every input it receives.
 */
export class ScriptedReasoningProvider implements ReasoningProvider {
  readonly inputs: ReasoningInput[] = [];
  readonly summarizedSpans: (readonly Turn[])[] = [];
  private position = 0;

  constructor(
    private readonly steps: readonly ScriptStep[],
    private readonly options: ScriptedProviderOptions = {},
  ) {}

  get callCount(): number {
    return this.inputs.length;
  }

  async next(input: ReasoningInput, signal: AbortSignal): Promise<unknown> {
    this.inputs.push(input);

    let current = this.steps[this.position];
    if (current) {
      this.position++;
    } else if (this.options.repeatLast && this.steps.length > 0) {
      current = this.steps[this.steps.length - 1];
    } else {
      throw new Error(`Script exhausted after ${this.steps.length} steps`);
    }

    switch (current.kind) {
      case "respond":
        return current.response;
      case "throw":
        throw current.error;
      case "compute":
        return current.fn(input);
      case "hang":
        return new Promise((_, reject) => {
          if (signal.aborted) {
            reject(abortError(signal));
            return;
          }
          signal.addEventListener("abort", () => reject(abortError(signal)), { once: true });
        });
    }
  }

  async summarize(turns: readonly Turn[]): Promise<string> {
    this.summarizedSpans.push(turns);
    const { summary } = this.options;
    if (typeof summary === "function") {
      return summary(turns);
    }
    if (summary !== undefined) {
      return summary;
    }
    const first = turns[0]?.seq ?? 0;
    const last = turns[turns.length - 1]?.seq ?? first;
    return `summary of turns ${first}-${last}`;
  }
}
