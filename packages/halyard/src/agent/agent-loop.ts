import pRetry from "p-retry";
import type { ILogObj, Logger } from "tslog";
import type { ContextManager } from "../context/context-manager.js";
import type { Turn } from "../context/types.js";
import {
  BudgetExceededError,
  HalyardError,
  ReasoningParseError,
  errorMessage,
  isAbortError,
} from "../core/errors.js";
import { isRetryableError } from "../core/retry.js";
import { createLogger } from "../logging/logger.js";
import type { TaskPlanner } from "../planner/planner.js";
import type { ReasoningInput, ReasoningProvider } from "../providers/provider.js";
import type { ToolDispatcher } from "../tools/dispatcher.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { SessionConfig } from "./config.js";
import { type SessionObservers, safeObserve } from "./hooks.js";
import { type PlanUpdates, type ReasoningResponse, parseReasoningResponse } from "./response.js";

export type LoopState = "AWAITING_REASONING" | "DISPATCHING_TOOLS" | "DONE" | "FAILED" | "CANCELLED";

export type TerminalState = Extract<LoopState, "DONE" | "FAILED" | "CANCELLED">;

export type FailureReason = "reasoning_parse_error" | "budget_exceeded" | "provider_error";

export interface LoopOutcome {
  state: TerminalState;
  /** Set when DONE */
  answer?: string;
  /** Set when FAILED */
  reason?: FailureReason;
  error?: Error;
  /** Cycles completed over the session's lifetime, resumed ones included */
  cycles: number;
}

export interface AgentLoopOptions {
  context: ContextManager;
  planner: TaskPlanner;
  registry: ToolRegistry;
  dispatcher: ToolDispatcher;
  provider: ReasoningProvider;
  config: SessionConfig;
  observers?: SessionObservers;
  logger?: Logger<ILogObj>;
  /** Cycles completed before a resume */
  completedCycles?: number;
}

type ReasoningOutcome =
  | { kind: "response"; response: ReasoningResponse }
  | { kind: "terminal"; outcome: LoopOutcome };

/**
 * The per-session state machine.
 *
 * Each cycle builds a window, asks the provider for the next step exactly
 * once (malformed responses are re-requested within the cycle), dispatches
 * the requested calls and appends one Turn. Termination always happens at a
 * Turn boundary: a cycle interrupted by cancellation leaves no Turn behind.
 */
export class AgentLoop {
  private readonly context: ContextManager;
  private readonly planner: TaskPlanner;
  private readonly registry: ToolRegistry;
  private readonly dispatcher: ToolDispatcher;
  private readonly provider: ReasoningProvider;
  private readonly config: SessionConfig;
  private readonly observers: SessionObservers;
  private readonly logger: Logger<ILogObj>;
  private loopState: LoopState = "AWAITING_REASONING";
  private cycles: number;

  constructor(options: AgentLoopOptions) {
    this.context = options.context;
    this.planner = options.planner;
    this.registry = options.registry;
    this.dispatcher = options.dispatcher;
    this.provider = options.provider;
    this.config = options.config;
    this.observers = options.observers ?? {};
    this.logger = options.logger ?? createLogger({ name: "halyard:loop" });
    this.cycles = options.completedCycles ?? 0;
  }

  get state(): LoopState {
    return this.loopState;
  }

  get completedCycles(): number {
    return this.cycles;
  }

  async run(signal: AbortSignal): Promise<LoopOutcome> {
    while (true) {
      if (signal.aborted) {
        return this.finish({ state: "CANCELLED" });
      }
      if (this.cycles >= this.config.maxCycles) {
        const error = new BudgetExceededError(this.config.maxCycles);
        this.logger.warn(error.message);
        return this.finish({ state: "FAILED", reason: "budget_exceeded", error });
      }

      const cycle = this.cycles + 1;
      this.loopState = "AWAITING_REASONING";
      await safeObserve(this.logger, () => this.observers.onCycleStart?.({ cycle }));

      const reasoning = await this.reason(cycle, signal);
      if (reasoning.kind === "terminal") {
        return this.finish(reasoning.outcome);
      }
      const { response } = reasoning;
      if (signal.aborted) {
        return this.finish({ state: "CANCELLED" });
      }
      await safeObserve(this.logger, () =>
        this.observers.onReasoningComplete?.({ cycle, response }),
      );

      if (response.type === "final") {
        await this.appendTurn({ role: "assistant", content: response.answer });
        this.cycles = cycle;
        await this.applyPlanUpdates(response.planUpdates, cycle);
        this.logger.info("Final answer received", { cycle });
        return this.finish({ state: "DONE", answer: response.answer });
      }

      this.loopState = "DISPATCHING_TOOLS";
      this.logger.debug("Dispatching tool calls", { cycle, count: response.calls.length });

      const results =
        response.calls.length > 0 ? await this.dispatcher.dispatchAll(response.calls, { signal }) : [];
      if (signal.aborted) {
        // Results may be synthesized cancellations; the partial turn is dropped
        return this.finish({ state: "CANCELLED" });
      }

      for (const [index, result] of results.entries()) {
        const call = response.calls[index];
        await safeObserve(this.logger, () => this.observers.onToolResult?.({ cycle, call, result }));
      }

      await this.appendTurn({
        role: "assistant",
        content: response.content,
        toolCalls: response.calls,
        toolResults: results,
      });
      this.cycles = cycle;
      await this.applyPlanUpdates(response.planUpdates, cycle);
    }
  }

  /**
   * Builds the window and obtains one well-formed response, re-asking on
   * malformed output up to `maxMalformedResponses` consecutive attempts.
   */
  private async reason(cycle: number, signal: AbortSignal): Promise<ReasoningOutcome> {
    let window: Turn[];
    try {
      window = await this.context.windowFor(this.config.contextBudget, signal);
    } catch (error) {
      return { kind: "terminal", outcome: this.providerFailure(error, signal) };
    }
    await safeObserve(this.logger, () =>
      this.observers.onWindowBuilt?.({
        cycle,
        turnCount: window.length,
        summarized: window.some((turn) => turn.role === "summary"),
      }),
    );

    const input: ReasoningInput = {
      window,
      plan: this.planner.snapshot(),
      planText: this.planner.render(),
      tools: this.registry.catalog(),
      cycle,
    };
    const turnSeq = this.context.length;

    for (let attempt = 1; ; attempt++) {
      if (signal.aborted) {
        return { kind: "terminal", outcome: { state: "CANCELLED", cycles: this.cycles } };
      }

      try {
        const raw = await this.callProvider(input, signal);
        return { kind: "response", response: parseReasoningResponse(raw, turnSeq) };
      } catch (error) {
        if (!(error instanceof ReasoningParseError)) {
          return { kind: "terminal", outcome: this.providerFailure(error, signal) };
        }

        this.logger.warn("Malformed reasoning response", { cycle, attempt, error: error.message });
        await safeObserve(this.logger, () =>
          this.observers.onMalformedResponse?.({ cycle, attempt, error }),
        );
        if (attempt >= this.config.maxMalformedResponses) {
          return {
            kind: "terminal",
            outcome: {
              state: "FAILED",
              reason: "reasoning_parse_error",
              error,
              cycles: this.cycles,
            },
          };
        }
      }
    }
  }

  private async callProvider(input: ReasoningInput, signal: AbortSignal): Promise<unknown> {
    const { enabled, retries, minTimeout, maxTimeout, factor, randomize, onRetry, shouldRetry } =
      this.config.retry;
    if (!enabled) {
      return this.provider.next(input, signal);
    }

    return pRetry(
      (attemptNumber) => {
        this.logger.debug("Calling reasoning provider", {
          cycle: input.cycle,
          attempt: attemptNumber,
          maxAttempts: retries + 1,
        });
        return this.provider.next(input, signal);
      },
      {
        retries,
        minTimeout,
        maxTimeout,
        factor,
        randomize,
        signal,
        onFailedAttempt: ({ error, attemptNumber, retriesLeft }) => {
          if (error instanceof HalyardError || retriesLeft === 0) {
            return;
          }
          this.logger.warn(
            `Reasoning call failed (attempt ${attemptNumber}/${attemptNumber + retriesLeft})`,
            { error: error.message, retriesLeft },
          );
          onRetry?.(error, attemptNumber);
        },
        shouldRetry: ({ error }) => {
          // Malformed output is handled by the loop, never by backoff
          if (error instanceof HalyardError || signal.aborted || isAbortError(error)) {
            return false;
          }
          return (shouldRetry ?? isRetryableError)(error);
        },
      },
    );
  }

  private providerFailure(error: unknown, signal: AbortSignal): LoopOutcome {
    if (signal.aborted || isAbortError(error)) {
      return { state: "CANCELLED", cycles: this.cycles };
    }
    this.logger.error("Reasoning provider failed", { error: errorMessage(error) });
    return {
      state: "FAILED",
      reason: "provider_error",
      error: error instanceof Error ? error : new Error(String(error)),
      cycles: this.cycles,
    };
  }

  private async appendTurn(input: Parameters<ContextManager["append"]>[0]): Promise<void> {
    const turn = this.context.append(input);
    await safeObserve(this.logger, () => this.observers.onTurnAppended?.({ turn }));
  }

  /**
   * Applies requested plan changes. A change the planner rejects becomes a
   * warning; it never ends the session.
   */
  private async applyPlanUpdates(updates: PlanUpdates | undefined, cycle: number): Promise<void> {
    if (!updates) {
      return;
    }

    const warn = async (error: unknown) => {
      if (!(error instanceof HalyardError)) {
        throw error;
      }
      this.logger.warn("Plan update rejected", { cycle, error: error.message });
      await safeObserve(this.logger, () =>
        this.observers.onPlanWarning?.({ cycle, message: error.message }),
      );
    };

    if (updates.set) {
      try {
        this.planner.setPlan(updates.set);
      } catch (error) {
        await warn(error);
      }
    }
    for (const { id, status } of updates.update ?? []) {
      try {
        this.planner.updateItem(id, status);
      } catch (error) {
        await warn(error);
      }
    }
  }

  private async finish(outcome: Omit<LoopOutcome, "cycles"> & { cycles?: number }): Promise<LoopOutcome> {
    const final: LoopOutcome = { ...outcome, cycles: outcome.cycles ?? this.cycles };
    this.loopState = final.state;
    this.logger.info("Session loop finished", {
      state: final.state,
      reason: final.reason,
      cycles: final.cycles,
    });
    await safeObserve(this.logger, () => this.observers.onTerminal?.({ outcome: final }));
    return final;
  }
}
