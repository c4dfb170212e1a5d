import { randomUUID } from "node:crypto";
import path from "node:path";
import type { ILogObj, Logger } from "tslog";
import { ContextManager } from "../context/context-manager.js";
import { errorMessage } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import { TaskPlanner } from "../planner/planner.js";
import { planReminder } from "../planner/reminders.js";
import type { PlanItem } from "../planner/types.js";
import type { ReasoningProvider } from "../providers/provider.js";
import { createBuiltinTools } from "../tools/builtins/index.js";
import { TODO_WRITE_TOOL_NAME } from "../tools/builtins/todo.js";
import { ToolDispatcher } from "../tools/dispatcher.js";
import { type McpConnection, type McpServerConfig, connectMcpServers } from "../tools/external/mcp.js";
import { ToolRegistry } from "../tools/registry.js";
import type { AbstractTool } from "../tools/tool.js";
import { AgentLoop, type LoopOutcome, type LoopState } from "./agent-loop.js";
import type { SessionCheckpoint } from "./checkpoint.js";
import { type SessionConfig, type SessionConfigInput, resolveSessionConfig } from "./config.js";
import type { SessionObservers } from "./hooks.js";

export type SessionStatus = "idle" | "running" | "completed" | "failed" | "cancelled";

export interface SessionOptions {
  instruction: string;
  /** Directory the tools operate on; resolved to an absolute path */
  projectRoot: string;
  provider: ReasoningProvider;
  config?: SessionConfigInput;
  /** Registered after the built-ins, replacing any with the same name */
  tools?: readonly AbstractTool[];
  /** @default true */
  builtinTools?: boolean;
  /** Extra ignore globs for the listing and search tools */
  ignorePatterns?: readonly string[];
  /** External tool servers connected when the session starts */
  mcpServers?: readonly McpServerConfig[];
  observers?: SessionObservers;
  logger?: Logger<ILogObj>;
  id?: string;
}

export type ResumeOptions = Omit<SessionOptions, "instruction" | "projectRoot" | "id">;

export interface SessionStatusSnapshot {
  status: SessionStatus;
  state: LoopState;
  cycles: number;
  turnCount: number;
  plan: readonly Readonly<PlanItem>[];
  outcome?: LoopOutcome;
}

const STATUS_BY_STATE = {
  DONE: "completed",
  FAILED: "failed",
  CANCELLED: "cancelled",
} as const satisfies Record<LoopOutcome["state"], SessionStatus>;

/**
 * One agent run: an instruction, its Turn history and its plan.
 *
 * Sessions share nothing, so several can run in one process.
 *
 * @example
 * ```typescript
 * const session = new Session({ instruction: "list files in project root", projectRoot: ".", provider });
 * const outcome = await session.start();
 * if (outcome.state === "DONE") console.log(outcome.answer);
 * ```
 */
export class Session {
  readonly id: string;
  readonly projectRoot: string;
  readonly instruction: string;
  readonly config: SessionConfig;

  private readonly logger: Logger<ILogObj>;
  private readonly context: ContextManager;
  private readonly planner: TaskPlanner;
  private readonly registry: ToolRegistry;
  private readonly loop: AgentLoop;
  private readonly mcpServers: readonly McpServerConfig[];
  private readonly abortController = new AbortController();
  private run?: Promise<LoopOutcome>;
  private outcome?: LoopOutcome;

  /**
   * @param restored Turns and plan to start from; `Session.resume` passes them
   */
  constructor(options: SessionOptions, restored?: { turns: SessionCheckpoint["turns"]; plan: readonly PlanItem[] }) {
    this.id = options.id ?? randomUUID();
    this.projectRoot = path.resolve(options.projectRoot);
    this.instruction = options.instruction;
    this.config = resolveSessionConfig(options.config);
    this.logger = (options.logger ?? createLogger({ name: "halyard" })).getSubLogger({
      name: `session:${this.id.slice(0, 8)}`,
    });
    this.mcpServers = options.mcpServers ?? [];

    this.planner = new TaskPlanner(restored?.plan ?? [], this.logger);
    this.context = new ContextManager({
      preserveRecentTurns: this.config.preserveRecentTurns,
      triggerRatio: this.config.triggerRatio,
      summarizer: options.provider,
      logger: this.logger,
    });
    if (restored) {
      this.context.replay(restored.turns);
    } else {
      this.context.append({ role: "instruction", content: options.instruction });
    }

    this.registry = new ToolRegistry(this.logger);
    if (options.builtinTools ?? true) {
      for (const tool of createBuiltinTools({
        planner: this.planner,
        ignorePatterns: options.ignorePatterns,
      })) {
        this.registry.register(tool);
      }
    }
    for (const tool of options.tools ?? []) {
      this.registry.register(tool);
    }

    const dispatcher = new ToolDispatcher(this.registry, {
      projectRoot: this.projectRoot,
      defaultTimeoutMs: this.config.toolTimeoutMs,
      maxOutputChars: this.config.maxOutputChars,
      decorateOutput: (toolName, output) =>
        toolName === TODO_WRITE_TOOL_NAME ? output : output + planReminder(this.planner.unfinished()),
      logger: this.logger,
    });

    this.loop = new AgentLoop({
      context: this.context,
      planner: this.planner,
      registry: this.registry,
      dispatcher,
      provider: options.provider,
      config: this.config,
      observers: options.observers,
      logger: this.logger,
      completedCycles: this.context.turns().filter((turn) => turn.role === "assistant").length,
    });
  }

  /**
   * Rebuilds a session from a checkpoint. The Turns are replayed, the plan
   * restored, and the loop resumes at AWAITING_REASONING.
   */
  static resume(checkpoint: SessionCheckpoint, options: ResumeOptions): Session {
    return new Session(
      {
        ...options,
        id: checkpoint.id,
        instruction: checkpoint.instruction,
        projectRoot: checkpoint.projectRoot,
      },
      { turns: checkpoint.turns, plan: checkpoint.plan },
    );
  }

  /**
   * Runs the loop to a terminal state. Calling it again returns the same
   * run; a session cannot be restarted once it has ended.
   */
  start(): Promise<LoopOutcome> {
    if (!this.run) {
      this.run = this.execute();
    }
    return this.run;
  }

  /**
   * Requests cancellation. The loop stops at the next transition and
   * in-flight tools are aborted.
   */
  cancel(reason = "Cancelled by user"): void {
    if (!this.abortController.signal.aborted) {
      this.logger.info("Cancellation requested", { reason });
      this.abortController.abort(reason);
    }
  }

  status(): SessionStatusSnapshot {
    let status: SessionStatus = "idle";
    if (this.outcome) {
      status = STATUS_BY_STATE[this.outcome.state];
    } else if (this.run) {
      status = "running";
    }
    return {
      status,
      state: this.loop.state,
      cycles: this.loop.completedCycles,
      turnCount: this.context.length,
      plan: this.planner.snapshot(),
      outcome: this.outcome,
    };
  }

  /** Turns appended so far, instruction first */
  turns(): SessionCheckpoint["turns"] {
    return this.context.turns();
  }

  checkpoint(): SessionCheckpoint {
    return {
      version: 1,
      id: this.id,
      projectRoot: this.projectRoot,
      instruction: this.instruction,
      turns: this.context.turns(),
      plan: this.planner.snapshot(),
    };
  }

  private async execute(): Promise<LoopOutcome> {
    this.logger.info("Session started", {
      projectRoot: this.projectRoot,
      tools: this.registry.names().length,
    });

    let connections: McpConnection[] = [];
    try {
      if (this.mcpServers.length > 0) {
        connections = await connectMcpServers(this.mcpServers, this.registry, this.logger);
      }
      const outcome = await this.loop.run(this.abortController.signal);
      this.outcome = outcome;
      return outcome;
    } finally {
      this.context.close(this.outcome ? STATUS_BY_STATE[this.outcome.state] : "failed");
      await Promise.all(
        connections.map((connection) =>
          connection.close().catch((error: unknown) => {
            this.logger.warn(`Failed to close MCP server '${connection.name}'`, {
              error: errorMessage(error),
            });
          }),
        ),
      );
    }
  }
}
