import type { ILogObj, Logger } from "tslog";
import { DEFAULT_MAX_OUTPUT_CHARS, DEFAULT_TOOL_TIMEOUT_MS } from "../core/constants.js";
import { errorMessage, isAbortError } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import { AbortException, TimeoutException } from "./exceptions.js";
import { truncateText } from "./output-limit.js";
import type { ToolRegistry } from "./registry.js";
import type { ToolCall, ToolContext, ToolError, ToolResult } from "./types.js";
import { formatViolations, toViolations } from "./validation.js";

export interface DispatcherOptions {
  /** Directory tools run against */
  projectRoot: string;
  /** Deadline for tools that declare none. @default 120000 */
  defaultTimeoutMs?: number;
  /** Successful output beyond this many characters is truncated. @default 30000 */
  maxOutputChars?: number;
  /**
   * Applied to every successful output after truncation.
   * The session uses it to append plan reminders.
   */
  decorateOutput?: (toolName: string, output: string) => string;
  logger?: Logger<ILogObj>;
}

export interface DispatchOptions {
  /** Overrides the tool's own timeout and the dispatcher default */
  deadlineMs?: number;
  /** Session-level cancellation */
  signal?: AbortSignal;
}

/**
 * Routes validated tool calls to registered tools under a deadline and
 * normalizes every outcome into a ToolResult. Never throws, never retries.
 */
export class ToolDispatcher {
  private readonly logger: Logger<ILogObj>;
  private readonly projectRoot: string;
  private readonly defaultTimeoutMs: number;
  private readonly maxOutputChars: number;
  private readonly decorateOutput?: (toolName: string, output: string) => string;

  constructor(
    private readonly registry: ToolRegistry,
    options: DispatcherOptions,
  ) {
    this.logger = options.logger ?? createLogger({ name: "halyard:dispatcher" });
    this.projectRoot = options.projectRoot;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.maxOutputChars = options.maxOutputChars ?? DEFAULT_MAX_OUTPUT_CHARS;
    this.decorateOutput = options.decorateOutput;
  }

  /**
   * Runs all calls concurrently. Results come back in call order.
   */
  dispatchAll(calls: readonly ToolCall[], options: DispatchOptions = {}): Promise<ToolResult[]> {
    return Promise.all(calls.map((call) => this.dispatch(call, options)));
  }

  async dispatch(call: ToolCall, options: DispatchOptions = {}): Promise<ToolResult> {
    const startTime = Date.now();
    const fail = (error: ToolError): ToolResult => ({
      callId: call.id,
      toolName: call.name,
      success: false,
      error,
      durationMs: Date.now() - startTime,
    });

    const tool = this.registry.get(call.name);
    if (!tool) {
      this.logger.warn("Unknown tool requested", { callId: call.id, toolName: call.name });
      const available = this.registry.names();
      return fail({
        kind: "unknown_tool",
        message: `Unknown tool '${call.name}'. Available tools: ${available.join(", ") || "none"}`,
      });
    }

    const parsed = tool.parameterSchema.safeParse(call.arguments);
    if (!parsed.success) {
      const violations = toViolations(parsed.error.issues, call.arguments);
      this.logger.warn("Tool arguments failed validation", {
        callId: call.id,
        toolName: call.name,
        violations,
      });
      return fail({
        kind: "invalid_arguments",
        message: formatViolations(call.name, violations),
        violations,
      });
    }

    if (options.signal?.aborted) {
      return fail({ kind: "cancelled", message: "Cancelled before execution" });
    }

    const timeoutMs = options.deadlineMs ?? tool.timeoutMs ?? this.defaultTimeoutMs;
    const abortController = new AbortController();
    const parentSignal = options.signal;
    const cancellation = this.createCancellationPromise(parentSignal, abortController);
    const timeout = this.createTimeoutPromise(call.name, timeoutMs, abortController);

    const ctx: ToolContext = {
      signal: abortController.signal,
      projectRoot: this.projectRoot,
      callId: call.id,
      logger: this.logger.getSubLogger({ name: call.name }),
    };

    this.logger.debug("Executing tool", { callId: call.id, toolName: call.name, timeoutMs });

    const execution = Promise.resolve().then(() => tool.execute(parsed.data, ctx));
    // The race may be lost to the deadline; the abandoned execution still settles
    execution.catch((error: unknown) => {
      if (abortController.signal.aborted) {
        this.logger.debug("Abandoned tool settled with error", {
          callId: call.id,
          error: errorMessage(error),
        });
      }
    });

    try {
      const raw = await Promise.race([execution, timeout.promise, cancellation.promise]);
      let output = truncateText(raw, this.maxOutputChars);
      if (this.decorateOutput) {
        output = this.decorateOutput(call.name, output);
      }
      const durationMs = Date.now() - startTime;
      this.logger.debug("Tool completed", { callId: call.id, toolName: call.name, durationMs });
      return { callId: call.id, toolName: call.name, success: true, output, durationMs };
    } catch (error) {
      if (error instanceof TimeoutException) {
        this.logger.warn("Tool timed out", { callId: call.id, toolName: call.name, timeoutMs });
        return fail({ kind: "timeout", message: error.message });
      }

      if (error instanceof AbortException || (abortController.signal.aborted && isAbortError(error))) {
        this.logger.info("Tool cancelled", { callId: call.id, toolName: call.name });
        return fail({ kind: "cancelled", message: errorMessage(error) });
      }

      this.logger.error("Tool execution failed", {
        callId: call.id,
        toolName: call.name,
        error: errorMessage(error),
      });
      return fail({ kind: "execution_error", message: errorMessage(error) });
    } finally {
      timeout.cancel();
      cancellation.cancel();
    }
  }

  private createTimeoutPromise(
    toolName: string,
    timeoutMs: number,
    abortController: AbortController,
  ): { promise: Promise<never>; cancel: () => void } {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const promise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        const timeoutError = new TimeoutException(toolName, timeoutMs);
        // Abort first so the tool can start cleaning up
        abortController.abort(timeoutError.message);
        reject(timeoutError);
      }, timeoutMs);
    });

    return {
      promise,
      cancel: () => clearTimeout(timeoutId),
    };
  }

  /**
   * Rejects with an AbortException when the session signal fires, after
   * forwarding the abort to the tool's own controller.
   */
  private createCancellationPromise(
    signal: AbortSignal | undefined,
    abortController: AbortController,
  ): { promise: Promise<never>; cancel: () => void } {
    if (!signal) {
      return { promise: new Promise<never>(() => {}), cancel: () => {} };
    }

    let onAbort: (() => void) | undefined;
    const promise = new Promise<never>((_, reject) => {
      onAbort = () => {
        abortController.abort(signal.reason);
        reject(new AbortException("Cancelled by session"));
      };
      signal.addEventListener("abort", onAbort, { once: true });
    });

    return {
      promise,
      cancel: () => {
        if (onAbort) signal.removeEventListener("abort", onAbort);
      },
    };
  }
}
