/**
 * Thrown (internally, by the dispatcher) when a tool exceeds its deadline.
 * The tool's signal is aborted before this is raised.
 */
export class TimeoutException extends Error {
  public readonly timeoutMs: number;
  public readonly toolName: string;

  constructor(toolName: string, timeoutMs: number) {
    super(`Tool '${toolName}' execution exceeded timeout of ${timeoutMs}ms`);
    this.name = "TimeoutException";
    this.toolName = toolName;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Thrown when tool execution is aborted, either by the tool itself through
 * `throwIfAborted()` or by the dispatcher on session cancellation.
 */
export class AbortException extends Error {
  constructor(message?: string) {
    super(message || "Tool execution was aborted");
    this.name = "AbortException";
  }
}

/**
 * Tools throw this for a failure they can describe precisely
 * ("file does not exist", "anchor text not found"). The message reaches
 * the reasoning provider verbatim.
 */
export class ToolExecutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolExecutionError";
  }
}
