import type { ILogObj, Logger } from "tslog";

/**
 * A requested tool invocation, owned by the Turn that produced it.
 */
export interface ToolCall {
  /** Unique within its Turn */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  /** Sequence number of the originating Turn */
  turnSeq: number;
}

export type ToolErrorKind =
  | "unknown_tool"
  | "invalid_arguments"
  | "execution_error"
  | "timeout"
  | "cancelled";

/**
 * One specific problem with a call's argument mapping.
 */
export interface ArgumentViolation {
  kind: "missing" | "extra" | "mistyped";
  key: string;
  message: string;
}

export interface ToolError {
  kind: ToolErrorKind;
  message: string;
  violations?: readonly ArgumentViolation[];
}

/**
 * Exactly one per ToolCall, success or failure.
 */
export interface ToolResult {
  callId: string;
  toolName: string;
  success: boolean;
  output?: string;
  error?: ToolError;
  durationMs: number;
}

/**
 * Context handed to a tool's execute function.
 */
export interface ToolContext {
  /** Aborted on timeout or session cancellation */
  signal: AbortSignal;
  /** Absolute project root the session runs against */
  projectRoot: string;
  callId: string;
  logger: Logger<ILogObj>;
}

/**
 * Tool description as the reasoning provider sees it.
 */
export interface ToolSpec {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}
