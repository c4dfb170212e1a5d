/**
 * Error classes and helpers for halyard.
 *
 * Per-call tool failures are never thrown: they travel as `ToolResult.error`
 * values. The classes here cover loop-level and API-misuse conditions.
 */

export type HalyardErrorCode =
  | "reasoning_parse_error"
  | "budget_exceeded"
  | "unknown_plan_item"
  | "plan_validation"
  | "session_terminated"
  | "tool_registration"
  | "invalid_config"
  | "invalid_checkpoint";

/**
 * Base class of every error halyard throws on purpose.
 */
export class HalyardError extends Error {
  readonly code: HalyardErrorCode;

  constructor(code: HalyardErrorCode, message: string) {
    super(message);
    this.name = "HalyardError";
    this.code = code;
  }
}

/**
 * The reasoning provider returned output that is neither a final answer nor
 * a list of tool calls.
 */
export class ReasoningParseError extends HalyardError {
  readonly raw: unknown;

  constructor(message: string, raw?: unknown) {
    super("reasoning_parse_error", message);
    this.name = "ReasoningParseError";
    this.raw = raw;
  }
}

export class BudgetExceededError extends HalyardError {
  readonly maxCycles: number;

  constructor(maxCycles: number) {
    super("budget_exceeded", `Cycle budget exceeded: no final answer after ${maxCycles} cycles`);
    this.name = "BudgetExceededError";
    this.maxCycles = maxCycles;
  }
}

export class UnknownPlanItemError extends HalyardError {
  readonly itemId: string;

  constructor(itemId: string) {
    super("unknown_plan_item", `Unknown plan item: ${itemId}`);
    this.name = "UnknownPlanItemError";
    this.itemId = itemId;
  }
}

export class PlanValidationError extends HalyardError {
  constructor(message: string) {
    super("plan_validation", message);
    this.name = "PlanValidationError";
  }
}

export class SessionTerminatedError extends HalyardError {
  constructor(status: string) {
    super("session_terminated", `Session is already ${status}`);
    this.name = "SessionTerminatedError";
  }
}

export class ToolRegistrationError extends HalyardError {
  constructor(message: string) {
    super("tool_registration", message);
    this.name = "ToolRegistrationError";
  }
}

export class ConfigValidationError extends HalyardError {
  constructor(message: string) {
    super("invalid_config", message);
    this.name = "ConfigValidationError";
  }
}

export class CheckpointError extends HalyardError {
  constructor(message: string) {
    super("invalid_checkpoint", message);
    this.name = "CheckpointError";
  }
}

/**
 * Detects if an error is an abort/cancellation error.
 *
 * Covers the standard `AbortError`, the OpenAI SDK's `APIUserAbortError`,
 * halyard's own `AbortException`, and messages mentioning abort or cancel.
 */
export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  if (error.name === "AbortError") return true;
  if (error.name === "APIUserAbortError") return true;
  if (error.name === "AbortException") return true;

  const message = error.message.toLowerCase();
  if (message.includes("abort")) return true;
  if (message.includes("cancelled")) return true;
  if (message.includes("canceled")) return true;

  return false;
}

/**
 * Renders any thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
