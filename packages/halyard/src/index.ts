// Session and loop
export { AgentLoop } from "./agent/agent-loop.js";
export type {
  AgentLoopOptions,
  FailureReason,
  LoopOutcome,
  LoopState,
  TerminalState,
} from "./agent/agent-loop.js";
export { parseCheckpoint, sessionCheckpointSchema } from "./agent/checkpoint.js";
export type { SessionCheckpoint } from "./agent/checkpoint.js";
export { resolveSessionConfig, sessionConfigSchema } from "./agent/config.js";
export type { SessionConfig, SessionConfigInput } from "./agent/config.js";
export { safeObserve } from "./agent/hooks.js";
export type {
  CycleStartContext,
  MalformedResponseContext,
  PlanWarningContext,
  ReasoningCompleteContext,
  SessionObservers,
  TerminalContext,
  ToolResultContext,
  TurnAppendedContext,
  WindowBuiltContext,
} from "./agent/hooks.js";
export { parseReasoningResponse, planUpdatesSchema, reasoningResponseSchema } from "./agent/response.js";
export type { PlanUpdates, ReasoningResponse } from "./agent/response.js";
export { Session } from "./agent/session.js";
export type {
  ResumeOptions,
  SessionOptions,
  SessionStatus,
  SessionStatusSnapshot,
} from "./agent/session.js";

// Context
export { ContextManager } from "./context/context-manager.js";
export type { ContextManagerOptions } from "./context/context-manager.js";
export { formatTurnsForSummary } from "./context/format.js";
export { estimateTurnSize } from "./context/size.js";
export type { ContextStats, Summarizer, Turn, TurnInput, TurnRole } from "./context/types.js";

// Core
export * from "./core/constants.js";
export {
  BudgetExceededError,
  CheckpointError,
  ConfigValidationError,
  HalyardError,
  PlanValidationError,
  ReasoningParseError,
  SessionTerminatedError,
  ToolRegistrationError,
  UnknownPlanItemError,
  errorMessage,
  isAbortError,
} from "./core/errors.js";
export type { HalyardErrorCode } from "./core/errors.js";
export { DEFAULT_RETRY_CONFIG, isRetryableError, resolveRetryConfig } from "./core/retry.js";
export type { ResolvedRetryConfig, RetryConfig } from "./core/retry.js";

// Logging
export { createLogger, parseLogLevel, stripAnsi } from "./logging/logger.js";
export type { LoggerOptions } from "./logging/logger.js";
export type { ILogObj, Logger } from "tslog";

// Planner
export { TaskPlanner } from "./planner/planner.js";
export { planReminder, planUpdateMessage } from "./planner/reminders.js";
export { planItemPrioritySchema, planItemSchema, planItemStatusSchema } from "./planner/types.js";
export type { PlanItem, PlanItemPriority, PlanItemStatus } from "./planner/types.js";

// Providers
export { OpenAIReasoningProvider, toChatMessages } from "./providers/openai.js";
export type { ChatCompletionsClient, OpenAIReasoningProviderOptions } from "./providers/openai.js";
export type { ReasoningInput, ReasoningProvider } from "./providers/provider.js";

// Tools
export * from "./tools/builtins/index.js";
export { ToolDispatcher } from "./tools/dispatcher.js";
export type { DispatcherOptions, DispatchOptions } from "./tools/dispatcher.js";
export { AbortException, TimeoutException, ToolExecutionError } from "./tools/exceptions.js";
export { connectMcpServer, connectMcpServers } from "./tools/external/mcp.js";
export type { McpConnection, McpServerConfig } from "./tools/external/mcp.js";
export { jsonSchemaToZod, toolArgumentsSchema } from "./tools/external/json-schema.js";
export { fitText, truncateText, truncationMarker } from "./tools/output-limit.js";
export { ToolRegistry } from "./tools/registry.js";
export { AbstractTool, createTool } from "./tools/tool.js";
export type { CreateToolConfig } from "./tools/tool.js";
export type {
  ArgumentViolation,
  ToolCall,
  ToolContext,
  ToolError,
  ToolErrorKind,
  ToolResult,
  ToolSpec,
} from "./tools/types.js";
export { formatViolations, toViolations } from "./tools/validation.js";
