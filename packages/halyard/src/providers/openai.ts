import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import { formatTurnsForSummary } from "../context/format.js";
import type { Turn } from "../context/types.js";
import { ReasoningParseError } from "../core/errors.js";
import type { ToolResult } from "../tools/types.js";
import type { ReasoningInput, ReasoningProvider } from "./provider.js";

/**
 * The part of the OpenAI client this provider uses.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal },
      ): Promise<ChatCompletion>;
    };
  };
}

export interface OpenAIReasoningProviderOptions {
  model: string;
  /** Defaults to a client built from `apiKey` / `baseURL` or OPENAI_API_KEY */
  client?: ChatCompletionsClient;
  apiKey?: string;
  /** For OpenAI-compatible endpoints */
  baseURL?: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

const DEFAULT_SYSTEM_PROMPT =
  "You are a coding agent working inside a project directory. Use the tools to inspect and " +
  "change the project. When the task is complete, reply with the final answer and no tool calls.";

const SUMMARY_PROMPT =
  "Summarize the following agent transcript. Keep file paths, decisions, tool outcomes and " +
  "unresolved problems; drop chatter.";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function resultContent(result: ToolResult): string {
  if (result.success) {
    return result.output ?? "";
  }
  return `Error (${result.error?.kind ?? "execution_error"}): ${result.error?.message ?? "unknown error"}`;
}

/**
 * Maps a context window onto chat messages. Each assistant turn becomes one
 * assistant message carrying its tool calls, followed by one tool message
 * per result.
 */
export function toChatMessages(window: readonly Turn[]): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [];

  for (const turn of window) {
    if (turn.role !== "assistant") {
      messages.push({ role: "user", content: turn.content });
      continue;
    }

    if (turn.toolCalls.length === 0) {
      messages.push({ role: "assistant", content: turn.content });
      continue;
    }

    messages.push({
      role: "assistant",
      content: turn.content || null,
      tool_calls: turn.toolCalls.map((call) => ({
        id: call.id,
        type: "function" as const,
        function: { name: call.name, arguments: JSON.stringify(call.arguments) },
      })),
    });
    for (const result of turn.toolResults) {
      messages.push({ role: "tool", tool_call_id: result.callId, content: resultContent(result) });
    }
  }

  return messages;
}

function parseArguments(raw: string, toolName: string): Record<string, unknown> {
  let value: unknown;
  try {
    value = raw.trim() === "" ? {} : JSON.parse(raw);
  } catch (error) {
    throw new ReasoningParseError(
      `Arguments for '${toolName}' are not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      raw,
    );
  }
  if (!isRecord(value)) {
    throw new ReasoningParseError(`Arguments for '${toolName}' must be a JSON object`, raw);
  }
  return value;
}

/**
 * Reasoning provider backed by the chat completions API with function tools.
 */
export class OpenAIReasoningProvider implements ReasoningProvider {
  private readonly client: ChatCompletionsClient;
  private readonly model: string;
  private readonly systemPrompt: string;
  private readonly temperature?: number;
  private readonly maxTokens?: number;

  constructor(options: OpenAIReasoningProviderOptions) {
    this.model = options.model;
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        timeout: 120_000,
        // Retries happen in the agent loop
        maxRetries: 0,
      });
  }

  async next(input: ReasoningInput, signal: AbortSignal): Promise<unknown> {
    const messages: ChatCompletionMessageParam[] = [
      { role: "system", content: this.systemPrompt },
      ...toChatMessages(input.window),
    ];
    if (input.plan.length > 0) {
      messages.push({ role: "user", content: `Current TODO list:\n${input.planText}` });
    }

    const tools: ChatCompletionTool[] = input.tools.map((tool) => ({
      type: "function",
      function: { name: tool.name, description: tool.description, parameters: tool.parameters },
    }));

    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages,
        tools: tools.length > 0 ? tools : undefined,
        temperature: this.temperature,
        max_completion_tokens: this.maxTokens,
      },
      { signal },
    );

    const message = completion.choices[0]?.message;
    if (!message) {
      throw new ReasoningParseError("Completion has no choices", completion);
    }

    const toolCalls = message.tool_calls ?? [];
    if (toolCalls.length > 0) {
      const calls = toolCalls.map((call) => {
        if (!("function" in call)) {
          throw new ReasoningParseError("Only function tool calls are supported", call);
        }
        return {
          id: call.id,
          name: call.function.name,
          arguments: parseArguments(call.function.arguments, call.function.name),
        };
      });
      return { type: "tool_calls", content: message.content ?? "", calls };
    }

    if (message.content) {
      return { type: "final", answer: message.content };
    }
    throw new ReasoningParseError("Completion has neither content nor tool calls", message);
  }

  async summarize(turns: readonly Turn[], signal?: AbortSignal): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: "system", content: SUMMARY_PROMPT },
          { role: "user", content: formatTurnsForSummary(turns) },
        ],
        temperature: this.temperature,
      },
      { signal },
    );
    return completion.choices[0]?.message.content ?? "";
  }
}
