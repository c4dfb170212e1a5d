import * as z from "zod";
import {
  DEFAULT_CONTEXT_BUDGET,
  DEFAULT_MAX_CYCLES,
  DEFAULT_MAX_MALFORMED_RESPONSES,
  DEFAULT_MAX_OUTPUT_CHARS,
  DEFAULT_PRESERVE_RECENT_TURNS,
  DEFAULT_TOOL_TIMEOUT_MS,
  DEFAULT_TRIGGER_RATIO,
} from "../core/constants.js";
import { ConfigValidationError } from "../core/errors.js";
import { type ResolvedRetryConfig, type RetryConfig, resolveRetryConfig } from "../core/retry.js";

export const sessionConfigSchema = z.object({
  /** Reasoning cycles before the session fails with budget_exceeded */
  maxCycles: z.number().int().positive().default(DEFAULT_MAX_CYCLES),
  /** Consecutive malformed responses that fail the session */
  maxMalformedResponses: z.number().int().positive().default(DEFAULT_MAX_MALFORMED_RESPONSES),
  /** Context window budget, in estimated tokens */
  contextBudget: z.number().int().positive().default(DEFAULT_CONTEXT_BUDGET),
  preserveRecentTurns: z.number().int().positive().default(DEFAULT_PRESERVE_RECENT_TURNS),
  triggerRatio: z.number().gt(0).max(1).default(DEFAULT_TRIGGER_RATIO),
  toolTimeoutMs: z.number().int().positive().default(DEFAULT_TOOL_TIMEOUT_MS),
  maxOutputChars: z.number().int().positive().default(DEFAULT_MAX_OUTPUT_CHARS),
});

export type SessionConfigInput = z.input<typeof sessionConfigSchema> & { retry?: RetryConfig };

export type SessionConfig = z.output<typeof sessionConfigSchema> & { retry: ResolvedRetryConfig };

/**
 * Applies defaults and validates a partial session configuration.
 *
 * @throws ConfigValidationError listing every invalid field
 */
export function resolveSessionConfig(input: SessionConfigInput = {}): SessionConfig {
  const { retry, ...rest } = input;
  const parsed = sessionConfigSchema.safeParse(rest);
  if (!parsed.success) {
    throw new ConfigValidationError(`Invalid session config:\n${z.prettifyError(parsed.error)}`);
  }
  return { ...parsed.data, retry: resolveRetryConfig(retry) };
}
