import * as z from "zod";
import type { Turn } from "../context/types.js";
import { CheckpointError } from "../core/errors.js";
import { type PlanItem, planItemSchema } from "../planner/types.js";

const toolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.record(z.string(), z.unknown()),
  turnSeq: z.number().int().nonnegative(),
});

const toolErrorSchema = z.object({
  kind: z.enum(["unknown_tool", "invalid_arguments", "execution_error", "timeout", "cancelled"]),
  message: z.string(),
  violations: z
    .array(
      z.object({
        kind: z.enum(["missing", "extra", "mistyped"]),
        key: z.string(),
        message: z.string(),
      }),
    )
    .optional(),
});

const toolResultSchema = z.object({
  callId: z.string(),
  toolName: z.string(),
  success: z.boolean(),
  output: z.string().optional(),
  error: toolErrorSchema.optional(),
  durationMs: z.number().nonnegative(),
});

const turnSchema = z.object({
  seq: z.number().int().nonnegative(),
  role: z.enum(["instruction", "assistant"]),
  content: z.string(),
  toolCalls: z.array(toolCallSchema),
  toolResults: z.array(toolResultSchema),
  timestamp: z.number(),
});

export const sessionCheckpointSchema = z.object({
  version: z.literal(1),
  id: z.string().min(1),
  projectRoot: z.string().min(1),
  instruction: z.string(),
  turns: z.array(turnSchema).min(1),
  plan: z.array(planItemSchema),
});

/**
 * Everything needed to resume a session: its Turns and its plan.
 * Plain data, safe to serialize as JSON.
 */
export interface SessionCheckpoint {
  version: 1;
  id: string;
  projectRoot: string;
  instruction: string;
  turns: readonly Turn[];
  plan: readonly PlanItem[];
}

/**
 * Validates a checkpoint read back from storage.
 *
 * @throws CheckpointError
 */
export function parseCheckpoint(value: unknown): SessionCheckpoint {
  const parsed = sessionCheckpointSchema.safeParse(value);
  if (!parsed.success) {
    throw new CheckpointError(`Invalid checkpoint:\n${z.prettifyError(parsed.error)}`);
  }
  return parsed.data;
}
