import * as z from "zod";
import { ReasoningParseError } from "../core/errors.js";
import { planItemSchema, planItemStatusSchema } from "../planner/types.js";
import type { ToolCall } from "../tools/types.js";

export const planUpdatesSchema = z.object({
  /** Replaces the whole plan */
  set: z.array(planItemSchema).optional(),
  /** Status changes applied in order, after `set` */
  update: z.array(z.object({ id: z.string().min(1), status: planItemStatusSchema })).optional(),
});

const toolCallRequestSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  arguments: z.record(z.string(), z.unknown()).default({}),
});

const finalAnswerSchema = z.object({
  type: z.literal("final"),
  answer: z.string(),
  planUpdates: planUpdatesSchema.optional(),
});

const toolCallsSchema = z.object({
  type: z.literal("tool_calls"),
  /** Reasoning text accompanying the calls */
  content: z.string().default(""),
  calls: z.array(toolCallRequestSchema),
  planUpdates: planUpdatesSchema.optional(),
});

export const reasoningResponseSchema = z.discriminatedUnion("type", [
  finalAnswerSchema,
  toolCallsSchema,
]);

export type PlanUpdates = z.infer<typeof planUpdatesSchema>;

export type ReasoningResponse =
  | z.infer<typeof finalAnswerSchema>
  | (Omit<z.infer<typeof toolCallsSchema>, "calls"> & { calls: ToolCall[] });

/**
 * Validates a raw provider response for the turn numbered `turnSeq`.
 *
 * Calls without an id get `call_<turnSeq>_<n>`. Duplicate ids within one
 * response make it malformed, since results are paired by id.
 *
 * @throws ReasoningParseError
 */
export function parseReasoningResponse(raw: unknown, turnSeq: number): ReasoningResponse {
  const parsed = reasoningResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ReasoningParseError(
      `Malformed reasoning response:\n${z.prettifyError(parsed.error)}`,
      raw,
    );
  }

  const response = parsed.data;
  if (response.type === "final") {
    return response;
  }

  const seen = new Set<string>();
  const calls = response.calls.map((request, index): ToolCall => {
    const id = request.id ?? `call_${turnSeq}_${index + 1}`;
    if (seen.has(id)) {
      throw new ReasoningParseError(`Malformed reasoning response: duplicate call id '${id}'`, raw);
    }
    seen.add(id);
    return { id, name: request.name, arguments: request.arguments, turnSeq };
  });

  return { ...response, calls };
}
