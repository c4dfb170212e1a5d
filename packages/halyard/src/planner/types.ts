import * as z from "zod";

export const planItemStatusSchema = z.enum(["pending", "in_progress", "completed", "cancelled"]);
export const planItemPrioritySchema = z.enum(["low", "medium", "high"]);

export type PlanItemStatus = z.infer<typeof planItemStatusSchema>;
export type PlanItemPriority = z.infer<typeof planItemPrioritySchema>;

export const planItemSchema = z.object({
  id: z.string().min(1).describe("Unique identifier of the item"),
  description: z.string().min(1).describe("What needs to be done"),
  status: planItemStatusSchema.describe("Current status of the item"),
  rank: z.number().optional().describe("Ordering rank; lower ranks come first"),
  priority: planItemPrioritySchema.optional(),
});

export type PlanItem = z.infer<typeof planItemSchema>;
