import * as z from "zod";
import type { TaskPlanner } from "../../planner/planner.js";
import { planUpdateMessage } from "../../planner/reminders.js";
import { planItemPrioritySchema, planItemStatusSchema } from "../../planner/types.js";
import { createTool } from "../tool.js";

export const TODO_WRITE_TOOL_NAME = "todo_write";

/**
 * `todo_write` tool: replaces the whole plan held by `planner`.
 */
export function createTodoWriteTool(planner: TaskPlanner) {
  return createTool({
    name: TODO_WRITE_TOOL_NAME,
    description:
      "Create or update the TODO list for the current task. Always send the complete list. " +
      "Keep exactly one item in_progress while working; mark items completed as soon as they are done.",
    schema: z.strictObject({
      todos: z
        .array(
          z.strictObject({
            id: z.string().min(1),
            title: z.string().min(1).describe("What needs to be done"),
            status: planItemStatusSchema,
            priority: planItemPrioritySchema.optional(),
          }),
        )
        .describe("The complete, updated TODO list"),
    }),
    execute: ({ todos }) => {
      planner.setPlan(
        todos.map(({ id, title, status, priority }) => ({ id, description: title, status, priority })),
      );
      const message = planUpdateMessage(todos.length, planner.unfinished().length);
      return `${message}\n\n${planner.render()}`;
    },
  });
}
