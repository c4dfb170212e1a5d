import type { PlanItem } from "./types.js";

function todoCount(count: number): string {
  return count === 1 ? "1 todo is" : `${count} todos are`;
}

/**
 * Reminder block appended to tool output while the plan has unfinished
 * items. Empty string when everything is done.
 */
export function planReminder(unfinished: readonly PlanItem[]): string {
  if (unfinished.length === 0) {
    return "";
  }
  return [
    "",
    "",
    "IMPORTANT:",
    `- ${todoCount(unfinished.length)} not completed. Before you present the final result to the user, **make sure** all the todos are completed.`,
    "- Immediately update the TODO list using the `todo_write` tool.",
  ].join("\n");
}

/**
 * Summary line returned by the `todo_write` tool.
 */
export function planUpdateMessage(total: number, unfinished: number): string {
  const head = `Successfully updated the TODO list with ${total} items.`;
  return unfinished > 0
    ? `${head} ${todoCount(unfinished)} not completed.`
    : `${head} All todos are completed.`;
}
