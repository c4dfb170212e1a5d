import { describe, expect, it } from "vitest";
import { createTestLogger, runTool } from "../../../../testing/src/index.js";
import { TaskPlanner } from "../../planner/planner.js";
import { createTodoWriteTool } from "./todo.js";

describe("todo_write tool", () => {
  it("replaces the plan and renders it", async () => {
    const planner = new TaskPlanner([{ id: "old", description: "stale", status: "pending" }], createTestLogger());

    const output = await runTool(
      createTodoWriteTool(planner),
      {
        todos: [
          { id: "1", title: "Read the failing test", status: "completed" },
          { id: "2", title: "Fix the parser", status: "in_progress", priority: "high" },
          { id: "3", title: "Run the suite", status: "pending" },
        ],
      },
      { projectRoot: "/tmp" },
    );

    expect(output).toBe(
      [
        "Successfully updated the TODO list with 3 items. 2 todos are not completed.",
        "",
        "[x] 1. Read the failing test",
        "[~] 2. Fix the parser (high)",
        "[ ] 3. Run the suite",
      ].join("\n"),
    );
    expect(planner.snapshot().map((item) => item.id)).toEqual(["1", "2", "3"]);
  });

  it("reports when everything is done", async () => {
    const planner = new TaskPlanner([], createTestLogger());

    const output = await runTool(
      createTodoWriteTool(planner),
      { todos: [{ id: "a", title: "Ship it", status: "completed" }] },
      { projectRoot: "/tmp" },
    );

    expect(output).toBe("Successfully updated the TODO list with 1 items. All todos are completed.\n\n[x] a. Ship it");
  });

  it("rejects an unknown status before touching the plan", async () => {
    const planner = new TaskPlanner([], createTestLogger());

    await expect(
      runTool(createTodoWriteTool(planner), { todos: [{ id: "a", title: "x", status: "done" }] }, { projectRoot: "/tmp" }),
    ).rejects.toThrow();
    expect(planner.snapshot()).toEqual([]);
  });
});
