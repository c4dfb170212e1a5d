import type { ReasoningInput } from "halyard";
import { describe, expect, it } from "vitest";
import { ScriptedReasoningProvider, step } from "./scripted-provider.js";
import { createAssistantTurns } from "./turn-fixtures.js";

const input: ReasoningInput = { window: [], plan: [], planText: "(no plan items)", tools: [], cycle: 1 };

describe("ScriptedReasoningProvider", () => {
  it("plays steps in order and records inputs", async () => {
    const provider = new ScriptedReasoningProvider([
      step.toolCalls([{ name: "ls" }], "looking"),
      step.compute((received) => ({ type: "final", answer: `cycle ${received.cycle}` })),
    ]);
    const signal = new AbortController().signal;

    expect(await provider.next(input, signal)).toEqual({
      type: "tool_calls",
      content: "looking",
      calls: [{ name: "ls" }],
      planUpdates: undefined,
    });
    expect(await provider.next({ ...input, cycle: 2 }, signal)).toEqual({ type: "final", answer: "cycle 2" });
    expect(provider.callCount).toBe(2);
    await expect(provider.next(input, signal)).rejects.toThrow("Script exhausted after 2 steps");
  });

  it("repeats the last step when asked", async () => {
    const provider = new ScriptedReasoningProvider([step.raw("again")], { repeatLast: true });
    const signal = new AbortController().signal;

    await provider.next(input, signal);

    expect(await provider.next(input, signal)).toBe("again");
  });

  it("throws scripted errors and rejects hanging steps on abort", async () => {
    const provider = new ScriptedReasoningProvider([step.fail(new Error("rate limit")), step.hang()]);
    const controller = new AbortController();

    await expect(provider.next(input, controller.signal)).rejects.toThrow("rate limit");
    const hanging = provider.next(input, controller.signal);
    controller.abort("stop");

    await expect(hanging).rejects.toMatchObject({ name: "AbortError", message: "stop" });
  });

  it("summarizes spans by their sequence numbers", async () => {
    const provider = new ScriptedReasoningProvider([]);
    const turns = createAssistantTurns(2).map((turn, index) => ({
      ...turn,
      seq: index + 3,
      toolCalls: [],
      toolResults: [],
      timestamp: 0,
    }));

    expect(await provider.summarize(turns)).toBe("summary of turns 3-4");
    expect(provider.summarizedSpans).toHaveLength(1);
  });
});
