import { describe, expect, it } from "vitest";
import { CheckpointError } from "../core/errors.js";
import { type SessionCheckpoint, parseCheckpoint } from "./checkpoint.js";

function createCheckpoint(): SessionCheckpoint {
  return {
    version: 1,
    id: "session-1",
    projectRoot: "/work/repo",
    instruction: "list files",
    turns: [
      { seq: 0, role: "instruction", content: "list files", toolCalls: [], toolResults: [], timestamp: 1 },
      {
        seq: 1,
        role: "assistant",
        content: "",
        toolCalls: [{ id: "call_1_1", name: "ls", arguments: { path: "/work/repo" }, turnSeq: 1 }],
        toolResults: [
          {
            callId: "call_1_1",
            toolName: "ls",
            success: false,
            error: {
              kind: "invalid_arguments",
              message: "bad",
              violations: [{ kind: "extra", key: "x", message: "unexpected" }],
            },
            durationMs: 0,
          },
        ],
        timestamp: 2,
      },
    ],
    plan: [{ id: "1", description: "look around", status: "in_progress" }],
  };
}

describe("parseCheckpoint", () => {
  it("accepts a checkpoint that went through JSON", () => {
    const checkpoint = createCheckpoint();

    expect(parseCheckpoint(JSON.parse(JSON.stringify(checkpoint)))).toEqual(checkpoint);
  });

  it("rejects other versions", () => {
    expect(() => parseCheckpoint({ ...createCheckpoint(), version: 2 })).toThrow(CheckpointError);
  });

  it("rejects an empty history", () => {
    expect(() => parseCheckpoint({ ...createCheckpoint(), turns: [] })).toThrow(/^Invalid checkpoint:\n/);
  });

  it("rejects summary turns, which are never stored", () => {
    const checkpoint = createCheckpoint();
    const turns = checkpoint.turns.map((turn) => (turn.seq === 1 ? { ...turn, role: "summary" } : turn));

    expect(() => parseCheckpoint({ ...checkpoint, turns })).toThrow(CheckpointError);
  });
});
