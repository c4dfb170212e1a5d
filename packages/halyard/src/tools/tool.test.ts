import { describe, expect, it, vi } from "vitest";
import * as z from "zod";
import { createTestLogger } from "../../../testing/src/index.js";
import { AbortException } from "./exceptions.js";
import { AbstractTool, createTool } from "./tool.js";
import type { ToolContext } from "./types.js";

function contextWith(signal: AbortSignal): ToolContext {
  return { signal, projectRoot: "/project", callId: "call_1_1", logger: createTestLogger() };
}

const wordCountSchema = z.strictObject({ text: z.string() });

class WordCountTool extends AbstractTool<typeof wordCountSchema> {
  readonly name = "word_count";
  readonly description = "Counts words";
  readonly parameterSchema = wordCountSchema;

  execute({ text }: z.output<typeof wordCountSchema>): string {
    return String(text.split(/\s+/).filter(Boolean).length);
  }
}

describe("AbstractTool", () => {
  it("derives its spec from the zod schema", () => {
    const spec = new WordCountTool().toSpec();

    expect(spec).toMatchObject({
      name: "word_count",
      description: "Counts words",
      parameters: { type: "object", required: ["text"] },
    });
  });

  it("throwIfAborted throws once the signal fires", () => {
    const tool = new WordCountTool();
    const controller = new AbortController();
    const ctx = contextWith(controller.signal);

    expect(() => tool.throwIfAborted(ctx)).not.toThrow();
    controller.abort();
    expect(() => tool.throwIfAborted(ctx)).toThrow(AbortException);
  });

  it("onAbort runs the cleanup when the signal fires", async () => {
    const tool = new WordCountTool();
    const controller = new AbortController();
    const cleanup = vi.fn();

    tool.onAbort(contextWith(controller.signal), cleanup);
    expect(cleanup).not.toHaveBeenCalled();

    controller.abort();
    await Promise.resolve();
    await Promise.resolve();
    expect(cleanup).toHaveBeenCalledOnce();
  });

  it("onAbort runs the cleanup at once if already aborted", async () => {
    const tool = new WordCountTool();
    const controller = new AbortController();
    controller.abort();
    const cleanup = vi.fn();

    tool.onAbort(contextWith(controller.signal), cleanup);
    await Promise.resolve();
    await Promise.resolve();

    expect(cleanup).toHaveBeenCalledOnce();
  });
});

describe("createTool", () => {
  it("passes parsed arguments to execute", async () => {
    const add = createTool({
      name: "add",
      description: "Adds two numbers",
      schema: z.strictObject({ a: z.number(), b: z.number() }),
      execute: ({ a, b }) => String(a + b),
    });

    const parsed = add.parameterSchema.parse({ a: 2, b: 3 });
    expect(await add.execute(parsed, contextWith(new AbortController().signal))).toBe("5");
  });

  it("keeps its own timeout", () => {
    const tool = createTool({
      name: "t",
      description: "d",
      schema: z.strictObject({}),
      timeoutMs: 250,
      execute: () => "",
    });

    expect(tool.timeoutMs).toBe(250);
  });

  it("advertises an explicit JSON Schema instead of the derived one", () => {
    const jsonSchema = { type: "object", properties: { q: { type: "string" } } };
    const tool = createTool({
      name: "remote",
      description: "d",
      schema: z.looseObject({}),
      jsonSchema,
      execute: () => "",
    });

    expect(tool.toSpec().parameters).toBe(jsonSchema);
  });
});
