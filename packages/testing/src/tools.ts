import { type AbstractTool, ToolExecutionError, createTool } from "halyard";
import * as z from "zod";
import { createTestLogger } from "./logger.js";

/**
 * Returns its `message` argument.
 */
export function createEchoTool(name = "echo"): AbstractTool {
  return createTool({
    name,
    description: "Echoes the message back",
    schema: z.strictObject({ message: z.string() }),
    execute: ({ message }) => message,
  });
}

/**
 * Waits `ms` milliseconds, then reports how long it slept.
 *
 * With `ignoreAbort` the tool keeps sleeping after its signal fires, like
 * a tool with no interrupt point.
 */
export function createSlowTool(options: { name?: string; ignoreAbort?: boolean; timeoutMs?: number } = {}): AbstractTool {
  return createTool({
    name: options.name ?? "slow",
    description: "Sleeps for the given number of milliseconds",
    schema: z.strictObject({ ms: z.number().int().nonnegative() }),
    timeoutMs: options.timeoutMs,
    execute: ({ ms }, ctx) =>
      new Promise<string>((resolve, reject) => {
        const timer = setTimeout(() => resolve(`slept ${ms}ms`), ms);
        if (options.ignoreAbort) {
          return;
        }
        ctx.signal.addEventListener(
          "abort",
          () => {
            clearTimeout(timer);
            reject(new Error("slow tool aborted"));
          },
          { once: true },
        );
      }),
  });
}

/**
 * Always fails with `message`.
 */
export function createFailingTool(message = "tool failed on purpose", name = "fail"): AbstractTool {
  return createTool({
    name,
    description: "Always fails",
    schema: z.strictObject({}),
    execute: () => {
      throw new ToolExecutionError(message);
    },
  });
}

/**
 * A tool that records every invocation's arguments.
 */
export function createSpyTool(name = "spy"): { tool: AbstractTool; invocations: Record<string, unknown>[] } {
  const invocations: Record<string, unknown>[] = [];
  const tool = createTool({
    name,
    description: "Records its arguments",
    schema: z.looseObject({}),
    execute: (args) => {
      invocations.push(args);
      return `call ${invocations.length}`;
    },
  });
  return { tool, invocations };
}

/**
 * Validates `args` against the tool's schema and runs it directly,
 * without a dispatcher.
 */
export async function runTool(
  tool: AbstractTool,
  args: Record<string, unknown>,
  options: { projectRoot: string; signal?: AbortSignal },
): Promise<string> {
  const parsed = tool.parameterSchema.parse(args);
  return tool.execute(parsed, {
    signal: options.signal ?? new AbortController().signal,
    projectRoot: options.projectRoot,
    callId: "test-call",
    logger: createTestLogger(),
  });
}
