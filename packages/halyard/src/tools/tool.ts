import * as z from "zod";
import { AbortException } from "./exceptions.js";
import type { ToolContext, ToolSpec } from "./types.js";

/**
 * Base class for every tool the dispatcher can run.
 *
 * Arguments are validated against `parameterSchema` before `execute` is
 * called, so `execute` always receives the schema's parsed output.
 */
export abstract class AbstractTool<TSchema extends z.ZodType = z.ZodType> {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly parameterSchema: TSchema;

  /** Own deadline, used when a call carries none */
  timeoutMs?: number;

  abstract execute(args: z.output<TSchema>, ctx: ToolContext): string | Promise<string>;

  /**
   * JSON Schema of the arguments, as advertised to the reasoning provider.
   */
  get parametersJsonSchema(): Record<string, unknown> {
    return z.toJSONSchema(this.parameterSchema);
  }

  toSpec(): ToolSpec {
    return {
      name: this.name,
      description: this.description,
      parameters: this.parametersJsonSchema,
    };
  }

  /**
   * Throws an AbortException if the call has been cancelled or timed out.
   * Long-running tools call this between steps.
   */
  throwIfAborted(ctx: ToolContext): void {
    if (ctx.signal.aborted) {
      throw new AbortException();
    }
  }

  /**
   * Register a cleanup function to run when execution is aborted.
   * Runs immediately if the signal is already aborted.
   */
  onAbort(ctx: ToolContext, cleanup: () => void | Promise<void>): void {
    const runCleanup = () => {
      Promise.resolve()
        .then(cleanup)
        .catch((error: unknown) => {
          ctx.logger.warn(`Abort cleanup failed for '${this.name}'`, error);
        });
    };

    if (ctx.signal.aborted) {
      runCleanup();
      return;
    }

    ctx.signal.addEventListener("abort", runCleanup, { once: true });
  }
}

/**
 * Configuration for a function-based tool.
 */
export interface CreateToolConfig<TSchema extends z.ZodType> {
  /** Name the reasoning provider uses to call the tool */
  name: string;

  description: string;

  /** Zod schema for argument validation; use z.strictObject to reject extra keys */
  schema: TSchema;

  execute: (args: z.output<TSchema>, ctx: ToolContext) => string | Promise<string>;

  timeoutMs?: number;

  /**
   * Advertised JSON Schema. Defaults to the one zod derives from `schema`;
   * external tools pass the schema their server published.
   */
  jsonSchema?: Record<string, unknown>;
}

/**
 * Creates a tool from a function. Arguments are typed from the schema.
 *
 * @example
 * ```typescript
 * const add = createTool({
 *   name: "add",
 *   description: "Adds two numbers",
 *   schema: z.strictObject({ a: z.number(), b: z.number() }),
 *   execute: ({ a, b }) => String(a + b),
 * });
 * ```
 */
export function createTool<TSchema extends z.ZodType>(
  config: CreateToolConfig<TSchema>,
): AbstractTool<TSchema> {
  class FunctionTool extends AbstractTool<TSchema> {
    readonly name = config.name;
    readonly description = config.description;
    readonly parameterSchema = config.schema;

    constructor() {
      super();
      this.timeoutMs = config.timeoutMs;
    }

    get parametersJsonSchema(): Record<string, unknown> {
      return config.jsonSchema ?? super.parametersJsonSchema;
    }

    execute(args: z.output<TSchema>, ctx: ToolContext): string | Promise<string> {
      return config.execute(args, ctx);
    }
  }

  return new FunctionTool();
}
