import type { ILogObj, Logger } from "tslog";
import { ToolRegistrationError } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import type { AbstractTool } from "./tool.js";
import type { ToolSpec } from "./types.js";

const TOOL_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/**
 * Holds the tools available to a session: built-ins plus tools discovered
 * from external servers. Names are case-sensitive, as the model sends them.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, AbstractTool>();
  private readonly logger: Logger<ILogObj>;

  constructor(logger?: Logger<ILogObj>) {
    this.logger = logger ?? createLogger({ name: "halyard:registry" });
  }

  /**
   * Creates a registry holding the given tools, later ones replacing
   * earlier ones with the same name.
   */
  static from(tools: readonly AbstractTool[], logger?: Logger<ILogObj>): ToolRegistry {
    const registry = new ToolRegistry(logger);
    for (const tool of tools) {
      registry.register(tool);
    }
    return registry;
  }

  /**
   * Adds a tool. A tool already registered under the same name is replaced.
   *
   * @throws ToolRegistrationError if the name is not a valid function name
   */
  register(tool: AbstractTool): void {
    if (!TOOL_NAME_PATTERN.test(tool.name)) {
      throw new ToolRegistrationError(
        `Invalid tool name '${tool.name}': use 1-64 letters, digits, '_' or '-'`,
      );
    }
    if (this.tools.has(tool.name)) {
      this.logger.debug(`Replacing tool '${tool.name}'`);
    }
    this.tools.set(tool.name, tool);
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  get(name: string): AbstractTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Tool specs in registration order, for the reasoning provider.
   */
  catalog(): ToolSpec[] {
    return Array.from(this.tools.values(), (tool) => tool.toSpec());
  }
}
