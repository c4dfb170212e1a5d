import { beforeEach, describe, expect, it } from "vitest";
import * as z from "zod";
import { createEchoTool, createFailingTool, createTestLogger } from "../../../testing/src/index.js";
import { ToolRegistrationError } from "../core/errors.js";
import { ToolRegistry } from "./registry.js";
import { createTool } from "./tool.js";

describe("ToolRegistry", () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry(createTestLogger());
  });

  describe("register", () => {
    it("registers a tool under its name", () => {
      const tool = createEchoTool();
      registry.register(tool);

      expect(registry.has("echo")).toBe(true);
      expect(registry.get("echo")).toBe(tool);
    });

    it("replaces a tool registered under the same name", () => {
      const first = createEchoTool("lookup");
      const second = createFailingTool("nope", "lookup");

      registry.register(first);
      registry.register(second);

      expect(registry.get("lookup")).toBe(second);
      expect(registry.names()).toEqual(["lookup"]);
    });

    it("rejects names that are not valid function names", () => {
      const tool = createTool({
        name: "has space",
        description: "bad",
        schema: z.strictObject({}),
        execute: () => "",
      });

      expect(() => registry.register(tool)).toThrow(ToolRegistrationError);
    });

    it("treats names case-sensitively", () => {
      registry.register(createEchoTool("Echo"));

      expect(registry.has("Echo")).toBe(true);
      expect(registry.has("echo")).toBe(false);
    });
  });

  describe("unregister", () => {
    it("removes a tool and reports whether it existed", () => {
      registry.register(createEchoTool());

      expect(registry.unregister("echo")).toBe(true);
      expect(registry.unregister("echo")).toBe(false);
      expect(registry.get("echo")).toBeUndefined();
    });
  });

  describe("from", () => {
    it("builds a registry in registration order", () => {
      const built = ToolRegistry.from(
        [createEchoTool("a"), createEchoTool("b"), createFailingTool("x", "c")],
        createTestLogger(),
      );

      expect(built.names()).toEqual(["a", "b", "c"]);
    });
  });

  describe("catalog", () => {
    it("describes every tool with its JSON Schema", () => {
      registry.register(createEchoTool());

      const [spec] = registry.catalog();

      expect(spec.name).toBe("echo");
      expect(spec.description).toBe("Echoes the message back");
      expect(spec.parameters).toMatchObject({
        type: "object",
        properties: { message: { type: "string" } },
        required: ["message"],
        additionalProperties: false,
      });
    });

    it("is empty for an empty registry", () => {
      expect(registry.catalog()).toEqual([]);
    });
  });
});
