import { describe, expect, it } from "vitest";
import * as z from "zod";
import { formatViolations, toViolations } from "./validation.js";

const schema = z.strictObject({
  command: z.string(),
  cwd: z.string().optional(),
  options: z.strictObject({ verbose: z.boolean() }).optional(),
});

function violationsFor(args: Record<string, unknown>) {
  const result = schema.safeParse(args);
  if (result.success) {
    throw new Error("expected validation to fail");
  }
  return toViolations(result.error.issues, args);
}

describe("toViolations", () => {
  it("reports a required key the call did not send as missing", () => {
    expect(violationsFor({})).toEqual([
      { kind: "missing", key: "command", message: "required key is missing" },
    ]);
  });

  it("reports unknown keys as extra", () => {
    expect(violationsFor({ command: "ls", colour: "red", size: 1 })).toEqual([
      { kind: "extra", key: "colour", message: "unexpected key" },
      { kind: "extra", key: "size", message: "unexpected key" },
    ]);
  });

  it("reports a present key with the wrong type as mistyped", () => {
    const violations = violationsFor({ command: 42 });

    expect(violations).toHaveLength(1);
    expect(violations[0]).toMatchObject({ kind: "mistyped", key: "command" });
  });

  it("prefixes nested keys with their path", () => {
    const violations = violationsFor({ command: "ls", options: { verbose: true, depth: 2 } });

    expect(violations).toEqual([{ kind: "extra", key: "options.depth", message: "unexpected key" }]);
  });

  it("treats a nested key that is absent as mistyped rather than missing", () => {
    const violations = violationsFor({ command: "ls", options: {} });

    expect(violations).toHaveLength(1);
    expect(violations[0]).toMatchObject({ kind: "mistyped", key: "options.verbose" });
  });

  it("lists every violation of a call at once", () => {
    const kinds = violationsFor({ cwd: 3, extra: true }).map((v) => `${v.kind}:${v.key}`);

    expect(kinds.sort()).toEqual(["extra:extra", "missing:command", "mistyped:cwd"]);
  });
});

describe("formatViolations", () => {
  it("joins violations into one line", () => {
    const message = formatViolations("bash", [
      { kind: "missing", key: "command", message: "required key is missing" },
      { kind: "extra", key: "shell", message: "unexpected key" },
    ]);

    expect(message).toBe(
      "Invalid arguments for 'bash': missing 'command': required key is missing; extra 'shell': unexpected key",
    );
  });
});
