import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type TempProject, createTempProject, runTool } from "../../../../testing/src/index.js";
import { createTextEditorTool, withLineNumbers } from "./editor.js";

describe("withLineNumbers", () => {
  it("pads numbers to three columns", () => {
    expect(withLineNumbers("a\nb")).toBe("  1 a\n  2 b");
    expect(withLineNumbers("x", 120)).toBe("120 x");
  });
});

describe("text_editor tool", () => {
  let project: TempProject;
  const editor = createTextEditorTool();

  const run = (args: Record<string, unknown>) => runTool(editor, args, { projectRoot: project.root });

  beforeEach(async () => {
    project = await createTempProject({
      "abc.txt": "a\nb\nc",
      "src/config.ts": "const a = 1;\nconst b = 2;\n",
    });
  });

  afterEach(async () => {
    await project.cleanup();
  });

  describe("paths", () => {
    it("requires absolute paths", async () => {
      await expect(run({ command: "view", path: "abc.txt" })).rejects.toThrow(
        "the path abc.txt is not an absolute path. Please provide an absolute path.",
      );
    });

    it("refuses paths outside the project root", async () => {
      await expect(run({ command: "view", path: "/etc/hostname" })).rejects.toThrow(
        `path /etc/hostname is outside the project root ${project.root}`,
      );
    });

    it("reports a missing file precisely", async () => {
      const path = project.path("missing.txt");

      await expect(run({ command: "view", path })).rejects.toThrow(`file does not exist: ${path}`);
    });
  });

  describe("view", () => {
    it("shows the file with line numbers", async () => {
      const path = project.path("abc.txt");

      expect(await run({ command: "view", path })).toBe(
        `Here's the result of running \`cat -n\` on ${path}:\n\n  1 a\n  2 b\n  3 c`,
      );
    });

    it("shows a range, -1 reading to the end", async () => {
      const output = await run({ command: "view", path: project.path("abc.txt"), view_range: [2, -1] });

      expect(output.endsWith(":\n\n  2 b\n  3 c")).toBe(true);
    });

    it("rejects a range starting past the end", async () => {
      await expect(
        run({ command: "view", path: project.path("abc.txt"), view_range: [5, 6] }),
      ).rejects.toThrow("invalid view_range [5, 6]: start line 5 should be within [1, 3]");
    });
  });

  describe("create", () => {
    it("creates a file and its parent directories", async () => {
      const path = project.path("docs/guide/intro.md");

      const output = await run({ command: "create", path, file_text: "# Intro\n" });

      expect(output.startsWith(`File created at ${path}.\n\n`)).toBe(true);
      expect(output.split("\n")).toContain("+# Intro");
      expect(await project.read("docs/guide/intro.md")).toBe("# Intro\n");
    });

    it("overwrites an existing file", async () => {
      const path = project.path("abc.txt");

      const output = await run({ command: "create", path, file_text: "z" });

      expect(output.startsWith(`File overwritten at ${path}.`)).toBe(true);
      expect(await project.read("abc.txt")).toBe("z");
    });

    it("requires file_text", async () => {
      await expect(run({ command: "create", path: project.path("new.txt") })).rejects.toThrow(
        "`file_text` is required for the create command",
      );
    });

    it("refuses to overwrite a directory", async () => {
      const path = project.path("src");

      await expect(run({ command: "create", path, file_text: "x" })).rejects.toThrow(
        `the path ${path} is a directory`,
      );
    });
  });

  describe("str_replace", () => {
    it("replaces the single occurrence and returns a diff", async () => {
      const path = project.path("src/config.ts");

      const output = await run({
        command: "str_replace",
        path,
        old_str: "const b = 2;",
        new_str: "const b = 3;",
      });

      expect(output.startsWith(`Edited ${path} at line 2.\n\n`)).toBe(true);
      const lines = output.split("\n");
      expect(lines).toContain("-const b = 2;");
      expect(lines).toContain("+const b = 3;");
      expect(await project.read("src/config.ts")).toBe("const a = 1;\nconst b = 3;\n");
    });

    it("deletes the anchor when new_str is omitted", async () => {
      await run({ command: "str_replace", path: project.path("src/config.ts"), old_str: "const a = 1;\n" });

      expect(await project.read("src/config.ts")).toBe("const b = 2;\n");
    });

    it("fails with near-miss suggestions when the anchor is not found", async () => {
      await project.write("greet.js", "function greet(name) {\n  return name;\n}\n");

      const attempt = run({
        command: "str_replace",
        path: project.path("greet.js"),
        old_str: "function greet(nme) {",
        new_str: "function greet(person) {",
      });

      await expect(attempt).rejects.toThrow(/^anchor text not found in greet\.js\n/);
      await expect(attempt).rejects.toThrow("Line 1 (95% similar):\n```\nfunction greet(name) {\n```");
      expect(await project.read("greet.js")).toBe("function greet(name) {\n  return name;\n}\n");
    });

    it("fails when the anchor is ambiguous", async () => {
      await project.write("dup.txt", "x = 1\nx = 1\n");

      await expect(
        run({ command: "str_replace", path: project.path("dup.txt"), old_str: "x = 1", new_str: "x = 2" }),
      ).rejects.toThrow(
        "anchor text is ambiguous: 2 occurrences (lines 1, 2). Include more surrounding context to make it unique.",
      );
    });
  });

  describe("insert", () => {
    beforeEach(async () => {
      await project.write("list.txt", "one\ntwo\n");
    });

    it("inserts after the given line", async () => {
      const path = project.path("list.txt");

      const output = await run({ command: "insert", path, insert_line: 1, new_str: "between" });

      expect(output.startsWith(`Inserted text after line 1 in ${path}.`)).toBe(true);
      expect(await project.read("list.txt")).toBe("one\nbetween\ntwo\n");
    });

    it("inserts at the beginning for line 0", async () => {
      await run({ command: "insert", path: project.path("list.txt"), insert_line: 0, new_str: "zero" });

      expect(await project.read("list.txt")).toBe("zero\none\ntwo\n");
    });

    it("rejects a line past the end", async () => {
      await expect(
        run({ command: "insert", path: project.path("list.txt"), insert_line: 5, new_str: "x" }),
      ).rejects.toThrow("invalid insert_line 5: the file has 2 lines");
    });
  });
});
