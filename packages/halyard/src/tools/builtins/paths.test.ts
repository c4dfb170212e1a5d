import { describe, expect, it } from "vitest";
import { ToolExecutionError } from "../exceptions.js";
import { requireAbsoluteInProject, resolveInProject, toProjectRelative } from "./paths.js";

describe("resolveInProject", () => {
  it("resolves relative paths against the root", () => {
    expect(resolveInProject("/work/repo", "src/app.ts")).toBe("/work/repo/src/app.ts");
    expect(resolveInProject("/work/repo", undefined)).toBe("/work/repo");
  });

  it("accepts names that merely start with two dots", () => {
    expect(resolveInProject("/work/repo", "..config")).toBe("/work/repo/..config");
  });

  it("rejects escapes from the root", () => {
    expect(() => resolveInProject("/work/repo", "../other")).toThrow(ToolExecutionError);
    expect(() => resolveInProject("/work/repo", "/work/repository")).toThrow(
      "path /work/repository is outside the project root /work/repo",
    );
  });
});

describe("requireAbsoluteInProject", () => {
  it("rejects relative paths", () => {
    expect(() => requireAbsoluteInProject("/work/repo", "src")).toThrow(
      "the path src is not an absolute path. Please provide an absolute path.",
    );
  });

  it("normalizes absolute paths inside the root", () => {
    expect(requireAbsoluteInProject("/work/repo", "/work/repo/src/../lib")).toBe("/work/repo/lib");
  });
});

describe("toProjectRelative", () => {
  it("uses forward slashes", () => {
    expect(toProjectRelative("/work/repo", "/work/repo/src/app.ts")).toBe("src/app.ts");
  });
});
